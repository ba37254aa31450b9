// BOUNDARY - Node HTTP server hosting the task form controller

import http from 'http';
import { Readable } from 'stream';

import { logger } from '../../shared/logger';
import { TaskFormController } from './task-form.controller';

const COMPONENT = 'task-form-server';
const MAX_BODY_BYTES = 64 * 1024;

export class BodyTooLargeError extends Error {
  constructor() {
    super(`Request body exceeds ${MAX_BODY_BYTES} bytes`);
    this.name = 'BodyTooLargeError';
  }
}

export class RequestAbortedError extends Error {
  constructor() {
    super('Client closed the request before the body was read');
    this.name = 'RequestAbortedError';
  }
}

export function readBody(req: Readable, maxBytes = MAX_BODY_BYTES): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    let settled = false;

    const settle = (finish: () => void): void => {
      if (!settled) {
        settled = true;
        finish();
      }
    };

    req.on('data', (chunk: Buffer) => {
      if (settled) return;
      size += chunk.length;
      if (size > maxBytes) {
        settle(() => reject(new BodyTooLargeError()));
        return;
      }
      chunks.push(chunk);
    });
    // Rest of an oversized body is drained and dropped
    req.on('end', () => settle(() => resolve(Buffer.concat(chunks).toString('utf8'))));
    req.on('error', error => settle(() => reject(error)));
    // 'close' without 'end' means the client went away mid-body
    req.on('close', () => settle(() => reject(new RequestAbortedError())));
  });
}

export function createTaskFormServer(controller: TaskFormController): http.Server {
  return http.createServer((req, res) => {
    const respond = async (): Promise<void> => {
      const url = new URL(req.url ?? '/', 'http://localhost');
      const body = req.method === 'POST' ? await readBody(req) : undefined;

      const result = await controller.handle({
        method: req.method ?? 'GET',
        path: url.pathname,
        contentType: req.headers['content-type'],
        body
      });

      res.writeHead(result.status, { 'Content-Type': result.contentType, ...result.headers });
      res.end(result.body);
    };

    respond().catch((error: unknown) => {
      if (error instanceof RequestAbortedError) {
        res.destroy();
        return;
      }
      const tooLarge = error instanceof BodyTooLargeError;
      if (!tooLarge) {
        logger.error(COMPONENT, 'Request failed', error instanceof Error ? error : null);
      }
      if (!res.headersSent) {
        res.writeHead(tooLarge ? 413 : 500, { 'Content-Type': 'text/plain; charset=utf-8' });
      }
      res.end(tooLarge ? 'Request body too large.' : 'Internal server error.');
    });
  });
}

// Resolves with the bound port, useful when asked for port 0
export function listen(server: http.Server, port: number, host = '0.0.0.0'): Promise<number> {
  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, host, () => {
      server.off('error', reject);
      const address = server.address();
      const boundPort = typeof address === 'object' && address !== null ? address.port : port;
      logger.info(COMPONENT, `Running on ${host}:${boundPort}`);
      resolve(boundPort);
    });
  });
}

export function close(server: http.Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close(error => (error ? reject(error) : resolve()));
  });
}
