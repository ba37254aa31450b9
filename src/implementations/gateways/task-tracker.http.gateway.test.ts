import { describe, it, expect, vi } from 'vitest';
import { HttpTaskTrackerGateway } from './task-tracker.http.gateway';
import { TaskTrackerRejectedError, TaskTrackerUnavailableError } from '../../core-abstractions/errors/task-tracker.errors';

const url = 'http://localhost:5000/addTask';
const payload = { taskName: 'Water plants', taskStart: 1710495000, taskRepeatInfo: 7, taskRepeatType: 4 };

function gatewayAnswering(response: () => Promise<Response>) {
    const fetchFn = vi.fn((_input: string | URL | Request, _init?: RequestInit) => response());
    return { fetchFn, gateway: new HttpTaskTrackerGateway({ addTaskUrl: url, fetchFn }) };
}

describe('HttpTaskTrackerGateway', () => {
    it('posts the payload as JSON', async () => {
        const { fetchFn, gateway } = gatewayAnswering(async () => new Response('ok', { status: 200 }));

        await gateway.addTask(payload);

        expect(fetchFn).toHaveBeenCalledTimes(1);
        const [input, init] = fetchFn.mock.calls[0];
        expect(input).toBe(url);
        expect(init?.method).toBe('POST');
        expect(init?.headers).toEqual({ 'Content-Type': 'application/json' });
        expect(init?.body).toBe('{"taskName":"Water plants","taskStart":1710495000,"taskRepeatInfo":7,"taskRepeatType":4}');
        expect(init?.signal).toBeInstanceOf(AbortSignal);
    });

    it('treats any status other than 200 as a rejection', async () => {
        const { gateway } = gatewayAnswering(async () => new Response('duplicate task', { status: 201 }));

        const error = await gateway.addTask(payload).catch((e: unknown) => e);

        expect(error).toBeInstanceOf(TaskTrackerRejectedError);
        if (error instanceof TaskTrackerRejectedError) {
            expect(error.status).toBe(201);
            expect(error.responseText).toBe('duplicate task');
        }
    });

    it('wraps connection failures', async () => {
        const { gateway } = gatewayAnswering(async () => {
            throw new TypeError('fetch failed');
        });

        const error = await gateway.addTask(payload).catch((e: unknown) => e);

        expect(error).toBeInstanceOf(TaskTrackerUnavailableError);
        if (error instanceof TaskTrackerUnavailableError) {
            expect(error.message).toBe(`Failed to connect to TaskTracker API at ${url}: fetch failed`);
        }
    });

    it('aborts requests that outlive the timeout', async () => {
        const fetchFn = vi.fn((_input: string | URL | Request, init?: RequestInit) =>
            new Promise<Response>((_resolve, reject) => {
                init?.signal?.addEventListener('abort', () => reject(new Error('The operation was aborted due to timeout')));
            })
        );
        const gateway = new HttpTaskTrackerGateway({ addTaskUrl: url, fetchFn, timeoutMs: 10 });

        await expect(gateway.addTask(payload)).rejects.toBeInstanceOf(TaskTrackerUnavailableError);
    });
});
