// BOOTSTRAP - Service configuration
// Read from the environment once at startup and validated before anything is wired

import path from 'path';
import { z } from 'zod';

export const APP_ENVIRONMENTS = ['development', 'production', 'testing'] as const;
export type AppEnvironment = typeof APP_ENVIRONMENTS[number];

// 0 lets the OS pick a port to listen on
const listenPortSchema = z.coerce.number().int().min(0).max(65535);
// Blank coerces to 0, which is never a usable remote port
const remotePortSchema = z.coerce.number().int().min(1).max(65535);

const EnvSchema = z.object({
  APP_ENV: z.enum(APP_ENVIRONMENTS).default('production'),
  TASK_FORM_PORT: listenPortSchema.default(8080),
  TASK_FORM_PAGE: z.string().min(1).optional(),
  TASKTRACKER_API_HOST_ADDRESS: z.string().url(),
  TASKTRACKER_API_PORT: remotePortSchema,
  TASKTRACKER_ADD_TASK_PATH: z.string().min(1).default('addTask')
});

export interface AppConfig {
  environment: AppEnvironment;
  port: number;
  formPagePath: string;
  taskTracker: {
    hostAddress: string;
    port: number;
    addTaskPath: string;
  };
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

export const DEFAULT_FORM_PAGE_PATH = path.resolve(__dirname, '..', '..', 'templates', 'input_task.html');

export function loadConfig(env: Record<string, string | undefined>): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const values = parsed.data;
  return {
    environment: values.APP_ENV,
    port: values.TASK_FORM_PORT,
    formPagePath: values.TASK_FORM_PAGE ?? DEFAULT_FORM_PAGE_PATH,
    taskTracker: {
      hostAddress: values.TASKTRACKER_API_HOST_ADDRESS.replace(/\/+$/, ''),
      port: values.TASKTRACKER_API_PORT,
      addTaskPath: values.TASKTRACKER_ADD_TASK_PATH.replace(/^\/+/, '')
    }
  };
}

// <host address>:<port>/<add task path>, e.g. http://localhost:5000/addTask
export function addTaskUrl(config: AppConfig): string {
  const { hostAddress, port, addTaskPath } = config.taskTracker;
  return `${hostAddress}:${port}/${addTaskPath}`;
}
