// BOUNDARY - HTTP controller for the task form page
// Maps requests onto the AddTaskOperator and its errors onto status codes

import { TaskFormError } from '../../core-abstractions/errors/task-form.errors';
import { TaskTrackerRejectedError, TaskTrackerUnavailableError } from '../../core-abstractions/errors/task-tracker.errors';
import { AddTaskOperator } from '../../operators/add-task.operator';
import { logger } from '../../shared/logger';
import { TASK_FORM_FIELDS, TaskFormDto, TaskFormDtoSchema } from '../dto/task-form.dto';

const COMPONENT = 'task-form-http';

export interface HttpRequestData {
  method: string;
  path: string;
  contentType?: string;
  body?: string;
}

export interface HttpResult {
  status: number;
  contentType: 'text/html; charset=utf-8' | 'text/plain; charset=utf-8';
  body: string;
  headers?: Record<string, string>;
}

export class TaskFormController {
  constructor(
    private readonly addTaskOperator: AddTaskOperator,
    private readonly formPage: string
  ) {}

  async handle(request: HttpRequestData): Promise<HttpResult> {
    if (request.path !== '/') {
      return text(404, 'Not found.');
    }

    switch (request.method) {
      case 'GET':
        return this.renderForm();
      case 'POST':
        return this.submitForm(request);
      default:
        return { ...text(405, 'Method not allowed.'), headers: { Allow: 'GET, POST' } };
    }
  }

  private renderForm(): HttpResult {
    return { status: 200, contentType: 'text/html; charset=utf-8', body: this.formPage };
  }

  private async submitForm(request: HttpRequestData): Promise<HttpResult> {
    const dto = this.readSubmission(request);
    if (dto === null) {
      return text(400, 'Submission must be a form or a JSON object of strings.');
    }

    try {
      await this.addTaskOperator.addTask(dto);
      return this.renderForm();
    } catch (error) {
      if (error instanceof TaskFormError) {
        return text(400, error.message);
      }
      if (error instanceof TaskTrackerUnavailableError) {
        return text(502, 'Failed to connect to TaskTracker API.');
      }
      if (error instanceof TaskTrackerRejectedError) {
        return text(502, 'TaskTracker API rejected the task.');
      }

      logger.error(COMPONENT, 'Unexpected error while adding task', error instanceof Error ? error : null);
      return text(500, 'Internal server error.');
    }
  }

  // Form posts are urlencoded; JSON is accepted for scripted clients
  private readSubmission(request: HttpRequestData): TaskFormDto | null {
    const body = request.body ?? '';

    if (request.contentType?.startsWith('application/json')) {
      let json: unknown;
      try {
        json = JSON.parse(body);
      } catch (error) {
        logger.warn(COMPONENT, 'Unparseable JSON submission', {
          reason: error instanceof Error ? error.message : String(error)
        });
        return null;
      }
      const parsed = TaskFormDtoSchema.safeParse(json);
      return parsed.success ? parsed.data : null;
    }

    const params = new URLSearchParams(body);
    return {
      task_start: params.get(TASK_FORM_FIELDS.START) ?? undefined,
      task_time: params.get(TASK_FORM_FIELDS.TIME) ?? undefined,
      task_name: params.get(TASK_FORM_FIELDS.NAME) ?? undefined,
      repeat_info: params.get(TASK_FORM_FIELDS.REPEAT_INFO) ?? undefined
    };
  }
}

function text(status: number, body: string): HttpResult {
  return { status, contentType: 'text/plain; charset=utf-8', body };
}
