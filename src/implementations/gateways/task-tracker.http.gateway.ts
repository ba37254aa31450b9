// IMPLEMENTATIONS - HTTP gateway to the task-tracking API
// POSTs the payload as JSON; only a 200 answer counts as accepted

import { AddTaskRequestDto } from '../../boundary/dto/add-task-request.dto';
import { TaskTrackerRejectedError, TaskTrackerUnavailableError } from '../../core-abstractions/errors/task-tracker.errors';
import { ITaskTrackerGateway } from '../../core-abstractions/ports/task-tracker.gateway';

export const ADD_TASK_TIMEOUT_MS = 10_000;

export interface HttpTaskTrackerGatewayOptions {
  addTaskUrl: string;
  timeoutMs?: number;
  fetchFn?: typeof fetch;
}

export class HttpTaskTrackerGateway implements ITaskTrackerGateway {
  private readonly addTaskUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: typeof fetch;

  constructor(options: HttpTaskTrackerGatewayOptions) {
    this.addTaskUrl = options.addTaskUrl;
    this.timeoutMs = options.timeoutMs ?? ADD_TASK_TIMEOUT_MS;
    this.fetchFn = options.fetchFn ?? fetch;
  }

  async addTask(request: AddTaskRequestDto): Promise<void> {
    let response: Response;
    try {
      response = await this.fetchFn(this.addTaskUrl, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(request),
        signal: AbortSignal.timeout(this.timeoutMs)
      });
    } catch (error) {
      throw new TaskTrackerUnavailableError(
        this.addTaskUrl,
        error instanceof Error ? error.message : String(error)
      );
    }

    if (response.status !== 200) {
      throw new TaskTrackerRejectedError(this.addTaskUrl, response.status, await response.text());
    }
  }
}
