// IMPLEMENTATIONS - In-memory gateway
// Records every accepted task instead of sending it; for development and tests

import { AddTaskRequestDto } from '../../boundary/dto/add-task-request.dto';
import { TaskTrackerUnavailableError } from '../../core-abstractions/errors/task-tracker.errors';
import { ITaskTrackerGateway } from '../../core-abstractions/ports/task-tracker.gateway';

export class InMemoryTaskTrackerGateway implements ITaskTrackerGateway {
  private readonly submitted: AddTaskRequestDto[] = [];
  private offline = false;

  async addTask(request: AddTaskRequestDto): Promise<void> {
    if (this.offline) {
      throw new TaskTrackerUnavailableError('memory://task-tracker', 'simulated outage');
    }
    this.submitted.push({ ...request });
  }

  getSubmitted(): AddTaskRequestDto[] {
    return [...this.submitted];
  }

  simulateOutage(offline: boolean): void {
    this.offline = offline;
  }

  clear(): void {
    this.submitted.length = 0;
    this.offline = false;
  }
}
