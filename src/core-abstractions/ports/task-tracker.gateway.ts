// CORE ABSTRACTIONS - Gateway Port
// What Operators need from the task-tracking service, without knowing how it is reached

import { AddTaskRequestDto } from '../../boundary/dto/add-task-request.dto';

export interface ITaskTrackerGateway {
  // Resolves once the service has accepted the task.
  // Rejects with TaskTrackerUnavailableError or TaskTrackerRejectedError.
  addTask(request: AddTaskRequestDto): Promise<void>;
}
