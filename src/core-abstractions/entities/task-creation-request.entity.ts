// CORE ABSTRACTIONS - Domain entity
// A validated request to create one task in the task-tracking service

import { AddTaskRequestDto } from '../../boundary/dto/add-task-request.dto';
import { ValidatedTaskForm } from '../checkpoints/task-form.checkpoint';
import { InstantPolicy, toEpochSeconds } from '../policies/instant.policy';
import { RecurrenceRule } from '../value-objects/recurrence-rule';
import { TaskName } from '../value-objects/task-name';

export class TaskCreationRequest {
  public readonly startEpochSeconds: number;

  constructor(
    public readonly taskName: TaskName,
    public readonly start: Date,
    public readonly recurrence: RecurrenceRule
  ) {
    if (Number.isNaN(start.getTime())) {
      throw new Error('Task start must be a valid point in time');
    }
    this.startEpochSeconds = toEpochSeconds(start);
  }

  // Throws InvalidStartDateError when the policy cannot compose the start instant
  static create(form: ValidatedTaskForm, policy: InstantPolicy): TaskCreationRequest {
    const start = policy.compose(form.startDate, form.startTime);
    if (!start.ok) {
      throw start.error;
    }

    return new TaskCreationRequest(form.taskName, start.value, form.recurrence);
  }

  toPayload(): AddTaskRequestDto {
    return {
      taskName: this.taskName.value,
      taskStart: this.startEpochSeconds,
      taskRepeatInfo: this.recurrence.parameter,
      taskRepeatType: this.recurrence.type.ordinal
    };
  }
}
