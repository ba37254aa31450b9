// CORE ABSTRACTIONS - Checkpoint for a task form submission
// Runs the field checks in a fixed order and stops at the first failure

import { TaskFormDto } from '../../boundary/dto/task-form.dto';
import {
  InvalidStartDateError,
  InvalidStartTimeError,
  MissingTaskNameError,
  TaskFormError,
  UnknownRepeatKeywordError
} from '../errors/task-form.errors';
import { FieldResult } from '../value-objects/field-result';
import { RecurrenceRule } from '../value-objects/recurrence-rule';
import { StartDate } from '../value-objects/start-date';
import { StartTime } from '../value-objects/start-time';
import { TaskName } from '../value-objects/task-name';

export interface ValidatedTaskForm {
  startDate: StartDate;
  startTime: StartTime;
  taskName: TaskName;
  recurrence: RecurrenceRule;
}

export type TaskFormReport =
  | { passed: true; fields: ValidatedTaskForm; evaluatedAt: Date }
  | { passed: false; error: TaskFormError; evaluatedAt: Date };

// Standalone field checks, usable independently of the checkpoint

export function parseStartDate(raw: string | undefined): FieldResult<StartDate, InvalidStartDateError> {
  return StartDate.parse(raw);
}

export function parseStartTime(raw: string | undefined): FieldResult<StartTime, InvalidStartTimeError> {
  return StartTime.parse(raw);
}

export function validateName(raw: string | undefined): FieldResult<TaskName, MissingTaskNameError> {
  return TaskName.validate(raw);
}

export function resolveRepeat(raw: string | undefined): FieldResult<RecurrenceRule, UnknownRepeatKeywordError> {
  return RecurrenceRule.fromKeyword(raw);
}

export class TaskFormCheckpoint {
  run(dto: TaskFormDto): TaskFormReport {
    const evaluatedAt = new Date();

    const startDate = parseStartDate(dto.task_start);
    if (!startDate.ok) {
      return { passed: false, error: startDate.error, evaluatedAt };
    }

    const startTime = parseStartTime(dto.task_time);
    if (!startTime.ok) {
      return { passed: false, error: startTime.error, evaluatedAt };
    }

    const taskName = validateName(dto.task_name);
    if (!taskName.ok) {
      return { passed: false, error: taskName.error, evaluatedAt };
    }

    const recurrence = resolveRepeat(dto.repeat_info);
    if (!recurrence.ok) {
      return { passed: false, error: recurrence.error, evaluatedAt };
    }

    return {
      passed: true,
      fields: {
        startDate: startDate.value,
        startTime: startTime.value,
        taskName: taskName.value,
        recurrence: recurrence.value
      },
      evaluatedAt
    };
  }
}
