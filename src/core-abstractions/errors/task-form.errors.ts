// CORE ABSTRACTIONS - Validation errors for a single form submission
// Each error names the failing field, the offending value and why it failed

import { TASK_FORM_FIELDS, TaskFormField } from '../../boundary/dto/task-form.dto';

export type FieldIssue =
  | 'absent'       // key missing from the submission
  | 'empty'        // present but blank
  | 'malformed'    // a component is not an integer, or the keyword is unknown
  | 'wrong_arity'  // wrong number of separated components
  | 'impossible';  // structurally fine but not a real point in time

export abstract class TaskFormError extends Error {
  protected constructor(
    message: string,
    public readonly field: TaskFormField,
    public readonly value: string | undefined,
    public readonly reason: FieldIssue
  ) {
    super(message);
  }
}

export class InvalidStartDateError extends TaskFormError {
  constructor(value: string | undefined, reason: FieldIssue, detail: string) {
    super(`Invalid value for start date: ${detail}`, TASK_FORM_FIELDS.START, value, reason);
    this.name = 'InvalidStartDateError';
  }
}

export class InvalidStartTimeError extends TaskFormError {
  constructor(value: string | undefined, reason: FieldIssue, detail: string) {
    super(`Invalid value for start time: ${detail}`, TASK_FORM_FIELDS.TIME, value, reason);
    this.name = 'InvalidStartTimeError';
  }
}

export class MissingTaskNameError extends TaskFormError {
  constructor(value: string | undefined, reason: FieldIssue) {
    super(
      reason === 'absent' ? 'No task name: task_name is missing' : 'No task name: task_name is empty',
      TASK_FORM_FIELDS.NAME,
      value,
      reason
    );
    this.name = 'MissingTaskNameError';
  }
}

export class UnknownRepeatKeywordError extends TaskFormError {
  constructor(value: string | undefined, validKeywords: readonly string[]) {
    super(
      `Unknown repeat info: ${value === undefined ? 'repeat_info is missing' : `"${value}"`}. ` +
        `Valid values: ${validKeywords.join(', ')}`,
      TASK_FORM_FIELDS.REPEAT_INFO,
      value,
      value === undefined ? 'absent' : 'malformed'
    );
    this.name = 'UnknownRepeatKeywordError';
  }
}
