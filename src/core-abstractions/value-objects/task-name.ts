// CORE ABSTRACTIONS - Value Object for the task name
// Only a missing or empty field is refused; the name is forwarded exactly as typed

import { MissingTaskNameError } from '../errors/task-form.errors';
import { FieldResult, accept, reject } from './field-result';

export class TaskName {
  private constructor(public readonly value: string) {}

  static validate(raw: string | undefined): FieldResult<TaskName, MissingTaskNameError> {
    if (raw === undefined) {
      return reject(new MissingTaskNameError(raw, 'absent'));
    }
    if (raw === '') {
      return reject(new MissingTaskNameError(raw, 'empty'));
    }

    return accept(new TaskName(raw));
  }
}
