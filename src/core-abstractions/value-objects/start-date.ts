// CORE ABSTRACTIONS - Value Object for the task start date
// Structural parsing only: calendar feasibility is checked when the instant is composed

import { InvalidStartDateError } from '../errors/task-form.errors';
import { FieldResult, accept, reject, splitIntegers } from './field-result';

export class StartDate {
  private constructor(
    public readonly year: number,
    public readonly month: number, // 1-12 as typed by the user
    public readonly day: number,
    public readonly raw: string
  ) {}

  // Expected format: YYYY-M-D, leading zeros optional
  static parse(raw: string | undefined): FieldResult<StartDate, InvalidStartDateError> {
    if (raw === undefined) {
      return reject(new InvalidStartDateError(raw, 'absent', 'task_start is missing'));
    }
    if (raw.trim().length === 0) {
      return reject(new InvalidStartDateError(raw, 'empty', 'task_start is empty'));
    }

    const { count, values } = splitIntegers(raw, '-');
    if (values === null) {
      return reject(new InvalidStartDateError(
        raw,
        'malformed',
        `"${raw}" is not of the form YYYY-M-D (${count} components, not all integers)`
      ));
    }
    if (values.length !== 3) {
      return reject(new InvalidStartDateError(
        raw,
        'wrong_arity',
        `"${raw}" has ${count} components, expected 3`
      ));
    }

    const [year, month, day] = values;
    return accept(new StartDate(year, month, day, raw));
  }
}
