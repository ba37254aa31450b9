// CORE ABSTRACTIONS - Value Object for the task start time of day

import { InvalidStartTimeError } from '../errors/task-form.errors';
import { FieldResult, accept, reject, splitIntegers } from './field-result';

export class StartTime {
  private constructor(
    public readonly hour: number,
    public readonly minute: number,
    public readonly raw: string
  ) {}

  // Expected format: H:M, 24-hour clock
  static parse(raw: string | undefined): FieldResult<StartTime, InvalidStartTimeError> {
    if (raw === undefined) {
      return reject(new InvalidStartTimeError(raw, 'absent', 'task_time is missing'));
    }
    if (raw.trim().length === 0) {
      return reject(new InvalidStartTimeError(raw, 'empty', 'task_time is empty'));
    }

    const { count, values } = splitIntegers(raw, ':');
    if (values === null) {
      return reject(new InvalidStartTimeError(
        raw,
        'malformed',
        `"${raw}" is not of the form H:M (${count} components, not all integers)`
      ));
    }
    if (values.length !== 2) {
      return reject(new InvalidStartTimeError(
        raw,
        'wrong_arity',
        `"${raw}" has ${count} components, expected 2`
      ));
    }

    const [hour, minute] = values;
    return accept(new StartTime(hour, minute, raw));
  }
}
