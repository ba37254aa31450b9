// CORE ABSTRACTIONS - Policy for turning a calendar date and time of day into an instant
// The port lets a zone-aware policy replace local time without touching callers

import { getUnixTime } from 'date-fns';

import { InvalidStartDateError } from '../errors/task-form.errors';
import { FieldResult, accept, reject } from '../value-objects/field-result';
import { StartDate } from '../value-objects/start-date';
import { StartTime } from '../value-objects/start-time';

export interface InstantPolicy {
  readonly name: string;

  // Fails with InvalidStartDateError when the fields do not name a real moment
  compose(date: StartDate, time: StartTime): FieldResult<Date, InvalidStartDateError>;
}

const MIN_YEAR = 1;
const MAX_YEAR = 9999;

/**
 * Interprets the date and time in the time zone of the running process.
 *
 * Rejects dates that do not exist on the calendar (Feb 30, month 13) and
 * times outside 0:00-23:59 instead of letting them roll over. Seconds are
 * always zero. Years 1-99 stay in the first century.
 */
export class LocalTimeInstantPolicy implements InstantPolicy {
  readonly name = 'local-time';

  compose(date: StartDate, time: StartTime): FieldResult<Date, InvalidStartDateError> {
    const { year, month, day } = date;
    const { hour, minute } = time;

    // setFullYear, unlike the Date constructor, does not map 0-99 to 19xx
    const instant = new Date(0);
    instant.setFullYear(year, month - 1, day);
    const rolledOver =
      instant.getFullYear() !== year || instant.getMonth() !== month - 1 || instant.getDate() !== day;

    if (year < MIN_YEAR || year > MAX_YEAR || rolledOver) {
      return reject(new InvalidStartDateError(
        date.raw,
        'impossible',
        `"${date.raw}" is not a date on the calendar`
      ));
    }
    if (hour < 0 || hour > 23 || minute < 0 || minute > 59) {
      return reject(new InvalidStartDateError(
        date.raw,
        'impossible',
        `"${date.raw} ${time.raw}" is not a valid time of day`
      ));
    }

    instant.setHours(hour, minute, 0, 0);
    return accept(instant);
  }
}

// Whole seconds since the Unix epoch, sub-second part discarded
export function toEpochSeconds(instant: Date): number {
  return getUnixTime(instant);
}
