// CORE ABSTRACTIONS - Value Object pairing a repeat type with its parameter
// The parameter means nothing without the type: days mask, interval in days, or unused (0)

import { UnknownRepeatKeywordError } from '../errors/task-form.errors';
import { FieldResult, accept, reject } from './field-result';
import { RepeatType } from './repeat-type';

export const REPEAT_KEYWORDS = [
  'daily',
  'weekly',
  'weekdays',
  'biweekly',
  'once',
  'monthly',
  'four_weeks'
] as const;

export type RepeatKeyword = typeof REPEAT_KEYWORDS[number];

const WEEKDAY_MASK = /^[1-7]+$/;

export class RecurrenceRule {
  private constructor(
    public readonly type: RepeatType,
    public readonly parameter: number
  ) {}

  static noRepeat(): RecurrenceRule {
    return new RecurrenceRule(RepeatType.NO_REPEAT, 0);
  }

  static monthly(): RecurrenceRule {
    return new RecurrenceRule(RepeatType.MONTHLY, 0);
  }

  // Days are 1-7, encoded as concatenated digits: [1, 2, 3, 4, 5] -> 12345
  static specifiedDays(days: number[]): RecurrenceRule {
    const digits = days.join('');
    if (days.length === 0 || !WEEKDAY_MASK.test(digits) || new Set(days).size !== days.length) {
      throw new Error(`Invalid weekday set: [${days.join(', ')}]. Days must be distinct values 1-7`);
    }
    return new RecurrenceRule(RepeatType.SPECIFIED_DAYS, Number(digits));
  }

  static withInterval(days: number): RecurrenceRule {
    if (!Number.isInteger(days) || days < 1) {
      throw new Error(`Invalid repeat interval: ${days}. Interval must be a positive number of days`);
    }
    return new RecurrenceRule(RepeatType.WITH_INTERVAL, days);
  }

  static fromKeyword(raw: string | undefined): FieldResult<RecurrenceRule, UnknownRepeatKeywordError> {
    const keyword = REPEAT_KEYWORDS.find(k => k === raw);
    if (keyword === undefined) {
      return reject(new UnknownRepeatKeywordError(raw, REPEAT_KEYWORDS));
    }
    return accept(KEYWORD_RULES[keyword]);
  }
}

const KEYWORD_RULES: Readonly<Record<RepeatKeyword, RecurrenceRule>> = {
  daily: RecurrenceRule.specifiedDays([1, 2, 3, 4, 5, 6, 7]),
  weekly: RecurrenceRule.withInterval(7),
  weekdays: RecurrenceRule.specifiedDays([1, 2, 3, 4, 5]),
  biweekly: RecurrenceRule.withInterval(14),
  once: RecurrenceRule.noRepeat(),
  monthly: RecurrenceRule.monthly(),
  four_weeks: RecurrenceRule.withInterval(7 * 4)
};
