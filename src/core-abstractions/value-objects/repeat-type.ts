// CORE ABSTRACTIONS - Value Object for how a task repeats
// Ordinals are part of the wire contract with the task-tracking API

export class RepeatType {
  private constructor(
    public readonly value: string,
    public readonly ordinal: number
  ) {}

  static readonly NO_REPEAT = new RepeatType('no_repeat', 0);
  static readonly MONTHLY = new RepeatType('monthly', 1);
  // Reserved: understood by the API, but no form keyword produces it
  static readonly MONTHLY_DAY = new RepeatType('monthly_day', 2);
  static readonly SPECIFIED_DAYS = new RepeatType('specified_days', 3);
  static readonly WITH_INTERVAL = new RepeatType('with_interval', 4);
}
