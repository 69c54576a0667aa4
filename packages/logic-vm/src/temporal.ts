export const DAY_MS = 864e5;

/** A calendar date, held as UTC midnight. */
export class CalendarDate {
  readonly kind = 'date' as const;

  constructor(readonly epochMs: number) {}

  valueOf(): number {
    return this.epochMs;
  }

  toString(): string {
    return new Date(this.epochMs).toISOString().slice(0, 10);
  }

  toJSON(): string {
    return this.toString();
  }
}

export class CalendarDateTime {
  readonly kind = 'datetime' as const;

  constructor(readonly epochMs: number) {}

  valueOf(): number {
    return this.epochMs;
  }

  toString(): string {
    return new Date(this.epochMs).toISOString();
  }

  toJSON(): string {
    return this.toString();
  }
}

export type TemporalValue = CalendarDate | CalendarDateTime;

export function isTemporal(value: unknown): value is TemporalValue {
  return value instanceof CalendarDate || value instanceof CalendarDateTime;
}
