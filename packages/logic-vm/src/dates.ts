import type { RelativeDelta } from '@rulelogic/types';
import { DateParseError } from './errors.js';
import { CalendarDate, CalendarDateTime, DAY_MS } from './temporal.js';
import type { TemporalValue } from './temporal.js';

/**
 * The calendar collaborator behind `date`, `datetime`, `today` and date
 * arithmetic. The evaluator never does calendar math itself.
 */
export interface DateProvider {
  parseDate(input: string | TemporalValue): CalendarDate;
  parseDatetime(input: string | TemporalValue): CalendarDateTime;
  now(): CalendarDate;
  addDelta(value: TemporalValue, delta: RelativeDelta): TemporalValue;
}

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const DATETIME_PATTERN = /^(\d{4}-\d{2}-\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})?)?$/;

// Date.UTC maps years 0-99 onto 1900-1999, so set the year separately.
function utc(year: number, month: number, day: number, time = 0): number {
  const d = new Date(0);
  d.setUTCFullYear(year, month, day);
  return d.getTime() + time;
}

function daysInMonth(year: number, month: number): number {
  return new Date(utc(year, month + 1, 0)).getUTCDate();
}

function parseCalendarDate(input: string): number {
  const m = DATE_PATTERN.exec(input);
  if (!m) throw new DateParseError(input, 'expected YYYY-MM-DD');
  const year = Number(m[1]);
  const month = Number(m[2]) - 1;
  const day = Number(m[3]);
  if (month < 0 || month > 11 || day < 1 || day > daysInMonth(year, month)) {
    throw new DateParseError(input, 'not a calendar date');
  }
  return utc(year, month, day);
}

function startOfDay(epochMs: number): number {
  return epochMs - (((epochMs % DAY_MS) + DAY_MS) % DAY_MS);
}

/** Default provider on the runtime's Date, computing in UTC. */
export const systemDateProvider: DateProvider = {
  parseDate(input) {
    if (input instanceof CalendarDate) return input;
    if (input instanceof CalendarDateTime) return new CalendarDate(startOfDay(input.epochMs));
    return new CalendarDate(parseCalendarDate(input.trim()));
  },

  parseDatetime(input) {
    if (input instanceof CalendarDateTime) return input;
    if (input instanceof CalendarDate) return new CalendarDateTime(input.epochMs);
    const text = input.trim();
    const m = DATETIME_PATTERN.exec(text);
    if (!m) throw new DateParseError(input, 'expected an ISO-8601 datetime');
    const [, datePart, hh = '00', mm = '00', ss = '00', fraction = '', zone = 'Z'] = m;
    parseCalendarDate(datePart);
    const offset = zone === 'Z' ? zone : `${zone.slice(0, 3)}:${zone.slice(-2)}`;
    const epochMs = Date.parse(`${datePart}T${hh}:${mm}:${ss}${fraction.slice(0, 4)}${offset}`);
    if (Number.isNaN(epochMs)) throw new DateParseError(input, 'time of day out of range');
    return new CalendarDateTime(epochMs);
  },

  now() {
    return new CalendarDate(startOfDay(Date.now()));
  },

  addDelta(value, delta) {
    const d = new Date(value.epochMs);
    const totalMonths = d.getUTCFullYear() * 12 + d.getUTCMonth() + (delta.years ?? 0) * 12 + (delta.months ?? 0);
    const year = Math.floor(totalMonths / 12);
    const month = totalMonths - year * 12;
    const day = Math.min(d.getUTCDate(), daysInMonth(year, month));
    const shifted = utc(year, month, day, value.epochMs - startOfDay(value.epochMs)) + (delta.days ?? 0) * DAY_MS;
    return value.kind === 'date' ? new CalendarDate(shifted) : new CalendarDateTime(shifted);
  },
};
