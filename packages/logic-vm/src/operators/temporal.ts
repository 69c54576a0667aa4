import { MalformedOperandsError } from '../errors.js';
import { fixed } from '../operator.js';
import type { EagerOperator } from '../operator.js';
import { isTemporal } from '../temporal.js';
import type { TemporalValue } from '../temporal.js';
import { describeValue } from '../value.js';
import type { Value } from '../value.js';

function dateInput(operator: string, value: Value): string | TemporalValue {
  if (typeof value === 'string' || isTemporal(value)) return value;
  throw new MalformedOperandsError(operator, `expected a string or a date, got ${describeValue(value)}`);
}

function component(value: Value | undefined): number {
  if (value === undefined || value === null) return 0;
  if (typeof value === 'number' && Number.isInteger(value)) return value;
  throw new MalformedOperandsError('rdelta', `expected an integer, got ${describeValue(value)}`);
}

export const todayOperator: EagerOperator = {
  name: 'today', category: 'temporal', mode: 'eager', arity: fixed(0),
  description: 'The current date from the date provider',
  execute: (_args, scope) => scope.dates.now(),
};

export const dateOperator: EagerOperator = {
  name: 'date', category: 'temporal', mode: 'eager', arity: fixed(1),
  description: 'Parse a YYYY-MM-DD string into a date',
  execute: ([value = null], scope) => scope.dates.parseDate(dateInput('date', value)),
};

export const datetimeOperator: EagerOperator = {
  name: 'datetime', category: 'temporal', mode: 'eager', arity: fixed(1),
  description: 'Parse an ISO-8601 string into a datetime',
  execute: ([value = null], scope) => scope.dates.parseDatetime(dateInput('datetime', value)),
};

export const relativeDeltaOperator: EagerOperator = {
  name: 'rdelta', category: 'temporal', mode: 'eager', arity: fixed(3),
  description: 'Relative delta of years, months and days for date arithmetic',

  execute([years, months, days]) {
    return { years: component(years), months: component(months), days: component(days) };
  },
};
