import { RelativeDeltaSchema } from '@rulelogic/types';
import type { RelativeDelta } from '@rulelogic/types';
import { MalformedOperandsError } from '../errors.js';
import { fixed, VARIADIC } from '../operator.js';
import type { EagerOperator, OperatorScope } from '../operator.js';
import { DAY_MS, isTemporal } from '../temporal.js';
import type { TemporalValue } from '../temporal.js';
import { describeValue, isValueObject, numericResult, toNumber } from '../value.js';
import type { Value } from '../value.js';

function asDelta(value: Value): RelativeDelta | undefined {
  if (!isValueObject(value)) return undefined;
  const parsed = RelativeDeltaSchema.safeParse(value);
  return parsed.success ? parsed.data : undefined;
}

function negate(delta: RelativeDelta): RelativeDelta {
  return { years: -(delta.years ?? 0), months: -(delta.months ?? 0), days: -(delta.days ?? 0) };
}

function shift(operator: string, base: TemporalValue, operand: Value, sign: 1 | -1, scope: OperatorScope): TemporalValue {
  const delta = asDelta(operand);
  if (!delta) {
    throw new MalformedOperandsError(operator, `cannot apply ${describeValue(operand)} to a ${base.kind}; expected {years, months, days}`);
  }
  return scope.dates.addDelta(base, sign === 1 ? delta : negate(delta));
}

export const addOperator: EagerOperator = {
  name: '+', category: 'arithmetic', mode: 'eager', arity: VARIADIC,
  description: 'Sum of the operands (a single operand is cast to a number); date + relative delta',

  execute(args, scope) {
    const base = args.find(isTemporal);
    if (base) {
      return args
        .filter((arg) => arg !== base)
        .reduce<TemporalValue>((date, arg) => shift('+', date, arg, 1, scope), base);
    }
    return numericResult(args.reduce<number>((sum, arg) => sum + toNumber(arg, '+'), 0));
  },
};

export const subtractOperator: EagerOperator = {
  name: '-', category: 'arithmetic', mode: 'eager', arity: fixed(2),
  description: 'A - B, or the negation of a single operand; date - delta, date - date in days',

  execute(args, scope) {
    const [a = null, b = null] = args;
    if (args.length < 2) return numericResult(-toNumber(a, '-'));
    if (isTemporal(a)) {
      if (isTemporal(b)) return numericResult((a.epochMs - b.epochMs) / DAY_MS);
      return shift('-', a, b, -1, scope);
    }
    return numericResult(toNumber(a, '-') - toNumber(b, '-'));
  },
};

export const multiplyOperator: EagerOperator = {
  name: '*', category: 'arithmetic', mode: 'eager', arity: VARIADIC,
  description: 'Product of the operands',
  execute: (args) => numericResult(args.reduce<number>((product, arg) => product * toNumber(arg, '*'), 1)),
};

export const divideOperator: EagerOperator = {
  name: '/', category: 'arithmetic', mode: 'eager', arity: fixed(2),
  description: 'A / B; null when B is zero',

  execute([a = null, b = null]) {
    const dividend = toNumber(a, '/');
    const divisor = toNumber(b, '/');
    return divisor === 0 ? null : numericResult(dividend / divisor);
  },
};

export const moduloOperator: EagerOperator = {
  name: '%', category: 'arithmetic', mode: 'eager', arity: fixed(2),
  description: 'Remainder of A / B taking the sign of B; null when B is zero',

  execute([a = null, b = null]) {
    const dividend = toNumber(a, '%');
    const divisor = toNumber(b, '%');
    if (divisor === 0) return null;
    return numericResult(((dividend % divisor) + divisor) % divisor);
  },
};

export const minOperator: EagerOperator = {
  name: 'min', category: 'arithmetic', mode: 'eager', arity: VARIADIC,
  description: 'Smallest operand; null without operands',
  execute: (args) => (args.length === 0 ? null : numericResult(Math.min(...args.map((arg) => toNumber(arg, 'min'))))),
};

export const maxOperator: EagerOperator = {
  name: 'max', category: 'arithmetic', mode: 'eager', arity: VARIADIC,
  description: 'Largest operand; null without operands',
  execute: (args) => (args.length === 0 ? null : numericResult(Math.max(...args.map((arg) => toNumber(arg, 'max'))))),
};
