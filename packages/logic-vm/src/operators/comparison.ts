import { fixed } from '../operator.js';
import type { EagerOperator } from '../operator.js';
import { compare, softEquals, strictEquals } from '../value.js';
import type { Value } from '../value.js';

function lessThan(a: Value, b: Value): boolean {
  return compare(a, b) === 'lt';
}

function atMost(a: Value, b: Value): boolean {
  const ordering = compare(a, b);
  return ordering === 'lt' || ordering === 'eq';
}

export const equalsOperator: EagerOperator = {
  name: '==', category: 'comparison', mode: 'eager', arity: fixed(2),
  description: 'Equality with number/string/boolean coercion',
  execute: ([a = null, b = null]) => softEquals(a, b),
};

export const strictEqualsOperator: EagerOperator = {
  name: '===', category: 'comparison', mode: 'eager', arity: fixed(2),
  description: 'Equality of kind and value, no coercion',
  execute: ([a = null, b = null]) => strictEquals(a, b),
};

export const notEqualsOperator: EagerOperator = {
  name: '!=', category: 'comparison', mode: 'eager', arity: fixed(2),
  description: 'Negated coercing equality',
  execute: ([a = null, b = null]) => !softEquals(a, b),
};

export const strictNotEqualsOperator: EagerOperator = {
  name: '!==', category: 'comparison', mode: 'eager', arity: fixed(2),
  description: 'Negated strict equality',
  execute: ([a = null, b = null]) => !strictEquals(a, b),
};

export const greaterThanOperator: EagerOperator = {
  name: '>', category: 'comparison', mode: 'eager', arity: fixed(2),
  description: 'A > B; false when the operands cannot be ordered',
  execute: ([a = null, b = null]) => lessThan(b, a),
};

export const greaterOrEqualOperator: EagerOperator = {
  name: '>=', category: 'comparison', mode: 'eager', arity: fixed(2),
  description: 'A >= B; false when the operands cannot be ordered',
  execute: ([a = null, b = null]) => atMost(b, a),
};

export const lessThanOperator: EagerOperator = {
  name: '<', category: 'comparison', mode: 'eager', arity: fixed(3),
  description: 'A < B, or the exclusive range check A < B < C',
  execute(args) {
    const [a = null, b = null, c = null] = args;
    return lessThan(a, b) && (args.length < 3 || lessThan(b, c));
  },
};

export const lessOrEqualOperator: EagerOperator = {
  name: '<=', category: 'comparison', mode: 'eager', arity: fixed(3),
  description: 'A <= B, or the inclusive range check A <= B <= C',
  execute(args) {
    const [a = null, b = null, c = null] = args;
    return atMost(a, b) && (args.length < 3 || atMost(b, c));
  },
};
