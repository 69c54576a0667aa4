import { fixed, VARIADIC } from '../operator.js';
import type { EagerOperator } from '../operator.js';
import { strictEquals, toNumber, toText } from '../value.js';
import type { Value } from '../value.js';

export const inOperator: EagerOperator = {
  name: 'in', category: 'string', mode: 'eager', arity: fixed(2),
  description: 'Substring test on a string, membership test on an array',

  execute([needle = null, haystack = null]) {
    if (typeof haystack === 'string') {
      return typeof needle === 'string' || typeof needle === 'number'
        ? haystack.includes(toText(needle))
        : false;
    }
    if (Array.isArray(haystack)) return haystack.some((item) => strictEquals(item, needle));
    return false;
  },
};

export const catOperator: EagerOperator = {
  name: 'cat', category: 'string', mode: 'eager', arity: VARIADIC,
  description: 'Concatenate the text form of every operand',
  execute: (args) => args.map(toText).join(''),
};

/**
 * Works on code points. A negative start counts from the end; a negative
 * length stops that many characters before the end.
 */
export const substrOperator: EagerOperator = {
  name: 'substr', category: 'string', mode: 'eager', arity: fixed(3),
  description: 'Portion of a string from start, optionally limited by length',

  execute([source = null, start = null, length = null]) {
    const chars = Array.from(toText(source));
    const from = start === null ? 0 : Math.trunc(toNumber(start, 'substr'));
    const tail = chars.slice(from);
    if (length === null) return tail.join('');
    return tail.slice(0, Math.trunc(toNumber(length, 'substr'))).join('');
  },
};

export const mergeOperator: EagerOperator = {
  name: 'merge', category: 'array', mode: 'eager', arity: VARIADIC,
  description: 'Flatten the operands one level into a single array',
  execute: (args) => args.flatMap<Value>((arg) => (Array.isArray(arg) ? arg : [arg])),
};
