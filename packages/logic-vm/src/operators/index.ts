import type { OperatorDefinition } from '../operator.js';
import { OperatorRegistry } from '../registry.js';
import {
  addOperator,
  divideOperator,
  maxOperator,
  minOperator,
  moduloOperator,
  multiplyOperator,
  subtractOperator,
} from './arithmetic.js';
import { allOperator, filterOperator, mapOperator, noneOperator, reduceOperator, someOperator } from './array.js';
import {
  equalsOperator,
  greaterOrEqualOperator,
  greaterThanOperator,
  lessOrEqualOperator,
  lessThanOperator,
  notEqualsOperator,
  strictEqualsOperator,
  strictNotEqualsOperator,
} from './comparison.js';
import { ifOperator, ternaryOperator } from './control.js';
import { missingOperator, missingSomeOperator, varOperator } from './data.js';
import { logOperator } from './diagnostic.js';
import { andOperator, doubleNotOperator, notOperator, orOperator } from './logic.js';
import { catOperator, inOperator, mergeOperator, substrOperator } from './string.js';
import { dateOperator, datetimeOperator, relativeDeltaOperator, todayOperator } from './temporal.js';

export const BUILTIN_OPERATORS = [
  '==', '===', '!=', '!==', '>', '>=', '<', '<=',
  '!', '!!', 'and', 'or',
  '+', '-', '*', '/', '%', 'min', 'max',
  'if', '?:',
  'in', 'cat', 'substr', 'merge',
  'var', 'missing', 'missing_some',
  'map', 'filter', 'reduce', 'all', 'some', 'none',
  'today', 'date', 'datetime', 'rdelta',
  'log',
] as const;

export type BuiltinOperatorName = (typeof BUILTIN_OPERATORS)[number];

const builtins = {
  '==': equalsOperator,
  '===': strictEqualsOperator,
  '!=': notEqualsOperator,
  '!==': strictNotEqualsOperator,
  '>': greaterThanOperator,
  '>=': greaterOrEqualOperator,
  '<': lessThanOperator,
  '<=': lessOrEqualOperator,
  '!': notOperator,
  '!!': doubleNotOperator,
  and: andOperator,
  or: orOperator,
  '+': addOperator,
  '-': subtractOperator,
  '*': multiplyOperator,
  '/': divideOperator,
  '%': moduloOperator,
  min: minOperator,
  max: maxOperator,
  if: ifOperator,
  '?:': ternaryOperator,
  in: inOperator,
  cat: catOperator,
  substr: substrOperator,
  merge: mergeOperator,
  var: varOperator,
  missing: missingOperator,
  missing_some: missingSomeOperator,
  map: mapOperator,
  filter: filterOperator,
  reduce: reduceOperator,
  all: allOperator,
  some: someOperator,
  none: noneOperator,
  today: todayOperator,
  date: dateOperator,
  datetime: datetimeOperator,
  rdelta: relativeDeltaOperator,
  log: logOperator,
} satisfies Record<BuiltinOperatorName, OperatorDefinition>;

export function createDefaultRegistry(): OperatorRegistry {
  return new OperatorRegistry(BUILTIN_OPERATORS.map((name) => builtins[name]));
}

let shared: OperatorRegistry | undefined;

/** Process-wide read-only registry of the built-ins. */
export function defaultRegistry(): OperatorRegistry {
  shared ??= createDefaultRegistry().freeze();
  return shared;
}
