import type { JsonValue } from '@rulelogic/types';
import { fixed, operandAt } from '../operator.js';
import type { EvaluateFn, LazyOperator } from '../operator.js';
import { truthy } from '../value.js';
import type { Value } from '../value.js';

// The source is evaluated against the outer context; a non-array source
// counts as "no elements".
function source(operands: JsonValue[], evaluate: EvaluateFn): Value[] | undefined {
  const items = evaluate(operandAt(operands, 0));
  return Array.isArray(items) ? items : undefined;
}

export const mapOperator: LazyOperator = {
  name: 'map', category: 'array', mode: 'lazy', arity: fixed(2),
  description: 'Apply a sub-rule to every element',

  execute(operands, _scope, evaluate) {
    const items = source(operands, evaluate);
    if (!items) return [];
    const rule = operandAt(operands, 1);
    return items.map((item) => evaluate(rule, item));
  },
};

export const filterOperator: LazyOperator = {
  name: 'filter', category: 'array', mode: 'lazy', arity: fixed(2),
  description: 'Keep the elements for which a sub-rule is truthy',

  execute(operands, _scope, evaluate) {
    const items = source(operands, evaluate);
    if (!items) return [];
    const rule = operandAt(operands, 1);
    return items.filter((item) => truthy(evaluate(rule, item)));
  },
};

/**
 * Fold the elements through a sub-rule that sees `{current, accumulator}`.
 * The accumulator starts at the evaluated third operand, 0 when it is left out.
 */
export const reduceOperator: LazyOperator = {
  name: 'reduce', category: 'array', mode: 'lazy', arity: fixed(3),
  description: 'Fold the elements into one value via {current, accumulator}',

  execute(operands, _scope, evaluate) {
    const items = source(operands, evaluate);
    const initial = operands.length > 2 ? evaluate(operands[2]) : 0;
    if (!items) return initial;
    const rule = operandAt(operands, 1);
    return items.reduce<Value>(
      (accumulator, current) => evaluate(rule, { current, accumulator }),
      initial,
    );
  },
};

export const allOperator: LazyOperator = {
  name: 'all', category: 'array', mode: 'lazy', arity: fixed(2),
  description: 'True when the array is non-empty and the sub-rule holds for every element',

  execute(operands, _scope, evaluate) {
    const items = source(operands, evaluate);
    if (!items || items.length === 0) return false;
    const rule = operandAt(operands, 1);
    return items.every((item) => truthy(evaluate(rule, item)));
  },
};

export const someOperator: LazyOperator = {
  name: 'some', category: 'array', mode: 'lazy', arity: fixed(2),
  description: 'True when the sub-rule holds for at least one element',

  execute(operands, _scope, evaluate) {
    const items = source(operands, evaluate);
    if (!items) return false;
    const rule = operandAt(operands, 1);
    return items.some((item) => truthy(evaluate(rule, item)));
  },
};

export const noneOperator: LazyOperator = {
  name: 'none', category: 'array', mode: 'lazy', arity: fixed(2),
  description: 'True when the sub-rule holds for no element',

  execute(operands, _scope, evaluate) {
    const items = source(operands, evaluate);
    if (!items) return true;
    const rule = operandAt(operands, 1);
    return !items.some((item) => truthy(evaluate(rule, item)));
  },
};
