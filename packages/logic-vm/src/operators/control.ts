import type { JsonValue } from '@rulelogic/types';
import { fixed, VARIADIC } from '../operator.js';
import type { EvaluateFn, LazyOperator } from '../operator.js';
import { truthy } from '../value.js';
import type { Value } from '../value.js';

/**
 * Walk `[cond, then, cond, then, ..., else?]`: the branch after the first
 * truthy condition wins, a trailing odd operand is the else, otherwise null.
 * Only the conditions up to the winner and the winning branch are evaluated.
 */
function branch(operands: JsonValue[], evaluate: EvaluateFn): Value {
  for (let i = 0; i + 1 < operands.length; i += 2) {
    if (truthy(evaluate(operands[i]))) return evaluate(operands[i + 1]);
  }
  return operands.length % 2 === 1 ? evaluate(operands[operands.length - 1]) : null;
}

export const ifOperator: LazyOperator = {
  name: 'if', category: 'control', mode: 'lazy', arity: VARIADIC,
  description: 'if / else-if / else chain over condition-branch pairs',
  execute: (operands, _scope, evaluate) => branch(operands, evaluate),
};

export const ternaryOperator: LazyOperator = {
  name: '?:', category: 'control', mode: 'lazy', arity: fixed(3),
  description: 'Ternary: condition ? then : else',
  execute: (operands, _scope, evaluate) => branch(operands, evaluate),
};
