import { fixed, VARIADIC } from '../operator.js';
import type { EagerOperator, LazyOperator } from '../operator.js';
import { truthy } from '../value.js';
import type { Value } from '../value.js';

export const notOperator: EagerOperator = {
  name: '!', category: 'logic', mode: 'eager', arity: fixed(1),
  description: 'Logical NOT of the operand\'s truthiness',
  execute: ([a = null]) => !truthy(a),
};

export const doubleNotOperator: EagerOperator = {
  name: '!!', category: 'logic', mode: 'eager', arity: fixed(1),
  description: 'Cast the operand to its truthiness',
  execute: ([a = null]) => truthy(a),
};

export const andOperator: LazyOperator = {
  name: 'and', category: 'logic', mode: 'lazy', arity: VARIADIC,
  description: 'Return the first falsy operand, or the last one; stops at the first falsy',

  execute(operands, _scope, evaluate) {
    let current: Value = false;
    for (const operand of operands) {
      current = evaluate(operand);
      if (!truthy(current)) return current;
    }
    return current;
  },
};

export const orOperator: LazyOperator = {
  name: 'or', category: 'logic', mode: 'lazy', arity: VARIADIC,
  description: 'Return the first truthy operand, or the last one; stops at the first truthy',

  execute(operands, _scope, evaluate) {
    let current: Value = false;
    for (const operand of operands) {
      current = evaluate(operand);
      if (truthy(current)) return current;
    }
    return current;
  },
};
