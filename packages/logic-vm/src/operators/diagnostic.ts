import { fixed } from '../operator.js';
import type { EagerOperator } from '../operator.js';
import { toText } from '../value.js';

export const logOperator: EagerOperator = {
  name: 'log', category: 'diagnostic', mode: 'eager', arity: fixed(1),
  description: 'Write the operand to the logger and return it unchanged',

  execute([value = null], scope) {
    scope.logger.info(toText(value));
    return value;
  },
};
