import { MalformedOperandsError } from '../errors.js';
import { fixed, VARIADIC } from '../operator.js';
import type { EagerOperator } from '../operator.js';
import { resolveVariable } from '../resolve.js';
import { toNumber } from '../value.js';
import type { Value } from '../value.js';

/** Names whose lookup gives null or "", in the order (and as often as) given. */
function missingNames(data: Value, names: Value[]): Value[] {
  return names.filter((name) => {
    const found = resolveVariable(data, name);
    return found === null || found === '';
  });
}

export const varOperator: EagerOperator = {
  name: 'var', category: 'data', mode: 'eager', arity: fixed(2),
  description: 'Look up a dotted path in the data; the optional second operand is the default',

  execute(args, scope) {
    const [path, fallback] = args;
    return resolveVariable(scope.data, path, fallback);
  },
};

export const missingOperator: EagerOperator = {
  name: 'missing', category: 'data', mode: 'eager', arity: VARIADIC,
  description: 'The listed variable names that are absent, null or empty',

  execute(args, scope) {
    const [first] = args;
    return missingNames(scope.data, Array.isArray(first) ? first : args);
  },
};

export const missingSomeOperator: EagerOperator = {
  name: 'missing_some', category: 'data', mode: 'eager', arity: fixed(2),
  description: 'Empty when at least N of the names are present, else the missing names',

  execute([need = null, names = null], scope) {
    if (!Array.isArray(names)) {
      throw new MalformedOperandsError('missing_some', 'expected [need, [names...]]');
    }
    const missing = missingNames(scope.data, names);
    return names.length - missing.length >= toNumber(need, 'missing_some') ? [] : missing;
  },
};
