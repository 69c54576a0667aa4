import type { JsonValue, RuleValidationError, RuleValidationResult } from '@rulelogic/types';
import type { OperatorRegistry } from './registry.js';
import { isLogic, splitLogic } from './rule.js';

export interface ValidateOptions {
  /** Deepest operator nesting accepted. Default: no limit. */
  max_depth?: number;
}

/**
 * Static check of a rule without evaluating it: every operator must be
 * registered and nesting must stay within `max_depth`. Also reports which
 * operators and literal `var` paths the rule uses.
 */
export function validateRule(
  rule: JsonValue,
  registry: OperatorRegistry,
  options: ValidateOptions = {},
): RuleValidationResult {
  const maxDepth = options.max_depth;
  const errors: RuleValidationError[] = [];
  const operatorsUsed = new Set<string>();
  const variablesUsed = new Set<string>();
  let complexity = 0;

  function walk(node: JsonValue, path: string, depth: number): void {
    if (Array.isArray(node)) {
      node.forEach((item, i) => walk(item, `${path}[${i}]`, depth));
      return;
    }
    if (!isLogic(node)) return;

    if (maxDepth !== undefined && depth > maxDepth) {
      errors.push({ path, error: `Maximum rule depth (${maxDepth}) exceeded` });
      return;
    }

    complexity++;
    const [operator, operands] = splitLogic(node);

    if (!registry.has(operator)) {
      const lower = operator.toLowerCase();
      errors.push({
        path,
        error: `Unknown operator: ${operator}`,
        ...(lower !== operator && registry.has(lower) ? { suggestion: `Did you mean "${lower}"?` } : {}),
      });
      return;
    }

    operatorsUsed.add(operator);
    if (operator === 'var') {
      const [reference] = operands;
      if ((typeof reference === 'string' && reference !== '') || typeof reference === 'number') {
        variablesUsed.add(String(reference));
      }
    }

    operands.forEach((operand, i) => walk(operand, `${path}.${operator}[${i}]`, depth + 1));
  }

  walk(rule, 'root', 0);

  return {
    valid: errors.length === 0,
    errors,
    operators_used: Array.from(operatorsUsed),
    variables_used: Array.from(variablesUsed),
    estimated_complexity: complexity,
  };
}
