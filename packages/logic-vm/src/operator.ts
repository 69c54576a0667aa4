import type { JsonValue, OperatorArity, OperatorCategory } from '@rulelogic/types';
import type { DateProvider } from './dates.js';
import type { Logger } from './logger.js';
import type { Value } from './value.js';

/** What an operator can see besides its operands. */
export interface OperatorScope {
  readonly data: Value;
  readonly dates: DateProvider;
  readonly logger: Logger;
  readonly path: string;
}

/**
 * Evaluate an operand node. Without `data` the node sees the operator's own
 * context; passing `data` narrows it (array operators, `reduce`).
 */
export type EvaluateFn = (node: JsonValue, data?: Value) => Value;

interface OperatorBase {
  readonly name: string;
  readonly category: OperatorCategory;
  readonly description: string;
  readonly arity: OperatorArity;
}

/** Receives operands already evaluated against the current context. */
export interface EagerOperator extends OperatorBase {
  readonly mode: 'eager';
  execute(args: Value[], scope: OperatorScope): Value;
}

/** Receives raw operand nodes and decides when, and against what, to evaluate them. */
export interface LazyOperator extends OperatorBase {
  readonly mode: 'lazy';
  execute(operands: JsonValue[], scope: OperatorScope, evaluate: EvaluateFn): Value;
}

export type OperatorDefinition = EagerOperator | LazyOperator;

/** Plain function form accepted by `OperatorRegistry.add`. */
export type OperatorFn = (...args: Value[]) => Value;

export const VARIADIC: OperatorArity = { kind: 'variadic' };

export function fixed(count: number): OperatorArity {
  return { kind: 'fixed', count };
}

/** Operand `index`, or `null` when the rule left it out. */
export function operandAt(operands: JsonValue[], index: number): JsonValue {
  return index < operands.length ? operands[index] : null;
}
