// Evaluation error types

import type { ExecutionTrace } from '@rulelogic/types';

/**
 * Base class for everything the engine raises on purpose.
 * `path` is the execution path of the node that failed, filled in by the
 * evaluator on the way out; `traces` is set by `evaluateWithTrace`.
 */
export class LogicError extends Error {
  readonly code: string;
  path?: string;
  traces?: ExecutionTrace[];

  constructor(code: string, message: string, options?: { path?: string }) {
    super(message);
    this.name = 'LogicError';
    this.code = code;
    this.path = options?.path;
  }
}

/**
 * A rule names an operator the registry does not hold.
 */
export class UnrecognizedOperatorError extends LogicError {
  readonly operator: string;

  constructor(operator: string, path?: string) {
    super('UNRECOGNIZED_OPERATOR', `Unrecognized operation ${JSON.stringify(operator)}`, { path });
    this.name = 'UnrecognizedOperatorError';
    this.operator = operator;
  }
}

/**
 * An operator received operands it cannot coerce.
 */
export class MalformedOperandsError extends LogicError {
  readonly operator: string;

  constructor(operator: string, reason: string) {
    super('MALFORMED_OPERANDS', `${operator}: ${reason}`);
    this.name = 'MalformedOperandsError';
    this.operator = operator;
  }
}

export type EvaluationLimit = 'depth' | 'timeout';

/**
 * A host-imposed guard (nesting depth or wall-clock budget) was exceeded.
 */
export class EvaluationLimitError extends LogicError {
  readonly limit: EvaluationLimit;

  constructor(limit: EvaluationLimit, message: string, path?: string) {
    super('EVALUATION_LIMIT', message, { path });
    this.name = 'EvaluationLimitError';
    this.limit = limit;
  }
}

export class DateParseError extends LogicError {
  readonly input: string;

  constructor(input: string, reason: string) {
    super('DATE_PARSE', `Cannot parse ${JSON.stringify(input)}: ${reason}`);
    this.name = 'DateParseError';
    this.input = input;
  }
}

export class RegistryFrozenError extends LogicError {
  constructor(operation: string) {
    super('REGISTRY_FROZEN', `Cannot ${operation}: registry is frozen`);
    this.name = 'RegistryFrozenError';
  }
}
