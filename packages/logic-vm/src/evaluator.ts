import type { ExecutionTrace, JsonValue } from '@rulelogic/types';
import { systemDateProvider } from './dates.js';
import type { DateProvider } from './dates.js';
import { EvaluationLimitError, LogicError, UnrecognizedOperatorError } from './errors.js';
import { consoleLogger } from './logger.js';
import type { Logger } from './logger.js';
import type { EvaluateFn, OperatorScope } from './operator.js';
import { defaultRegistry } from './operators/index.js';
import type { OperatorRegistry } from './registry.js';
import { makeTrace, now } from './result.js';
import { isLogic, splitLogic } from './rule.js';
import type { Value } from './value.js';

export interface EvaluateOptions {
  /**
   * Maximum wall-clock milliseconds for the entire evaluation. Default: no limit.
   *
   * LIMITATION: Timeout is checked between operator invocations, not during them.
   * A custom operator that blocks the thread will not be interrupted; the check
   * catches runaway compositions (deep nesting, large map/reduce inputs).
   */
  timeout_ms?: number;
  /** Maximum operator nesting depth. Default: no limit. */
  max_depth?: number;
  dates?: DateProvider;
  logger?: Logger;
}

export interface TracedEvaluation {
  value: Value;
  /** One trace per top-level operator application. */
  traces: ExecutionTrace[];
}

interface Run {
  registry: OperatorRegistry;
  dates: DateProvider;
  logger: Logger;
  maxDepth?: number;
  deadline?: number;
}

function startRun(registry: OperatorRegistry, options: EvaluateOptions): Run {
  return {
    registry,
    dates: options.dates ?? systemDateProvider,
    logger: options.logger ?? consoleLogger,
    maxDepth: options.max_depth,
    deadline: options.timeout_ms != null ? now() + options.timeout_ms : undefined,
  };
}

/**
 * Evaluate `rule` against `data`. Pure: neither argument is mutated and the
 * same inputs always give the same result (date operators aside).
 */
export function evaluate(
  rule: JsonValue,
  data: Value = null,
  registry: OperatorRegistry = defaultRegistry(),
  options: EvaluateOptions = {},
): Value {
  return evalNode(rule, data, startRun(registry, options), 'root', 0);
}

/**
 * Same as `evaluate`, also recording an execution trace per operator
 * application. On failure the partial traces are attached to the thrown
 * LogicError.
 */
export function evaluateWithTrace(
  rule: JsonValue,
  data: Value = null,
  registry: OperatorRegistry = defaultRegistry(),
  options: EvaluateOptions = {},
): TracedEvaluation {
  const traces: ExecutionTrace[] = [];
  try {
    const value = evalNode(rule, data, startRun(registry, options), 'root', 0, traces);
    return { value, traces };
  } catch (err) {
    if (err instanceof LogicError) err.traces = traces;
    throw err;
  }
}

function checkDeadline(run: Run, path: string, phase: 'at' | 'after'): void {
  if (run.deadline != null && now() > run.deadline) {
    throw new EvaluationLimitError('timeout', `Evaluation timeout exceeded ${phase} ${path}`, path);
  }
}

function evalNode(
  node: JsonValue,
  data: Value,
  run: Run,
  path: string,
  depth: number,
  sink?: ExecutionTrace[],
): Value {
  if (Array.isArray(node)) {
    return node.map((item) => evalNode(item, data, run, path, depth, sink));
  }
  if (!isLogic(node)) return node;

  if (run.maxDepth !== undefined && depth > run.maxDepth) {
    throw new EvaluationLimitError('depth', `Maximum rule depth (${run.maxDepth}) exceeded`, path);
  }
  checkDeadline(run, path, 'at');

  const [operator, operands] = splitLogic(node);
  const nodePath = `${path} > ${operator}`;
  const definition = run.registry.get(operator);
  if (!definition) throw new UnrecognizedOperatorError(operator, nodePath);

  const start = now();
  const children: ExecutionTrace[] | undefined = sink ? [] : undefined;
  const args = definition.arity.kind === 'fixed' ? operands.slice(0, definition.arity.count) : operands;
  const scope: OperatorScope = { data, dates: run.dates, logger: run.logger, path: nodePath };
  const evaluateChild: EvaluateFn = (child, childData) =>
    evalNode(child, childData === undefined ? data : childData, run, nodePath, depth + 1, children);

  try {
    const output = definition.mode === 'eager'
      ? definition.execute(args.map((arg) => evaluateChild(arg)), scope)
      : definition.execute(args, scope, evaluateChild);

    checkDeadline(run, nodePath, 'after');

    sink?.push(makeTrace({
      operator,
      operands: args,
      output,
      duration_ms: now() - start,
      execution_path: nodePath,
      status: 'success',
      child_traces: children,
    }));
    return output;
  } catch (err) {
    if (err instanceof LogicError && err.path === undefined) err.path = nodePath;
    sink?.push(makeTrace({
      operator,
      operands: args,
      output: null,
      duration_ms: now() - start,
      execution_path: nodePath,
      status: 'error',
      child_traces: children,
      error: {
        code: err instanceof LogicError ? err.code : 'OPERATOR_THREW',
        message: err instanceof Error ? err.message : String(err),
      },
    }));
    throw err;
  }
}
