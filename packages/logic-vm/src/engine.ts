import type { JsonValue, OperatorMetadata, RuleValidationResult } from '@rulelogic/types';
import { loadConfig } from './config.js';
import type { EngineConfig } from './config.js';
import type { DateProvider } from './dates.js';
import { evaluate, evaluateWithTrace } from './evaluator.js';
import type { EvaluateOptions, TracedEvaluation } from './evaluator.js';
import { consoleLogger, createConsoleLogger } from './logger.js';
import type { Logger } from './logger.js';
import type { OperatorDefinition, OperatorFn } from './operator.js';
import { defaultRegistry } from './operators/index.js';
import type { OperatorRegistry } from './registry.js';
import { validateRule } from './validator.js';
import type { Value } from './value.js';

export interface LogicEngineOptions extends EvaluateOptions {
  /** Registry to start from; the engine works on its own copy. */
  registry?: OperatorRegistry;
}

/**
 * Evaluation entry point that owns its operator registry. Operators added or
 * removed here are invisible to other engines and to the shared default.
 */
export class LogicEngine {
  private readonly registry: OperatorRegistry;
  private readonly options: EvaluateOptions;
  private readonly logger: Logger;

  constructor(options: LogicEngineOptions = {}) {
    const { registry = defaultRegistry(), ...evaluateOptions } = options;
    this.registry = registry.clone();
    this.options = evaluateOptions;
    this.logger = evaluateOptions.logger ?? consoleLogger;
  }

  static fromConfig(config: EngineConfig = loadConfig(), dates?: DateProvider): LogicEngine {
    return new LogicEngine({
      max_depth: config.max_depth,
      timeout_ms: config.timeout_ms,
      logger: createConsoleLogger(config.log_level),
      dates,
    });
  }

  evaluate(rule: JsonValue, data: Value = null): Value {
    return evaluate(rule, data, this.registry, this.options);
  }

  evaluateWithTrace(rule: JsonValue, data: Value = null): TracedEvaluation {
    return evaluateWithTrace(rule, data, this.registry, this.options);
  }

  validate(rule: JsonValue): RuleValidationResult {
    return validateRule(rule, this.registry, { max_depth: this.options.max_depth });
  }

  /**
   * Register an operator. A plain function becomes an eager, variadic
   * operator; a full definition is registered as given under `name`.
   */
  addOperator(name: string, operator: OperatorFn | OperatorDefinition): void {
    if (typeof operator === 'function') {
      this.registry.add(name, operator);
    } else {
      this.registry.register({ ...operator, name });
    }
    this.logger.debug(`Added operator ${name}`);
  }

  /** Remove an operator; a built-in it overrode comes back. */
  rmOperator(name: string): boolean {
    const removed = this.registry.unregister(name);
    if (removed) this.logger.debug(`Removed operator ${name}`);
    return removed;
  }

  operators(): OperatorMetadata[] {
    return this.registry.list();
  }
}
