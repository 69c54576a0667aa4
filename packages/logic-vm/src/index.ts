export { evaluate, evaluateWithTrace } from './evaluator.js';
export type { EvaluateOptions, TracedEvaluation } from './evaluator.js';
export { OperatorRegistry } from './registry.js';
export { BUILTIN_OPERATORS, createDefaultRegistry, defaultRegistry } from './operators/index.js';
export type { BuiltinOperatorName } from './operators/index.js';
export { VARIADIC, fixed, operandAt } from './operator.js';
export type {
  EagerOperator,
  EvaluateFn,
  LazyOperator,
  OperatorDefinition,
  OperatorFn,
  OperatorScope,
} from './operator.js';
export { LogicEngine } from './engine.js';
export type { LogicEngineOptions } from './engine.js';
export { validateRule } from './validator.js';
export type { ValidateOptions } from './validator.js';
export { OperationNode, formatTree, toOperationTree } from './tree.js';
export type { TreeNode } from './tree.js';
export { Simulator, loadSuite } from './simulator.js';
export type { CaseResult, SimulatorReport } from './simulator.js';
export { isLogic, splitLogic } from './rule.js';
export { getNestedValue, resolveVariable } from './resolve.js';
export {
  compare,
  isValueObject,
  kindOf,
  softEquals,
  strictEquals,
  toNumber,
  toText,
  truthy,
  tryToNumber,
} from './value.js';
export type { Ordering, Value, ValueKind, ValueObject } from './value.js';
export { CalendarDate, CalendarDateTime, isTemporal } from './temporal.js';
export type { TemporalValue } from './temporal.js';
export { systemDateProvider } from './dates.js';
export type { DateProvider } from './dates.js';
export {
  DateParseError,
  EvaluationLimitError,
  LogicError,
  MalformedOperandsError,
  RegistryFrozenError,
  UnrecognizedOperatorError,
} from './errors.js';
export type { EvaluationLimit } from './errors.js';
export { consoleLogger, createConsoleLogger, silentLogger, LogLevelSchema } from './logger.js';
export type { LogLevel, Logger } from './logger.js';
export { loadConfig } from './config.js';
export type { EngineConfig } from './config.js';
