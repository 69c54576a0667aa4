export {
  JsonPrimitiveSchema,
  JsonValueSchema,
  RelativeDeltaSchema,
  parseJsonValue,
} from './value.js';

export type {
  JsonPrimitive,
  JsonArray,
  JsonObject,
  JsonValue,
  RelativeDelta,
} from './value.js';

export {
  OperatorCategorySchema,
  EvaluationModeSchema,
  OperatorAritySchema,
  OperatorMetadataSchema,
} from './operator.js';

export type {
  OperatorCategory,
  EvaluationMode,
  OperatorArity,
  OperatorMetadata,
} from './operator.js';

export { RuleValidationErrorSchema, RuleValidationResultSchema } from './rule.js';
export type { RuleValidationError, RuleValidationResult } from './rule.js';

export { ExecutionTraceSchema } from './trace.js';
export type { ExecutionTrace, TraceStatus } from './trace.js';

export { ConformanceCaseSchema, ConformanceSuiteSchema } from './conformance.js';
export type { ConformanceCase, ConformanceSuite } from './conformance.js';
