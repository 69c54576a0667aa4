import { z } from 'zod';

export const OperatorCategorySchema = z.enum([
  'comparison',
  'logic',
  'arithmetic',
  'control',
  'string',
  'array',
  'data',
  'temporal',
  'diagnostic',
  'custom',
]);
export type OperatorCategory = z.infer<typeof OperatorCategorySchema>;

export const EvaluationModeSchema = z.enum(['eager', 'lazy']);
export type EvaluationMode = z.infer<typeof EvaluationModeSchema>;

export const OperatorAritySchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('fixed'), count: z.number().int().nonnegative() }),
  z.object({ kind: z.literal('variadic') }),
]);
export type OperatorArity = z.infer<typeof OperatorAritySchema>;

export const OperatorMetadataSchema = z.object({
  name: z.string().min(1),
  category: OperatorCategorySchema,
  description: z.string(),
  mode: EvaluationModeSchema,
  arity: OperatorAritySchema,
  builtin: z.boolean(),
});
export type OperatorMetadata = z.infer<typeof OperatorMetadataSchema>;
