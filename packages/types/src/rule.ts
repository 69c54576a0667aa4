import { z } from 'zod';

export const RuleValidationErrorSchema = z.object({
  path: z.string(),
  error: z.string(),
  suggestion: z.string().optional(),
});
export type RuleValidationError = z.infer<typeof RuleValidationErrorSchema>;

export const RuleValidationResultSchema = z.object({
  valid: z.boolean(),
  errors: z.array(RuleValidationErrorSchema),
  operators_used: z.array(z.string()),
  variables_used: z.array(z.string()),
  estimated_complexity: z.number(),
});
export type RuleValidationResult = z.infer<typeof RuleValidationResultSchema>;
