import { z } from 'zod';

export type TraceStatus = 'success' | 'error';

export interface ExecutionTrace {
  operator: string;
  operands: unknown;
  output: unknown;
  duration_ms: number;
  execution_path: string;
  status: TraceStatus;
  child_traces?: ExecutionTrace[];
  error?: { code: string; message: string };
}

export const ExecutionTraceSchema: z.ZodType<ExecutionTrace> = z.lazy(() =>
  z.object({
    operator: z.string(),
    operands: z.unknown(),
    output: z.unknown(),
    duration_ms: z.number(),
    execution_path: z.string(),
    status: z.enum(['success', 'error']),
    child_traces: z.array(ExecutionTraceSchema).optional(),
    error: z.object({
      code: z.string(),
      message: z.string(),
    }).optional(),
  })
);
