import type { ExecutionTrace, TraceStatus } from '@rulelogic/types';

export function makeTrace(opts: {
  operator: string;
  operands: unknown;
  output: unknown;
  duration_ms: number;
  execution_path: string;
  status: TraceStatus;
  child_traces?: ExecutionTrace[];
  error?: { code: string; message: string };
}): ExecutionTrace {
  return {
    operator: opts.operator,
    operands: opts.operands,
    output: opts.output,
    duration_ms: opts.duration_ms,
    execution_path: opts.execution_path,
    status: opts.status,
    ...(opts.child_traces && opts.child_traces.length > 0 ? { child_traces: opts.child_traces } : {}),
    ...(opts.error ? { error: opts.error } : {}),
  };
}

/** Measure execution duration in ms using performance.now() if available, Date.now() otherwise. */
export function now(): number {
  if (typeof performance !== 'undefined' && performance.now) {
    return performance.now();
  }
  return Date.now();
}
