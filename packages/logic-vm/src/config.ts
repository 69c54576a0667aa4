import { z } from 'zod';
import { LogLevelSchema } from './logger.js';
import type { LogLevel } from './logger.js';

export interface EngineConfig {
  max_depth?: number;
  timeout_ms?: number;
  log_level: LogLevel;
}

const EnvSchema = z.object({
  RULELOGIC_MAX_DEPTH: z.coerce.number().int().positive().optional(),
  RULELOGIC_TIMEOUT_MS: z.coerce.number().positive().optional(),
  RULELOGIC_LOG_LEVEL: LogLevelSchema.optional(),
});

export function loadConfig(env: Record<string, string | undefined> = process.env): EngineConfig {
  // Blank variables count as unset
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== ''),
  );
  const parsed = EnvSchema.parse(present);
  return {
    max_depth: parsed.RULELOGIC_MAX_DEPTH,
    timeout_ms: parsed.RULELOGIC_TIMEOUT_MS,
    log_level: parsed.RULELOGIC_LOG_LEVEL ?? 'info',
  };
}
