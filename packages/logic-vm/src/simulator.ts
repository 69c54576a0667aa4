import { readFile } from 'fs/promises';
import { ConformanceSuiteSchema } from '@rulelogic/types';
import type { ConformanceSuite, JsonValue } from '@rulelogic/types';
import { evaluate } from './evaluator.js';
import type { EvaluateOptions } from './evaluator.js';
import type { OperatorRegistry } from './registry.js';
import { validateRule } from './validator.js';
import { isTemporal } from './temporal.js';
import { isValueObject, strictEquals } from './value.js';
import type { Value } from './value.js';

export interface CaseResult {
  /** Position of the case in the suite, section headers included. */
  index: number;
  /** Nearest preceding section header, if any. */
  section?: string;
  rule: JsonValue;
  data: JsonValue;
  expected: JsonValue;
  actual?: Value;
  error?: string;
  match: boolean;
}

export interface SimulatorReport {
  total: number;
  passed: number;
  failed: number;
  results: CaseResult[];
}

// Temporal values compare through their ISO text
function toPlain(value: Value): Value {
  if (isTemporal(value)) return value.toString();
  if (Array.isArray(value)) return value.map(toPlain);
  if (isValueObject(value)) {
    return Object.fromEntries(Object.entries(value).map(([key, item]) => [key, toPlain(item)]));
  }
  return value;
}

export class Simulator {
  constructor(
    private registry: OperatorRegistry,
    private options: EvaluateOptions = {},
  ) {}

  run(suite: ConformanceSuite): SimulatorReport {
    const results: CaseResult[] = [];
    let section: string | undefined;

    suite.forEach((entry, index) => {
      if (typeof entry === 'string') {
        section = entry;
        return;
      }
      const [rule, data, expected] = entry;
      results.push({ index, section, rule, data, expected, ...this.runCase(rule, data, expected) });
    });

    const passed = results.filter((r) => r.match).length;
    return { total: results.length, passed, failed: results.length - passed, results };
  }

  private runCase(rule: JsonValue, data: JsonValue, expected: JsonValue): Pick<CaseResult, 'actual' | 'error' | 'match'> {
    const v = validateRule(rule, this.registry, { max_depth: this.options.max_depth });
    if (!v.valid) {
      return { error: v.errors.map((e) => `${e.path}: ${e.error}`).join('; '), match: false };
    }
    try {
      const actual = evaluate(rule, data, this.registry, this.options);
      return { actual, match: strictEquals(toPlain(actual), expected) };
    } catch (err) {
      return { error: err instanceof Error ? err.message : String(err), match: false };
    }
  }
}

/** Read and validate a JSON conformance suite from disk. */
export async function loadSuite(path: string): Promise<ConformanceSuite> {
  const text = await readFile(path, 'utf-8');
  return ConformanceSuiteSchema.parse(JSON.parse(text));
}
