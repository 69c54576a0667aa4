import type { JsonObject, JsonValue } from '@rulelogic/types';

/**
 * A logic entry is a plain object with exactly one key. Arrays of entries are
 * not entries themselves.
 */
export function isLogic(value: JsonValue): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && Object.keys(value).length === 1;
}

/**
 * Split a logic entry into its operator and operand list, turning the unary
 * shorthand `{"op": x}` into `{"op": [x]}`.
 */
export function splitLogic(entry: JsonObject): [operator: string, operands: JsonValue[]] {
  const operator = Object.keys(entry)[0];
  const raw = entry[operator];
  return [operator, Array.isArray(raw) ? raw : [raw]];
}
