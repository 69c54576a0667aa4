import { isValueObject, toText } from './value.js';
import type { Value } from './value.js';

const INDEX = /^\d+$/;

/**
 * Walk a dot-separated path through arrays (by non-negative index) and objects
 * (by own key). Returns `undefined` when any step is missing.
 */
export function getNestedValue(data: Value, path: string): Value | undefined {
  let current: Value = data;
  for (const segment of path.split('.')) {
    if (Array.isArray(current)) {
      if (!INDEX.test(segment)) return undefined;
      const index = Number(segment);
      if (index >= current.length) return undefined;
      current = current[index];
    } else if (isValueObject(current)) {
      if (!Object.prototype.hasOwnProperty.call(current, segment)) return undefined;
      current = current[segment];
    } else {
      return undefined;
    }
  }
  return current;
}

/**
 * Resolve a `var` reference. An empty or absent path yields the whole
 * context; a missing or null result falls back to `fallback`.
 */
export function resolveVariable(data: Value, path: Value | undefined, fallback?: Value): Value {
  if (path === undefined || path === null || path === '') return data;
  const found = getNestedValue(data, toText(path));
  if (found === undefined || found === null) return fallback ?? null;
  return found;
}
