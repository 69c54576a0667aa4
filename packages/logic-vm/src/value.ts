import { MalformedOperandsError } from './errors.js';
import { isTemporal } from './temporal.js';
import type { TemporalValue } from './temporal.js';

/**
 * Everything a rule can evaluate to: the JSON value tree plus the opaque
 * temporal values the date operators produce.
 */
export type Value =
  | null
  | boolean
  | number
  | string
  | TemporalValue
  | Value[]
  | ValueObject;

export interface ValueObject {
  [key: string]: Value;
}

export type ValueKind =
  | 'null'
  | 'boolean'
  | 'number'
  | 'string'
  | 'array'
  | 'object'
  | 'date'
  | 'datetime';

export type Ordering = 'lt' | 'eq' | 'gt' | 'uncomparable';

export function isValueObject(value: Value | undefined): value is ValueObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !isTemporal(value);
}

export function kindOf(value: Value): ValueKind {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (isTemporal(value)) return value.kind;
  switch (typeof value) {
    case 'boolean': return 'boolean';
    case 'number': return 'number';
    case 'string': return 'string';
    default: return 'object';
  }
}

function isScalar(value: Value): value is boolean | number | string {
  return typeof value === 'boolean' || typeof value === 'number' || typeof value === 'string';
}

export function truthy(value: Value): boolean {
  switch (kindOf(value)) {
    case 'null': return false;
    case 'boolean': return value === true;
    case 'number': return value !== 0 && !Number.isNaN(value);
    case 'string': return value !== '';
    case 'array': return Array.isArray(value) && value.length > 0;
    case 'object': return isValueObject(value) && Object.keys(value).length > 0;
    case 'date':
    case 'datetime':
      return true;
  }
}

// Decimal literals only: optional sign, digits with an optional fraction,
// optional exponent. No hex, no Infinity, no grouping separators; literals
// that overflow a double are not numeric either.
const NUMERIC = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

/** Numeric coercion that reports failure as `undefined`. */
export function tryToNumber(value: Value | undefined): number | undefined {
  if (typeof value === 'number') return Number.isFinite(value) ? value : undefined;
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (typeof value === 'string') {
    const text = value.trim();
    if (!NUMERIC.test(text)) return undefined;
    const n = Number(text);
    return Number.isFinite(n) ? n : undefined;
  }
  return undefined;
}

export function toNumber(value: Value | undefined, operator = 'number'): number {
  const n = tryToNumber(value);
  if (n === undefined) {
    throw new MalformedOperandsError(operator, `cannot coerce ${describeValue(value ?? null)} to a number`);
  }
  return n;
}

/** Arithmetic results never carry a negative zero. */
export function normalizeNumber(n: number): number {
  return n === 0 ? 0 : n;
}

/** Arithmetic result: `null` when it overflowed or is not a number. */
export function numericResult(n: number): number | null {
  return Number.isFinite(n) ? normalizeNumber(n) : null;
}

export function toText(value: Value): string {
  if (value === null) return 'null';
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(normalizeNumber(value));
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  if (Array.isArray(value)) return value.map(toText).join(',');
  if (isTemporal(value)) return value.toString();
  return JSON.stringify(value);
}

export function strictEquals(a: Value, b: Value): boolean {
  if (a === null || b === null) return a === b;
  if (Array.isArray(a)) {
    return Array.isArray(b) && a.length === b.length && a.every((item, i) => strictEquals(item, b[i]));
  }
  if (isTemporal(a)) {
    return isTemporal(b) && a.kind === b.kind && a.epochMs === b.epochMs;
  }
  if (isValueObject(a)) {
    if (!isValueObject(b)) return false;
    const keys = Object.keys(a);
    if (keys.length !== Object.keys(b).length) return false;
    return keys.every(key => Object.prototype.hasOwnProperty.call(b, key) && strictEquals(a[key], b[key]));
  }
  return a === b;
}

/**
 * Equality with coercion between booleans, numbers and strings. Null,
 * containers and temporal values only equal their own kind.
 */
export function softEquals(a: Value, b: Value): boolean {
  if (kindOf(a) === kindOf(b)) return strictEquals(a, b);
  if (!isScalar(a) || !isScalar(b)) return false;
  const x = tryToNumber(a);
  const y = tryToNumber(b);
  return x !== undefined && y !== undefined && x === y;
}

function order(x: number | string, y: number | string): Ordering {
  if (x < y) return 'lt';
  if (x > y) return 'gt';
  return x === y ? 'eq' : 'uncomparable';
}

export function compare(a: Value, b: Value): Ordering {
  if (typeof a === 'string' && typeof b === 'string') return order(a, b);
  if (isTemporal(a) || isTemporal(b)) {
    return isTemporal(a) && isTemporal(b) ? order(a.epochMs, b.epochMs) : 'uncomparable';
  }
  if (!isScalar(a) || !isScalar(b)) return 'uncomparable';
  const x = tryToNumber(a);
  const y = tryToNumber(b);
  if (x === undefined || y === undefined) return 'uncomparable';
  return order(x, y);
}

export function describeValue(value: Value): string {
  const kind = kindOf(value);
  if (kind === 'null' || kind === 'array' || kind === 'object') return kind;
  return `${kind} ${kind === 'string' ? JSON.stringify(value) : toText(value)}`;
}
