import type { JsonValue } from '../domain/index.js';
import { SerializationError } from './errors.js';

/**
 * Normalizes an arbitrary value into a JSON-compatible shape.
 *
 * Variants, checked in order:
 * - primitives pass through; `undefined` becomes `null`, non-finite
 *   numbers and `bigint`/`symbol`/`function` become their string form
 * - `Date` becomes an ISO-8601 string
 * - arrays and sets recurse over their elements
 * - maps and plain objects recurse over their values
 * - objects declaring `toJSON()` are normalized through it
 * - other instances recurse over their own enumerable fields, or fall
 *   back to `String(value)` when they have none
 *
 * Throws `SerializationError` for cyclic structures and failing
 * `toJSON()` accessors.
 */
export function normalizeValue(value: unknown): JsonValue {
  return normalize(value, new WeakSet<object>());
}

function normalize(value: unknown, seen: WeakSet<object>): JsonValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'boolean') return value;
  if (typeof value === 'number') return Number.isFinite(value) ? value : String(value);
  if (typeof value !== 'object') return String(value);

  if (value instanceof Date) {
    return Number.isFinite(value.getTime()) ? value.toISOString() : String(value);
  }

  if (seen.has(value)) {
    throw new SerializationError('Cannot normalize a circular structure');
  }

  // Only ancestors count as cycles; shared references are fine
  seen.add(value);
  try {
    if (Array.isArray(value)) {
      return value.map((item: unknown) => normalize(item, seen));
    }
    if (value instanceof Set) {
      return [...value].map((item: unknown) => normalize(item, seen));
    }
    if (value instanceof Map) {
      const out: { [key: string]: JsonValue } = {};
      for (const [key, item] of value) {
        out[String(key)] = normalize(item, seen);
      }
      return out;
    }
    if ('toJSON' in value && typeof value.toJSON === 'function') {
      let declared: unknown;
      try {
        declared = value.toJSON();
      } catch (err: unknown) {
        throw new SerializationError('toJSON() failed', { cause: err });
      }
      return normalize(declared, seen);
    }

    const entries = Object.entries(value);
    if (entries.length === 0 && !isPlainObject(value)) {
      return String(value);
    }

    const out: { [key: string]: JsonValue } = {};
    for (const [key, item] of entries) {
      out[key] = normalize(item, seen);
    }
    return out;
  } finally {
    seen.delete(value);
  }
}

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}
