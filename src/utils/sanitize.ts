import { DateTime } from 'luxon';
import type { JsonRecord, JsonValue } from '../types';
import { isRecord } from './validation';

function droppable(value: unknown): boolean {
  return value === undefined || typeof value === 'function' || typeof value === 'symbol';
}

/**
 * Deep copy of `value` that is safe to store as JSON.
 *
 * - `bigint` becomes a number, `Date` and luxon `DateTime` become UTC ISO strings
 * - non-finite numbers and invalid dates become `null`
 * - `undefined`, functions and symbols are dropped from objects and become `null` in arrays
 */
export function sanitize(value: unknown): JsonValue {
  if (value === null || droppable(value)) return null;
  if (typeof value === 'string' || typeof value === 'boolean') return value;
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'bigint') return Number(value);
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? null : value.toISOString();
  if (DateTime.isDateTime(value)) return value.isValid ? value.toUTC().toISO() : null;
  if (Array.isArray(value)) return value.map((v) => sanitize(v));
  if (isRecord(value)) return sanitizeRecord(value);
  return null;
}

export function sanitizeRecord(value: Record<string, unknown>): JsonRecord {
  const out: JsonRecord = {};
  for (const [k, v] of Object.entries(value)) {
    if (droppable(v)) continue;
    out[k] = sanitize(v);
  }
  return out;
}
