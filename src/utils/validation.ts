import type { JsonRecord, JsonValue } from '../types';
import { ValidationError } from './errors';

export { ValidationError } from './errors';

/** Characters that would corrupt a composite `index` or `path` key. */
const KEY_SEPARATORS = /[/:#]/;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) return true;
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      if (Array.isArray(value)) return value.every(isJsonValue);
      return isRecord(value) && Object.values(value).every(isJsonValue);
    default:
      return false;
  }
}

/**
 * Validates a string is non-empty.
 */
export function validateString(value: unknown, fieldName: string): string {
  if (typeof value !== 'string' || value.length === 0) {
    throw new ValidationError(`${fieldName} must be a non-empty string`);
  }
  return value;
}

export function validateOptionalString(value: unknown, fieldName: string): string | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== 'string') {
    throw new ValidationError(`${fieldName} must be a string`);
  }
  return value;
}

/**
 * Validates one segment of a composite key (portfolio, org, ring, id).
 */
export function validateKeySegment(value: unknown, fieldName: string): string {
  const s = validateString(value, fieldName);
  if (KEY_SEPARATORS.test(s)) {
    throw new ValidationError(`${fieldName} must not contain '/', ':' or '#'`);
  }
  return s;
}

/**
 * Validates a number is a positive integer.
 */
export function validatePositiveInt(value: unknown, fieldName: string): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
    throw new ValidationError(`${fieldName} must be a positive integer`);
  }
  return value;
}

/**
 * Validates a value is a boolean.
 */
export function validateBoolean(value: unknown, fieldName: string): boolean {
  if (typeof value !== 'boolean') {
    throw new ValidationError(`${fieldName} must be a boolean`);
  }
  return value;
}

/**
 * Validates a value is an array.
 */
export function validateArray(value: unknown, fieldName: string): unknown[] {
  if (!Array.isArray(value)) {
    throw new ValidationError(`${fieldName} must be an array`);
  }
  return value;
}

/**
 * Validates a value matches one of the allowed literal values.
 */
export function validateLiteral<T extends string>(value: unknown, fieldName: string, allowed: readonly T[]): T {
  const match = allowed.find((a) => a === value);
  if (match === undefined) {
    throw new ValidationError(`${fieldName} must be one of: ${allowed.join(', ')}`);
  }
  return match;
}

export function validateJsonValue(value: unknown, fieldName: string): JsonValue {
  if (!isJsonValue(value)) {
    throw new ValidationError(`${fieldName} must be JSON-serializable`);
  }
  return value;
}

/**
 * Validates a plain object whose values are all JSON-serializable.
 */
export function validateJsonRecord(value: unknown, fieldName: string): JsonRecord {
  if (!isRecord(value)) {
    throw new ValidationError(`${fieldName} must be an object`);
  }
  const out: JsonRecord = {};
  for (const [k, v] of Object.entries(value)) {
    out[k] = validateJsonValue(v, `${fieldName}.${k}`);
  }
  return out;
}
