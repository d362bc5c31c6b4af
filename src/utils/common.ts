import { createHash } from 'node:crypto';
import type { JsonRecord } from '../types';
import { ValidationError } from './errors';
import { isRecord, validateJsonRecord } from './validation';

/**
 * Decode the payload of a JWT. The signature is NOT verified; callers must only use
 * tokens that an upstream authorizer has already checked.
 */
export function decodeJwt(token: string): JsonRecord {
  const parts = token.split('.');
  const payload = parts[1];
  if (parts.length !== 3 || !payload) {
    throw new ValidationError('Token must have three dot-separated segments');
  }

  let decoded: unknown;
  try {
    decoded = JSON.parse(Buffer.from(payload, 'base64url').toString('utf8'));
  } catch {
    throw new ValidationError('Token payload is not valid JSON');
  }
  if (!isRecord(decoded)) {
    throw new ValidationError('Token payload must be an object');
  }
  return validateJsonRecord(decoded, 'Token payload');
}

/**
 * Local part of an email address with every non-alphanumeric character removed.
 *
 * @example
 * getUsernameFromEmail('jane.doe+test@example.com'); // 'janedoetest'
 */
export function getUsernameFromEmail(email: string): string {
  const local = email.split('@')[0] ?? '';
  return local.replace(/[^a-zA-Z0-9]/g, '');
}

/** First `digits` hex characters of the MD5 of `input`. */
export function createMd5Hash(input: string, digits: number): string {
  return createHash('md5').update(input, 'utf8').digest('hex').slice(0, digits);
}
