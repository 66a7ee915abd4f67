import { Identity } from '../../shared/schema';
import { ValidationError } from './errors';
import { hashObject } from './hash';

export const IDENTITY_BYTES = 32;

const IDENTITY_PATTERN = /^[0-9a-f]{64}$/;

export function isIdentity(value: unknown): value is Identity {
  return typeof value === 'string' && IDENTITY_PATTERN.test(value);
}

export function assertIdentity(value: unknown, field: string): Identity {
  if (!isIdentity(value)) {
    throw new ValidationError(`${field} must be a ${IDENTITY_BYTES}-byte hex identity`);
  }
  return value;
}

/**
 * Derives a stable identity from arbitrary seed material, the way program
 * addresses are derived from fixed seeds.
 */
export function deriveIdentity(seed: unknown): Identity {
  return hashObject(seed);
}
