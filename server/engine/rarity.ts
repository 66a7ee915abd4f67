import { Rarity } from '../../shared/schema';
import { ValidationError } from './errors';

export const RARITY_MODULUS = 100;

// Upper bounds (exclusive) on timestamp mod 100, checked in order.
export const RARITY_THRESHOLDS: ReadonlyArray<{ below: number; rarity: Rarity }> = [
  { below: 10, rarity: Rarity.LEGENDARY },
  { below: 30, rarity: Rarity.EPIC },
  { below: 60, rarity: Rarity.RARE },
];

/**
 * Buckets a solve by its timestamp. Whoever submits the solve can pick the
 * timestamp, so the tier is not adversarially secure.
 */
export function assignRarity(timestamp: number): Rarity {
  if (!Number.isSafeInteger(timestamp) || timestamp < 0) {
    throw new ValidationError('rarity timestamp must be a non-negative integer', { timestamp });
  }
  const bucket = timestamp % RARITY_MODULUS;
  const tier = RARITY_THRESHOLDS.find((threshold) => bucket < threshold.below);
  return tier?.rarity ?? Rarity.COMMON;
}
