export const U64_MAX = (1n << 64n) - 1n;
export const COMMITMENT_ROUNDS = 3;

const COMMITMENT_MULTIPLIER = 31n;
const COMMITMENT_INCREMENT = 17n;

export function isU64(value: bigint): boolean {
  return value >= 0n && value <= U64_MAX;
}

/**
 * Three rounds of x ↦ x * 31 + 17 in wrapping u64 arithmetic, rendered as
 * lowercase hex without padding. The step is a bijection on u64, so every
 * commitment has exactly one preimage.
 */
export function deriveSolutionHash(value: bigint): string {
  let hashValue = BigInt.asUintN(64, value);
  for (let round = 0; round < COMMITMENT_ROUNDS; round += 1) {
    hashValue = BigInt.asUintN(64, hashValue * COMMITMENT_MULTIPLIER + COMMITMENT_INCREMENT);
  }
  return hashValue.toString(16);
}
