import { PuzzleInstance, PuzzleType } from '../../shared/schema';
import { deriveSolutionHash, isU64 } from './commitment';
import { PuzzleError, PuzzleErrorCode } from './errors';

function verifyFactor(puzzleNumber: bigint, solution: bigint): boolean {
  // Trivial divisors (1 and the number itself) count.
  return solution > 0n && puzzleNumber % solution === 0n;
}

function verifyCommitment(solutionHash: string, solution: bigint): boolean {
  return deriveSolutionHash(solution) === solutionHash;
}

/**
 * Checks a candidate against the commitment stored at creation. A false
 * result means IncorrectSolution to the caller; nothing is mutated here.
 */
export function verifySolution(puzzle: PuzzleInstance, solution: bigint): boolean {
  if (!isU64(solution)) {
    return false;
  }

  const puzzleType: PuzzleType = puzzle.puzzle_type;
  switch (puzzleType) {
    case PuzzleType.MATH_FACTOR:
      return verifyFactor(puzzle.puzzle_number, solution);
    case PuzzleType.HASH_RIDDLE:
    case PuzzleType.PATTERN:
      return verifyCommitment(puzzle.solution_hash, solution);
    default: {
      const unknownType: never = puzzleType;
      throw new PuzzleError(PuzzleErrorCode.INVALID_PUZZLE_TYPE, { puzzle_type: unknownType });
    }
  }
}

/**
 * Positive divisors in ascending order.
 */
export function listDivisors(value: bigint): bigint[] {
  if (value < 1n) {
    return [];
  }
  const low: bigint[] = [];
  const high: bigint[] = [];
  for (let candidate = 1n; candidate * candidate <= value; candidate += 1n) {
    if (value % candidate === 0n) {
      low.push(candidate);
      const pair = value / candidate;
      if (pair !== candidate) {
        high.unshift(pair);
      }
    }
  }
  return [...low, ...high];
}
