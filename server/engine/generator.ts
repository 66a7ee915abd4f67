import {
  EntropySnapshot,
  Identity,
  PUZZLE_TYPE_SELECTORS,
  PuzzleInstance,
  PuzzleType,
} from '../../shared/schema';
import { deriveSolutionHash } from './commitment';
import { assertEntropySnapshot } from './entropy';
import { PuzzleError, PuzzleErrorCode, ValidationError } from './errors';
import { assertIdentity } from './identity';

export const MAX_DIFFICULTY = 255;

const SLOT_WINDOW = 1000n;
const TYPE_OFFSET = 100n;

export interface PuzzleRequest {
  requester: Identity;
  puzzle_type_selector: number;
  difficulty: number;
}

export interface PuzzleGeneratorOptions {
  max_difficulty?: number;
}

export function resolvePuzzleType(selector: number): PuzzleType {
  const puzzleType = Number.isInteger(selector) ? PUZZLE_TYPE_SELECTORS[selector] : undefined;
  if (!puzzleType) {
    throw new PuzzleError(PuzzleErrorCode.INVALID_PUZZLE_TYPE, { selector });
  }
  return puzzleType;
}

export function puzzleTypeSelector(puzzleType: PuzzleType): number {
  return PUZZLE_TYPE_SELECTORS.indexOf(puzzleType);
}

/**
 * ((slot mod 1000) + 1) * (difficulty + 1) + (selector + 1) * 100
 */
export function derivePuzzleNumber(slot: number, selector: number, difficulty: number): bigint {
  const base = ((BigInt(slot) % SLOT_WINDOW) + 1n) * (BigInt(difficulty) + 1n);
  return base + (BigInt(selector) + 1n) * TYPE_OFFSET;
}

export class PuzzleGenerator {
  private maxDifficulty: number;

  constructor(options: PuzzleGeneratorOptions = {}) {
    this.maxDifficulty = Math.min(options.max_difficulty ?? MAX_DIFFICULTY, MAX_DIFFICULTY);
  }

  generate(request: PuzzleRequest, entropy: EntropySnapshot): PuzzleInstance {
    assertIdentity(request.requester, 'requester');
    const puzzleType = resolvePuzzleType(request.puzzle_type_selector);
    this.assertDifficulty(request.difficulty);
    const { slot } = assertEntropySnapshot(entropy);

    const puzzleNumber = derivePuzzleNumber(slot, request.puzzle_type_selector, request.difficulty);

    return {
      puzzle_type: puzzleType,
      difficulty: request.difficulty,
      puzzle_number: puzzleNumber,
      solution_hash: deriveSolutionHash(puzzleNumber),
      mint_slot: slot,
      solved: false,
    };
  }

  private assertDifficulty(difficulty: number): void {
    if (!Number.isInteger(difficulty) || difficulty < 0 || difficulty > this.maxDifficulty) {
      throw new ValidationError(`difficulty must be an integer between 0 and ${this.maxDifficulty}`, {
        difficulty,
      });
    }
  }
}
