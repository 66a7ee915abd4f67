import {
  Attribute,
  AttributeList,
  PuzzleInstance,
  PuzzleSolveRecord,
  PuzzleType,
  Rarity,
} from '../../shared/schema';
import { isU64 } from './commitment';
import { PuzzleError, PuzzleErrorCode, ValidationError } from './errors';
import { MAX_DIFFICULTY } from './generator';
import { isIdentity } from './identity';

export const AttributeKey = {
  PUZZLE_TYPE: 'puzzle_type',
  DIFFICULTY: 'difficulty',
  PUZZLE_NUMBER: 'puzzle_number',
  SOLUTION_HASH: 'solution_hash',
  SOLVED: 'solved',
  MINT_SLOT: 'mint_slot',
  SOLVER: 'solver',
  SOLUTION: 'solution',
  SOLVE_TIMESTAMP: 'solve_timestamp',
  RARITY: 'rarity',
  HIDDEN_TRAIT: 'hidden_trait',
} as const;

/**
 * Keys owned by the puzzle schema. Everything else in an attribute list is
 * caller metadata and passes through untouched.
 */
export const PUZZLE_SCHEMA_KEYS: ReadonlySet<string> = new Set([
  AttributeKey.PUZZLE_TYPE,
  AttributeKey.DIFFICULTY,
  AttributeKey.PUZZLE_NUMBER,
  AttributeKey.SOLUTION_HASH,
  AttributeKey.SOLVED,
  AttributeKey.MINT_SLOT,
  AttributeKey.SOLVER,
  AttributeKey.SOLUTION,
  AttributeKey.SOLVE_TIMESTAMP,
  AttributeKey.RARITY,
]);

export interface DecodedAttributes {
  puzzle: PuzzleInstance;
  extras: AttributeList;
}

const DECIMAL_PATTERN = /^\d+$/;
const HEX_PATTERN = /^[0-9a-f]{1,16}$/;

function isAttribute(value: unknown): value is Attribute {
  if (!value || typeof value !== 'object' || !('key' in value) || !('value' in value)) {
    return false;
  }
  return typeof value.key === 'string' && typeof value.value === 'string';
}

export function assertAttributeList(value: unknown): AttributeList {
  if (!Array.isArray(value)) {
    throw new PuzzleError(PuzzleErrorCode.INVALID_ASSET_DATA, { reason: 'attributes must be a list' });
  }

  const seen = new Set<string>();
  const list: AttributeList = [];
  for (const entry of value) {
    if (!isAttribute(entry)) {
      throw new PuzzleError(PuzzleErrorCode.INVALID_ASSET_DATA, { reason: 'malformed attribute', entry });
    }
    if (seen.has(entry.key)) {
      throw new PuzzleError(PuzzleErrorCode.INVALID_ASSET_DATA, { reason: 'duplicate key', key: entry.key });
    }
    seen.add(entry.key);
    list.push({ key: entry.key, value: entry.value });
  }
  return list;
}

/**
 * Caller metadata travels beside the puzzle and may not claim a key the
 * puzzle schema owns, solved or not.
 */
export function assertMetadata(metadata: AttributeList): AttributeList {
  const list = assertAttributeList(metadata);
  const reserved = list.find((attribute) => PUZZLE_SCHEMA_KEYS.has(attribute.key));
  if (reserved) {
    throw new ValidationError(`metadata key is reserved for the puzzle: ${reserved.key}`, {
      key: reserved.key,
    });
  }
  return list;
}

export function findAttribute(list: AttributeList, key: string): string | undefined {
  return list.find((attribute) => attribute.key === key)?.value;
}

function parseFailure(key: string, value: string): PuzzleError {
  return new PuzzleError(PuzzleErrorCode.FAILED_TO_PARSE_PUZZLE_DATA, { key, value });
}

function parseU64(key: string, value: string): bigint {
  if (!DECIMAL_PATTERN.test(value)) {
    throw parseFailure(key, value);
  }
  const parsed = BigInt(value);
  if (!isU64(parsed)) {
    throw parseFailure(key, value);
  }
  return parsed;
}

function parseSafeInteger(key: string, value: string): number {
  if (!DECIMAL_PATTERN.test(value)) {
    throw parseFailure(key, value);
  }
  const parsed = Number(value);
  if (!Number.isSafeInteger(parsed)) {
    throw parseFailure(key, value);
  }
  return parsed;
}

function parseBoolean(key: string, value: string): boolean {
  if (value === 'true') return true;
  if (value === 'false') return false;
  throw parseFailure(key, value);
}

function parsePuzzleType(value: string): PuzzleType {
  const puzzleType = Object.values(PuzzleType).find((candidate) => candidate === value);
  if (!puzzleType) {
    throw new PuzzleError(PuzzleErrorCode.INVALID_PUZZLE_TYPE, { puzzle_type: value });
  }
  return puzzleType;
}

function parseRarity(value: string): Rarity {
  const rarity = Object.values(Rarity).find((candidate) => candidate === value);
  if (!rarity) {
    throw parseFailure(AttributeKey.RARITY, value);
  }
  return rarity;
}

class AttributeReader {
  private values: Map<string, string>;

  constructor(list: AttributeList) {
    this.values = new Map(list.map((attribute) => [attribute.key, attribute.value]));
  }

  puzzleValue(key: string): string {
    return this.require(key, PuzzleErrorCode.PUZZLE_NOT_FOUND);
  }

  attributeValue(key: string): string {
    return this.require(key, PuzzleErrorCode.ATTRIBUTE_NOT_FOUND);
  }

  private require(key: string, code: PuzzleErrorCode): string {
    const value = this.values.get(key);
    if (value === undefined) {
      throw new PuzzleError(code, { key });
    }
    return value;
  }
}

/**
 * Reads the typed puzzle out of an attribute list. Keys the schema does not
 * own come back as `extras`, in their original order.
 */
export function decodePuzzle(attributes: AttributeList): DecodedAttributes {
  const list = assertAttributeList(attributes);
  const reader = new AttributeReader(list);

  const puzzleType = parsePuzzleType(reader.puzzleValue(AttributeKey.PUZZLE_TYPE));
  const difficulty = parseSafeInteger(AttributeKey.DIFFICULTY, reader.puzzleValue(AttributeKey.DIFFICULTY));
  if (difficulty > MAX_DIFFICULTY) {
    throw parseFailure(AttributeKey.DIFFICULTY, String(difficulty));
  }
  const puzzleNumber = parseU64(AttributeKey.PUZZLE_NUMBER, reader.puzzleValue(AttributeKey.PUZZLE_NUMBER));
  const solutionHash = reader.puzzleValue(AttributeKey.SOLUTION_HASH);
  if (!HEX_PATTERN.test(solutionHash)) {
    throw parseFailure(AttributeKey.SOLUTION_HASH, solutionHash);
  }
  const mintSlot = parseSafeInteger(AttributeKey.MINT_SLOT, reader.puzzleValue(AttributeKey.MINT_SLOT));
  const solved = parseBoolean(AttributeKey.SOLVED, reader.attributeValue(AttributeKey.SOLVED));

  const puzzle: PuzzleInstance = {
    puzzle_type: puzzleType,
    difficulty,
    puzzle_number: puzzleNumber,
    solution_hash: solutionHash,
    mint_slot: mintSlot,
    solved,
  };

  if (solved) {
    puzzle.solve = decodeSolveRecord(reader);
  }

  return {
    puzzle,
    extras: list.filter((attribute) => !PUZZLE_SCHEMA_KEYS.has(attribute.key)),
  };
}

function decodeSolveRecord(reader: AttributeReader): PuzzleSolveRecord {
  const solver = reader.attributeValue(AttributeKey.SOLVER);
  if (!isIdentity(solver)) {
    throw parseFailure(AttributeKey.SOLVER, solver);
  }
  return {
    solver,
    solution: parseU64(AttributeKey.SOLUTION, reader.attributeValue(AttributeKey.SOLUTION)),
    solved_at: parseSafeInteger(
      AttributeKey.SOLVE_TIMESTAMP,
      reader.attributeValue(AttributeKey.SOLVE_TIMESTAMP),
    ),
    rarity: parseRarity(reader.attributeValue(AttributeKey.RARITY)),
  };
}

export function encodeSolveRecord(solve: PuzzleSolveRecord): Record<string, string> {
  return {
    [AttributeKey.SOLVED]: 'true',
    [AttributeKey.SOLVER]: solve.solver,
    [AttributeKey.SOLUTION]: solve.solution.toString(),
    [AttributeKey.SOLVE_TIMESTAMP]: solve.solved_at.toString(),
    [AttributeKey.RARITY]: solve.rarity,
  };
}

export function encodePuzzle(puzzle: PuzzleInstance, extras: AttributeList = []): AttributeList {
  if (puzzle.solved !== (puzzle.solve !== undefined)) {
    throw new ValidationError('solve record must be present exactly when the puzzle is solved');
  }
  const metadata = assertMetadata(extras);

  const list: AttributeList = [
    { key: AttributeKey.PUZZLE_TYPE, value: puzzle.puzzle_type },
    { key: AttributeKey.DIFFICULTY, value: puzzle.difficulty.toString() },
    { key: AttributeKey.PUZZLE_NUMBER, value: puzzle.puzzle_number.toString() },
    { key: AttributeKey.SOLUTION_HASH, value: puzzle.solution_hash.toLowerCase() },
    { key: AttributeKey.SOLVED, value: puzzle.solved ? 'true' : 'false' },
    { key: AttributeKey.MINT_SLOT, value: puzzle.mint_slot.toString() },
  ];

  if (puzzle.solve) {
    for (const [key, value] of Object.entries(encodeSolveRecord(puzzle.solve))) {
      if (key !== AttributeKey.SOLVED) {
        list.push({ key, value });
      }
    }
  }

  return assertAttributeList([...list, ...metadata]);
}

/**
 * Applies updates in place: a key already present keeps its position and
 * takes the new value, a new key is appended. Untouched pairs are copied as-is.
 */
export function mergeAttributes(
  attributes: AttributeList,
  updates: Readonly<Record<string, string>>,
): AttributeList {
  const merged = attributes.map((attribute) => ({ ...attribute }));
  for (const [key, value] of Object.entries(updates)) {
    const existing = merged.find((attribute) => attribute.key === key);
    if (existing) {
      existing.value = value;
    } else {
      merged.push({ key, value });
    }
  }
  return merged;
}
