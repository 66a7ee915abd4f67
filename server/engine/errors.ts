export class EngineError extends Error {
  code: string;
  details?: unknown;

  constructor(code: string, message: string, details?: unknown) {
    super(message);
    this.code = code;
    this.details = details;
    this.name = 'EngineError';
  }
}

export enum PuzzleErrorCode {
  INCORRECT_SOLUTION = 'IncorrectSolution',
  PUZZLE_NOT_FOUND = 'PuzzleNotFound',
  ATTRIBUTE_NOT_FOUND = 'AttributeNotFound',
  NOT_NFT_OWNER = 'NotNftOwner',
  ALREADY_SOLVED = 'AlreadySolved',
  INVALID_PUZZLE_TYPE = 'InvalidPuzzleType',
  FAILED_TO_PARSE_PUZZLE_DATA = 'FailedToParsePuzzleData',
  INVALID_ASSET_DATA = 'InvalidAssetData',
  UNAUTHORIZED_UPDATE = 'UnauthorizedUpdate',
}

const PUZZLE_ERROR_MESSAGES: Record<PuzzleErrorCode, string> = {
  [PuzzleErrorCode.INCORRECT_SOLUTION]: 'The provided solution is incorrect',
  [PuzzleErrorCode.PUZZLE_NOT_FOUND]: 'Puzzle not found in asset attributes',
  [PuzzleErrorCode.ATTRIBUTE_NOT_FOUND]: 'Attribute not found',
  [PuzzleErrorCode.NOT_NFT_OWNER]: 'Only the asset owner can attempt to solve the puzzle',
  [PuzzleErrorCode.ALREADY_SOLVED]: 'Puzzle has already been solved',
  [PuzzleErrorCode.INVALID_PUZZLE_TYPE]: 'Invalid puzzle type',
  [PuzzleErrorCode.FAILED_TO_PARSE_PUZZLE_DATA]: 'Failed to parse puzzle data',
  [PuzzleErrorCode.INVALID_ASSET_DATA]: 'Invalid asset data',
  [PuzzleErrorCode.UNAUTHORIZED_UPDATE]: 'Unauthorized update attempt',
};

export class PuzzleError extends EngineError {
  declare code: PuzzleErrorCode;

  constructor(code: PuzzleErrorCode, details?: unknown) {
    super(code, PUZZLE_ERROR_MESSAGES[code], details);
    this.name = 'PuzzleError';
  }
}

export class ValidationError extends EngineError {
  constructor(message: string, details?: unknown) {
    super('VALIDATION_ERROR', message, details);
    this.name = 'ValidationError';
  }
}

export class ExecutionError extends EngineError {
  constructor(message: string, details?: unknown) {
    super('EXECUTION_ERROR', message, details);
    this.name = 'ExecutionError';
  }
}

export function isPuzzleError(error: unknown, code?: PuzzleErrorCode): error is PuzzleError {
  return error instanceof PuzzleError && (code === undefined || error.code === code);
}
