export { EngineError, ExecutionError, PuzzleError, PuzzleErrorCode, ValidationError, isPuzzleError } from './errors';
export { hashObject, sha256Hex, stableStringify } from './hash';
export { IDENTITY_BYTES, assertIdentity, deriveIdentity, isIdentity } from './identity';
export { UpdateAuthority } from './authority';
export {
  DEFAULT_SLOT_DURATION_MS,
  MAX_TIMESTAMP,
  assertEntropySnapshot,
  createClockEntropySource,
  createFixedEntropySource,
} from './entropy';
export type { ClockEntropyOptions, EntropySource } from './entropy';
export { COMMITMENT_ROUNDS, U64_MAX, deriveSolutionHash, isU64 } from './commitment';
export {
  MAX_DIFFICULTY,
  PuzzleGenerator,
  derivePuzzleNumber,
  puzzleTypeSelector,
  resolvePuzzleType,
} from './generator';
export type { PuzzleGeneratorOptions, PuzzleRequest } from './generator';
export {
  AttributeKey,
  PUZZLE_SCHEMA_KEYS,
  assertAttributeList,
  decodePuzzle,
  encodePuzzle,
  assertMetadata,
  encodeSolveRecord,
  findAttribute,
  mergeAttributes,
} from './codec';
export type { DecodedAttributes } from './codec';
export { verifyOwner, verifyUpdateAuthority } from './ownership';
export type { AuthorityRecord, OwnershipRecord } from './ownership';
export { listDivisors, verifySolution } from './verifier';
export { RARITY_THRESHOLDS, assignRarity } from './rarity';
export { PuzzleStateMachine, puzzleStatus } from './machine';
export type {
  CreateInput,
  CreateResult,
  HiddenTraitOptions,
  PuzzleStateMachineOptions,
  SolvableAsset,
  SolveInput,
  SolveResult,
  UriUpdateInput,
} from './machine';
export { AssetLedger } from './assets';
export type { AssetLedgerSnapshot, AssetPatch } from './assets';
export { GENESIS_HASH, Ledger } from './ledger';
export type { LedgerEventDraft, LedgerIntegrityReport } from './ledger';
export { PuzzleKernel, parseSolution } from './kernel';
export type {
  MintOutcome,
  MintRequest,
  PuzzleKernelOptions,
  SolveOutcome,
  SolveRequest,
  TransferRequest,
  UpdateOutcome,
  UpdateUriRequest,
} from './kernel';
export { EngineConfigSchema, parseEngineConfig } from './config';
export type { EngineConfig, EngineConfigInput } from './config';
export { loadEngineConfig } from './config-loader';
export { PuzzleRuntime } from './runtime';
export type { PuzzleRuntimeOptions } from './runtime';
export { EngineFileStore, ENGINE_CHECKPOINT_VERSION } from './store';
export type { EngineCheckpoint } from './store';
