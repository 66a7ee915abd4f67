/**
 * Puzzle Collectibles: Core Type Definitions
 *
 * These types define the fundamental data structures for:
 * - Puzzles (the commitment embedded in an asset at mint)
 * - Attributes (the key/value wire form persisted with each asset)
 * - Assets (records held by the asset ledger)
 * - Events (mint/solve payloads and the hash-chained ledger)
 */

// =============================================================================
// ENUMS
// =============================================================================

export enum PuzzleType {
  MATH_FACTOR = 'math_factor',
  HASH_RIDDLE = 'hash_riddle',
  PATTERN = 'pattern',
}

/**
 * Creation selectors, indexed by position: 0 → math_factor, 1 → hash_riddle,
 * 2 → pattern.
 */
export const PUZZLE_TYPE_SELECTORS: readonly PuzzleType[] = [
  PuzzleType.MATH_FACTOR,
  PuzzleType.HASH_RIDDLE,
  PuzzleType.PATTERN,
];

export enum Rarity {
  LEGENDARY = 'Legendary',
  EPIC = 'Epic',
  RARE = 'Rare',
  COMMON = 'Common',
}

export enum PuzzleStatus {
  UNSOLVED = 'UNSOLVED',
  SOLVED = 'SOLVED',
}

// =============================================================================
// CORE TYPES
// =============================================================================

/**
 * Identity: 32 opaque bytes as 64 lowercase hex characters. Only ever
 * compared for equality.
 */
export type Identity = string;

/**
 * EntropySnapshot: externally supplied, non-adversarial randomness
 */
export interface EntropySnapshot {
  slot: number; // monotonic counter
  timestamp: number; // unix seconds
}

export interface PuzzleSolveRecord {
  solver: Identity;
  solution: bigint;
  solved_at: number; // unix seconds
  rarity: Rarity;
}

/**
 * PuzzleInstance: the typed form of an asset's puzzle attributes
 *
 * Everything except `solved`/`solve` is fixed at creation. `solve` is
 * present exactly when `solved` is true.
 */
export interface PuzzleInstance {
  puzzle_type: PuzzleType;
  difficulty: number;
  puzzle_number: bigint;
  solution_hash: string; // lowercase hex commitment
  mint_slot: number; // seed material
  solved: boolean;
  solve?: PuzzleSolveRecord;
}

// =============================================================================
// ATTRIBUTES
// =============================================================================

export interface Attribute {
  key: string;
  value: string;
}

export type AttributeList = Attribute[];

// =============================================================================
// ASSETS
// =============================================================================

/**
 * AssetRecord: one collectible as stored by the asset ledger
 */
export interface AssetRecord {
  id: Identity;
  name: string;
  symbol: string;
  uri: string;
  owner: Identity;
  update_authority: Identity;
  collection_id?: string;
  attributes: AttributeList;

  // Optimistic concurrency: bumped on every accepted commit
  revision: number;

  created_at: string; // ISO8601
  updated_at: string;
}

/**
 * TokenHolding: the holding-token record that backs ownership
 */
export interface TokenHolding {
  asset_id: Identity;
  owner: Identity;
  amount: number;
}

// =============================================================================
// EVENTS
// =============================================================================

export interface MintedEvent {
  asset_id: Identity;
  puzzle_type: PuzzleType;
  puzzle_number: string; // decimal u64
  minter: Identity;
}

export interface SolvedEvent {
  asset_id: Identity;
  solver: Identity;
  solve_timestamp: number;
  rarity: Rarity;
}

export interface UriUpdatedEvent {
  asset_id: Identity;
  updated_by: Identity;
  uri: string;
}

export interface TransferEvent {
  asset_id: Identity;
  from: Identity;
  to: Identity;
}

// =============================================================================
// LEDGER
// =============================================================================

export interface LedgerEvent {
  id: string;
  type: 'PUZZLE_MINTED' | 'PUZZLE_SOLVED' | 'URI_UPDATED' | 'TRANSFER';
  timestamp: string;

  // What happened
  actor_id: Identity;
  asset_id: Identity;
  slot: number;

  minted?: MintedEvent;
  solved?: SolvedEvent;
  uri_updated?: UriUpdatedEvent;
  transferred?: TransferEvent;

  // Hash chain: each event commits to its predecessor
  prev_hash: string;
  event_hash: string;
}
