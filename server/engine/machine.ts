import {
  AssetRecord,
  AttributeList,
  EntropySnapshot,
  Identity,
  MintedEvent,
  PuzzleInstance,
  PuzzleSolveRecord,
  PuzzleStatus,
  SolvedEvent,
  TokenHolding,
  UriUpdatedEvent,
} from '../../shared/schema';
import { UpdateAuthority } from './authority';
import {
  AttributeKey,
  decodePuzzle,
  encodePuzzle,
  encodeSolveRecord,
  findAttribute,
  mergeAttributes,
} from './codec';
import { assertEntropySnapshot } from './entropy';
import { PuzzleError, PuzzleErrorCode } from './errors';
import { PuzzleGenerator } from './generator';
import { assertIdentity } from './identity';
import { verifyOwner, verifyUpdateAuthority } from './ownership';
import { assignRarity } from './rarity';
import { verifySolution } from './verifier';

export interface HiddenTraitOptions {
  enabled: boolean;
  placeholder: string;
}

export interface PuzzleStateMachineOptions {
  authority: UpdateAuthority;
  generator?: PuzzleGenerator;
  hidden_trait?: HiddenTraitOptions;
}

export interface CreateInput {
  asset_id: Identity;
  requester: Identity;
  puzzle_type_selector: number;
  difficulty: number;
  entropy: EntropySnapshot;
  metadata?: AttributeList;
}

export interface CreateResult {
  puzzle: PuzzleInstance;
  attributes: AttributeList;
  event: MintedEvent;
}

export type SolvableAsset = Pick<AssetRecord, 'id' | 'owner' | 'update_authority' | 'attributes'>;

export interface SolveInput {
  asset: SolvableAsset;
  holding?: TokenHolding;
  claimed_identity: Identity;
  solution: bigint;
  new_uri?: string;
  entropy: EntropySnapshot;
}

export interface SolveResult {
  puzzle: PuzzleInstance;
  attributes: AttributeList;
  uri?: string;
  event: SolvedEvent;
}

export interface UriUpdateInput {
  asset: Pick<AssetRecord, 'id' | 'update_authority'>;
  caller: Identity;
  uri: string;
}

export function puzzleStatus(puzzle: PuzzleInstance): PuzzleStatus {
  return puzzle.solved ? PuzzleStatus.SOLVED : PuzzleStatus.UNSOLVED;
}

/**
 * Unsolved → Solved, once. Every method is a pure function of its input:
 * it returns the next attribute list and the event to emit, and persisting
 * them is the caller's job. A thrown error means nothing changed.
 */
export class PuzzleStateMachine {
  private authority: UpdateAuthority;
  private generator: PuzzleGenerator;
  private hiddenTrait?: HiddenTraitOptions;

  constructor(options: PuzzleStateMachineOptions) {
    this.authority = options.authority;
    this.generator = options.generator ?? new PuzzleGenerator();
    this.hiddenTrait = options.hidden_trait;
  }

  get updateAuthority(): Identity {
    return this.authority.identity;
  }

  create(input: CreateInput): CreateResult {
    assertIdentity(input.asset_id, 'asset_id');
    const puzzle = this.generator.generate(
      {
        requester: input.requester,
        puzzle_type_selector: input.puzzle_type_selector,
        difficulty: input.difficulty,
      },
      input.entropy,
    );

    const extras: AttributeList = [...(input.metadata ?? [])];
    if (this.hiddenTrait?.enabled && findAttribute(extras, AttributeKey.HIDDEN_TRAIT) === undefined) {
      extras.push({ key: AttributeKey.HIDDEN_TRAIT, value: this.hiddenTrait.placeholder });
    }

    return {
      puzzle,
      attributes: encodePuzzle(puzzle, extras),
      event: {
        asset_id: input.asset_id,
        puzzle_type: puzzle.puzzle_type,
        puzzle_number: puzzle.puzzle_number.toString(),
        minter: input.requester,
      },
    };
  }

  solve(input: SolveInput): SolveResult {
    const { asset } = input;
    const { puzzle } = decodePuzzle(asset.attributes);

    if (puzzle.solved) {
      throw new PuzzleError(PuzzleErrorCode.ALREADY_SOLVED, { asset_id: asset.id });
    }

    if (!verifyOwner(input.claimed_identity, asset, input.holding)) {
      throw new PuzzleError(PuzzleErrorCode.NOT_NFT_OWNER, {
        asset_id: asset.id,
        claimed: input.claimed_identity,
      });
    }

    if (!verifySolution(puzzle, input.solution)) {
      throw new PuzzleError(PuzzleErrorCode.INCORRECT_SOLUTION, { asset_id: asset.id });
    }

    if (!this.authority.matches(asset.update_authority)) {
      throw new PuzzleError(PuzzleErrorCode.UNAUTHORIZED_UPDATE, { asset_id: asset.id });
    }

    const { timestamp } = assertEntropySnapshot(input.entropy);
    const solve: PuzzleSolveRecord = {
      solver: input.claimed_identity,
      solution: input.solution,
      solved_at: timestamp,
      rarity: assignRarity(timestamp),
    };

    const updates: Record<string, string> = encodeSolveRecord(solve);
    if (findAttribute(asset.attributes, AttributeKey.HIDDEN_TRAIT) !== undefined) {
      updates[AttributeKey.HIDDEN_TRAIT] = `${solve.rarity} Solver`;
    }

    return {
      puzzle: { ...puzzle, solved: true, solve },
      attributes: mergeAttributes(asset.attributes, updates),
      uri: input.new_uri,
      event: {
        asset_id: asset.id,
        solver: solve.solver,
        solve_timestamp: solve.solved_at,
        rarity: solve.rarity,
      },
    };
  }

  updateUri(input: UriUpdateInput): UriUpdatedEvent {
    if (!verifyUpdateAuthority(input.caller, input.asset)) {
      throw new PuzzleError(PuzzleErrorCode.UNAUTHORIZED_UPDATE, {
        asset_id: input.asset.id,
        caller: input.caller,
      });
    }
    return { asset_id: input.asset.id, updated_by: input.caller, uri: input.uri };
  }
}
