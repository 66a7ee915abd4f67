import {
  AssetRecord,
  AttributeList,
  EntropySnapshot,
  Identity,
  LedgerEvent,
  MintedEvent,
  PuzzleInstance,
  SolvedEvent,
} from '../../shared/schema';
import { AssetLedger } from './assets';
import { UpdateAuthority } from './authority';
import { assertMetadata } from './codec';
import { isU64 } from './commitment';
import { EngineConfig, EngineConfigInput, parseEngineConfig } from './config';
import { assertEntropySnapshot, createClockEntropySource, EntropySource } from './entropy';
import { EngineError, ExecutionError, PuzzleError, PuzzleErrorCode, ValidationError } from './errors';
import { PuzzleGenerator } from './generator';
import { assertIdentity, deriveIdentity } from './identity';
import { Ledger } from './ledger';
import { PuzzleStateMachine } from './machine';
import { verifyOwner } from './ownership';

export interface PuzzleKernelOptions {
  config?: EngineConfigInput;
  entropy?: EntropySource;
}

export interface MintRequest {
  minter: Identity;
  name: string;
  uri: string;
  puzzle_type_selector: number;
  difficulty: number;
  metadata?: AttributeList;
}

export interface SolveRequest {
  asset_id: Identity;
  solver: Identity;
  solution: bigint | number | string;
  new_uri?: string;
  // Revision the caller read before deciding to solve; omitted means "latest".
  expected_revision?: number;
}

export interface UpdateUriRequest {
  asset_id: Identity;
  caller: Identity;
  uri: string;
}

export interface TransferRequest {
  asset_id: Identity;
  from: Identity;
  to: Identity;
}

export interface MintOutcome {
  asset: AssetRecord;
  puzzle: PuzzleInstance;
  event: LedgerEvent;
  minted: MintedEvent;
}

export interface SolveOutcome {
  asset: AssetRecord;
  puzzle: PuzzleInstance;
  event: LedgerEvent;
  solved: SolvedEvent;
}

export interface UpdateOutcome {
  asset: AssetRecord;
  event: LedgerEvent;
}

const DECIMAL_PATTERN = /^\d+$/;

export function parseSolution(value: bigint | number | string): bigint {
  let solution: bigint;
  if (typeof value === 'bigint') {
    solution = value;
  } else if (typeof value === 'number') {
    if (!Number.isSafeInteger(value)) {
      throw new ValidationError('solution must be an integer', { solution: value });
    }
    solution = BigInt(value);
  } else {
    if (!DECIMAL_PATTERN.test(value.trim())) {
      throw new ValidationError('solution must be a decimal integer', { solution: value });
    }
    solution = BigInt(value.trim());
  }

  if (!isU64(solution)) {
    throw new ValidationError('solution must fit in an unsigned 64-bit integer', {
      solution: solution.toString(),
    });
  }
  return solution;
}

function toIsoTimestamp(entropy: EntropySnapshot): string {
  return new Date(entropy.timestamp * 1000).toISOString();
}

/**
 * Executes mint/solve/update requests against the asset ledger. Each request
 * re-reads the asset, runs the state machine, commits with a revision check
 * and appends one ledger event; a failure anywhere restores the previous
 * state before the error surfaces.
 */
export class PuzzleKernel {
  readonly config: EngineConfig;
  readonly authority: UpdateAuthority;
  private machine: PuzzleStateMachine;
  private entropy: EntropySource;

  constructor(
    private ledger: Ledger,
    private assets: AssetLedger,
    options?: PuzzleKernelOptions,
  ) {
    this.config = parseEngineConfig(options?.config ?? {});
    this.authority = UpdateAuthority.derive(this.config.program_id, this.config.authority_seed);
    this.machine = new PuzzleStateMachine({
      authority: this.authority,
      generator: new PuzzleGenerator({ max_difficulty: this.config.limits.max_difficulty }),
      hidden_trait: this.config.hidden_trait,
    });
    this.entropy =
      options?.entropy ??
      createClockEntropySource({
        genesis_ms: this.config.entropy.genesis_ms,
        slot_duration_ms: this.config.entropy.slot_duration_ms,
      });
  }

  mint(request: MintRequest): MintOutcome {
    this.assertMintRequest(request);
    const entropy = assertEntropySnapshot(this.entropy.snapshot());

    return this.transaction(() => {
      const timestamp = toIsoTimestamp(entropy);
      const { sequence } = this.ledger.getNextMeta();
      const assetId = deriveIdentity({
        program_id: this.config.program_id,
        minter: request.minter,
        slot: entropy.slot,
        sequence,
      });

      const created = this.machine.create({
        asset_id: assetId,
        requester: request.minter,
        puzzle_type_selector: request.puzzle_type_selector,
        difficulty: request.difficulty,
        entropy,
        metadata: request.metadata,
      });

      this.assets.addAsset({
        id: assetId,
        name: request.name,
        symbol: this.config.symbol,
        uri: request.uri,
        owner: request.minter,
        update_authority: this.authority.identity,
        collection_id: this.config.collection_id,
        attributes: created.attributes,
        revision: 0,
        created_at: timestamp,
        updated_at: timestamp,
      });

      const event = this.ledger.append({
        type: 'PUZZLE_MINTED',
        timestamp,
        actor_id: request.minter,
        asset_id: assetId,
        slot: entropy.slot,
        minted: created.event,
      });

      return {
        asset: this.assets.requireAsset(assetId),
        puzzle: created.puzzle,
        event,
        minted: created.event,
      };
    });
  }

  solve(request: SolveRequest): SolveOutcome {
    assertIdentity(request.asset_id, 'asset_id');
    assertIdentity(request.solver, 'solver');
    const solution = parseSolution(request.solution);
    if (request.new_uri !== undefined) {
      this.assertUri(request.new_uri);
    }
    const entropy = assertEntropySnapshot(this.entropy.snapshot());

    return this.transaction(() => {
      const timestamp = toIsoTimestamp(entropy);
      const asset = this.assets.requireAsset(request.asset_id);
      if (request.expected_revision !== undefined && request.expected_revision !== asset.revision) {
        throw new ExecutionError(`stale asset revision: ${asset.id}`, {
          expected: request.expected_revision,
          actual: asset.revision,
        });
      }

      const result = this.machine.solve({
        asset,
        holding: this.assets.getHolding(asset.id),
        claimed_identity: request.solver,
        solution,
        new_uri: request.new_uri,
        entropy,
      });

      const updated = this.assets.commit(
        asset.id,
        asset.revision,
        { attributes: result.attributes, uri: result.uri },
        timestamp,
      );

      const event = this.ledger.append({
        type: 'PUZZLE_SOLVED',
        timestamp,
        actor_id: request.solver,
        asset_id: asset.id,
        slot: entropy.slot,
        solved: result.event,
      });

      if (result.uri !== undefined) {
        this.ledger.append({
          type: 'URI_UPDATED',
          timestamp,
          actor_id: this.authority.identity,
          asset_id: asset.id,
          slot: entropy.slot,
          uri_updated: { asset_id: asset.id, updated_by: this.authority.identity, uri: result.uri },
        });
      }

      return { asset: updated, puzzle: result.puzzle, event, solved: result.event };
    });
  }

  updateUri(request: UpdateUriRequest): UpdateOutcome {
    assertIdentity(request.asset_id, 'asset_id');
    assertIdentity(request.caller, 'caller');
    this.assertUri(request.uri);
    const entropy = assertEntropySnapshot(this.entropy.snapshot());

    return this.transaction(() => {
      const timestamp = toIsoTimestamp(entropy);
      const asset = this.assets.requireAsset(request.asset_id);
      const uriUpdated = this.machine.updateUri({ asset, caller: request.caller, uri: request.uri });
      const updated = this.assets.commit(asset.id, asset.revision, { uri: request.uri }, timestamp);

      const event = this.ledger.append({
        type: 'URI_UPDATED',
        timestamp,
        actor_id: request.caller,
        asset_id: asset.id,
        slot: entropy.slot,
        uri_updated: uriUpdated,
      });

      return { asset: updated, event };
    });
  }

  transfer(request: TransferRequest): UpdateOutcome {
    assertIdentity(request.asset_id, 'asset_id');
    assertIdentity(request.from, 'from');
    assertIdentity(request.to, 'to');
    const entropy = assertEntropySnapshot(this.entropy.snapshot());

    return this.transaction(() => {
      const timestamp = toIsoTimestamp(entropy);
      const asset = this.assets.requireAsset(request.asset_id);
      if (!verifyOwner(request.from, asset, this.assets.getHolding(asset.id))) {
        throw new PuzzleError(PuzzleErrorCode.NOT_NFT_OWNER, { asset_id: asset.id, claimed: request.from });
      }
      const updated = this.assets.commit(asset.id, asset.revision, { owner: request.to }, timestamp);

      const event = this.ledger.append({
        type: 'TRANSFER',
        timestamp,
        actor_id: request.from,
        asset_id: asset.id,
        slot: entropy.slot,
        transferred: { asset_id: asset.id, from: request.from, to: request.to },
      });

      return { asset: updated, event };
    });
  }

  private transaction<T>(work: () => T): T {
    const snapshot = this.assets.snapshot();
    const ledgerLength = this.ledger.getNextSequence();

    try {
      return work();
    } catch (error) {
      this.assets.restore(snapshot);
      this.ledger.truncate(ledgerLength);
      if (error instanceof EngineError) {
        throw error;
      }
      throw new ExecutionError('engine execution failed', { error });
    }
  }

  private assertMintRequest(request: MintRequest): void {
    assertIdentity(request.minter, 'minter');
    if (!request.name || request.name.trim().length === 0) {
      throw new ValidationError('name is required');
    }
    if (request.name.length > this.config.limits.max_name_length) {
      throw new ValidationError(`name must be at most ${this.config.limits.max_name_length} characters`);
    }
    this.assertUri(request.uri);
    if (request.metadata) {
      assertMetadata(request.metadata);
    }
  }

  private assertUri(uri: string): void {
    if (typeof uri !== 'string') {
      throw new ValidationError('uri must be a string');
    }
    if (uri.length > this.config.limits.max_uri_length) {
      throw new ValidationError(`uri must be at most ${this.config.limits.max_uri_length} characters`);
    }
  }
}
