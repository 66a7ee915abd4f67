import { AssetLedger } from './assets';
import {
  MintOutcome,
  MintRequest,
  PuzzleKernel,
  PuzzleKernelOptions,
  SolveOutcome,
  SolveRequest,
  TransferRequest,
  UpdateOutcome,
  UpdateUriRequest,
} from './kernel';
import { Ledger } from './ledger';
import { EngineCheckpoint, EngineFileStore, ENGINE_CHECKPOINT_VERSION } from './store';

export interface PuzzleRuntimeOptions extends PuzzleKernelOptions {
  checkpointVersion?: string;
}

export class PuzzleRuntime {
  readonly ledger: Ledger;
  readonly assets: AssetLedger;
  readonly kernel: PuzzleKernel;
  private checkpointVersion: string;

  constructor(ledger?: Ledger, assets?: AssetLedger, options?: PuzzleRuntimeOptions) {
    this.ledger = ledger ?? new Ledger();
    this.assets = assets ?? new AssetLedger();
    this.kernel = new PuzzleKernel(this.ledger, this.assets, options);
    this.checkpointVersion = options?.checkpointVersion ?? ENGINE_CHECKPOINT_VERSION;
  }

  mint(request: MintRequest): MintOutcome {
    return this.kernel.mint(request);
  }

  solve(request: SolveRequest): SolveOutcome {
    return this.kernel.solve(request);
  }

  updateUri(request: UpdateUriRequest): UpdateOutcome {
    return this.kernel.updateUri(request);
  }

  transfer(request: TransferRequest): UpdateOutcome {
    return this.kernel.transfer(request);
  }

  createCheckpoint(): EngineCheckpoint {
    return {
      version: this.checkpointVersion,
      saved_at: new Date().toISOString(),
      ledger: this.ledger.getEvents(),
      assets: this.assets.snapshot(),
    };
  }

  async saveToStore(store: EngineFileStore): Promise<void> {
    await store.save(this.createCheckpoint());
  }

  static async loadFromStore(
    store: EngineFileStore,
    options?: PuzzleRuntimeOptions,
  ): Promise<PuzzleRuntime> {
    const checkpoint = await store.load();
    if (!checkpoint) {
      return new PuzzleRuntime(undefined, undefined, options);
    }

    store.validateLedgerIntegrity(checkpoint);
    return PuzzleRuntime.fromCheckpoint(checkpoint, options);
  }

  static fromCheckpoint(checkpoint: EngineCheckpoint, options?: PuzzleRuntimeOptions): PuzzleRuntime {
    const ledger = new Ledger(checkpoint.ledger);
    const assets = new AssetLedger(checkpoint.assets);
    return new PuzzleRuntime(ledger, assets, options);
  }
}
