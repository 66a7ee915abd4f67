import { mkdir, readFile, rename, rm, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { AssetRecord, LedgerEvent } from '../../shared/schema';
import { AssetLedgerSnapshot } from './assets';
import { assertAttributeList } from './codec';
import { ValidationError } from './errors';
import { isIdentity } from './identity';
import { Ledger } from './ledger';

export const ENGINE_CHECKPOINT_VERSION = '0.1.0';

export interface EngineCheckpoint {
  version: string;
  saved_at: string;
  ledger: LedgerEvent[];
  assets: AssetLedgerSnapshot;
}

/**
 * One JSON checkpoint on disk. Every load and save checks that the asset
 * records, their holdings and the ledger agree with each other; the hash
 * chain itself is checked separately by `validateLedgerIntegrity`.
 */
export class EngineFileStore {
  constructor(private filePath: string) {}

  async load(): Promise<EngineCheckpoint | null> {
    try {
      const raw = await readFile(this.filePath, 'utf8');
      const parsed: EngineCheckpoint = JSON.parse(raw);
      this.assertValidCheckpoint(parsed);
      return parsed;
    } catch (error) {
      if (error && typeof error === 'object' && 'code' in error && error.code === 'ENOENT') {
        return null;
      }
      throw error;
    }
  }

  async save(checkpoint: EngineCheckpoint): Promise<void> {
    this.assertValidCheckpoint(checkpoint);
    await mkdir(dirname(this.filePath), { recursive: true });

    const payload = JSON.stringify(checkpoint, null, 2);
    const tempPath = `${this.filePath}.tmp`;
    await writeFile(tempPath, payload, 'utf8');
    await rm(this.filePath, { force: true });
    await rename(tempPath, this.filePath);
  }

  validateLedgerIntegrity(checkpoint: EngineCheckpoint): void {
    const ledger = new Ledger(checkpoint.ledger);
    const report = ledger.verifyIntegrity();
    if (!report.ok) {
      throw new ValidationError('ledger integrity check failed', report.errors);
    }
  }

  private assertValidCheckpoint(checkpoint: EngineCheckpoint): void {
    if (!checkpoint || typeof checkpoint !== 'object') {
      throw new ValidationError('checkpoint is required');
    }
    if (!checkpoint.version) {
      throw new ValidationError('checkpoint version is required');
    }
    if (!checkpoint.saved_at) {
      throw new ValidationError('checkpoint saved_at is required');
    }
    if (!Array.isArray(checkpoint.ledger)) {
      throw new ValidationError('checkpoint ledger is required');
    }
    if (!checkpoint.assets || typeof checkpoint.assets.assets !== 'object') {
      throw new ValidationError('checkpoint assets are required');
    }
    if (!checkpoint.assets.holdings || typeof checkpoint.assets.holdings !== 'object') {
      throw new ValidationError('checkpoint holdings are required');
    }

    for (const [assetId, asset] of Object.entries(checkpoint.assets.assets)) {
      this.assertValidAsset(assetId, asset);
    }
    for (const [assetId, holding] of Object.entries(checkpoint.assets.holdings)) {
      const asset = checkpoint.assets.assets[assetId];
      if (!asset || holding.asset_id !== assetId) {
        throw new ValidationError(`holding does not match a stored asset: ${assetId}`);
      }
      if (holding.owner !== asset.owner || holding.amount < 1) {
        throw new ValidationError(`holding disagrees with asset owner: ${assetId}`);
      }
    }
    for (const event of checkpoint.ledger) {
      if (!checkpoint.assets.assets[event.asset_id]) {
        throw new ValidationError(`ledger event references unknown asset: ${event.asset_id}`, {
          event_id: event.id,
        });
      }
    }
  }

  private assertValidAsset(assetId: string, asset: AssetRecord): void {
    if (!asset || asset.id !== assetId || !isIdentity(asset.id)) {
      throw new ValidationError(`checkpoint asset is keyed incorrectly: ${assetId}`);
    }
    if (!isIdentity(asset.owner) || !isIdentity(asset.update_authority)) {
      throw new ValidationError(`checkpoint asset has invalid owner or authority: ${assetId}`);
    }
    if (!Number.isSafeInteger(asset.revision) || asset.revision < 0) {
      throw new ValidationError(`checkpoint asset has invalid revision: ${assetId}`);
    }
    try {
      assertAttributeList(asset.attributes);
    } catch (error) {
      throw new ValidationError(`checkpoint asset has invalid attributes: ${assetId}`, { error });
    }
  }
}
