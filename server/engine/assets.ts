import { AssetRecord, AttributeList, Identity, TokenHolding } from '../../shared/schema';
import { ExecutionError } from './errors';

export interface AssetLedgerSnapshot {
  assets: Record<string, AssetRecord>;
  holdings: Record<string, TokenHolding>;
}

export interface AssetPatch {
  attributes?: AttributeList;
  uri?: string;
  owner?: Identity;
}

function cloneRecord<T>(record: Record<string, T>): Record<string, T> {
  return structuredClone(record);
}

function cloneAsset(asset: AssetRecord): AssetRecord {
  return { ...asset, attributes: asset.attributes.map((attribute) => ({ ...attribute })) };
}

/**
 * In-process asset ledger: per-asset attribute lists plus the holding-token
 * record behind each owner. Commits are compare-and-set on `revision`, so a
 * write computed from a stale read is rejected rather than merged.
 */
export class AssetLedger {
  private assets: Map<string, AssetRecord> = new Map();
  private holdings: Map<string, TokenHolding> = new Map();

  constructor(snapshot?: AssetLedgerSnapshot) {
    if (snapshot) {
      this.restore(snapshot);
    }
  }

  getAsset(assetId: string): AssetRecord | undefined {
    const asset = this.assets.get(assetId);
    return asset ? cloneAsset(asset) : undefined;
  }

  requireAsset(assetId: string): AssetRecord {
    const asset = this.getAsset(assetId);
    if (!asset) {
      throw new ExecutionError(`asset not found: ${assetId}`);
    }
    return asset;
  }

  listAssets(): AssetRecord[] {
    return [...this.assets.values()].map(cloneAsset);
  }

  listAssetsByOwner(owner: Identity): AssetRecord[] {
    return this.listAssets().filter((asset) => asset.owner === owner);
  }

  getHolding(assetId: string): TokenHolding | undefined {
    const holding = this.holdings.get(assetId);
    return holding ? { ...holding } : undefined;
  }

  addAsset(asset: AssetRecord): void {
    if (this.assets.has(asset.id)) {
      throw new ExecutionError(`asset already exists: ${asset.id}`);
    }
    if (asset.revision !== 0) {
      throw new ExecutionError(`new asset must start at revision 0: ${asset.id}`);
    }
    this.assets.set(asset.id, cloneAsset(asset));
    this.holdings.set(asset.id, { asset_id: asset.id, owner: asset.owner, amount: 1 });
  }

  commit(assetId: string, expectedRevision: number, patch: AssetPatch, now: string): AssetRecord {
    const current = this.assets.get(assetId);
    if (!current) {
      throw new ExecutionError(`asset not found: ${assetId}`);
    }
    if (current.revision !== expectedRevision) {
      throw new ExecutionError(`stale asset revision: ${assetId}`, {
        expected: expectedRevision,
        actual: current.revision,
      });
    }

    const next: AssetRecord = {
      ...cloneAsset(current),
      revision: current.revision + 1,
      updated_at: now,
    };
    if (patch.attributes) {
      next.attributes = patch.attributes.map((attribute) => ({ ...attribute }));
    }
    if (patch.uri !== undefined) {
      next.uri = patch.uri;
    }
    if (patch.owner !== undefined && patch.owner !== current.owner) {
      next.owner = patch.owner;
      this.holdings.set(assetId, { asset_id: assetId, owner: patch.owner, amount: 1 });
    }

    this.assets.set(assetId, next);
    return cloneAsset(next);
  }

  snapshot(): AssetLedgerSnapshot {
    const assets: Record<string, AssetRecord> = {};
    for (const [id, asset] of this.assets) {
      assets[id] = asset;
    }
    const holdings: Record<string, TokenHolding> = {};
    for (const [id, holding] of this.holdings) {
      holdings[id] = holding;
    }
    return { assets: cloneRecord(assets), holdings: cloneRecord(holdings) };
  }

  restore(snapshot: AssetLedgerSnapshot): void {
    this.assets = new Map(Object.entries(cloneRecord(snapshot.assets)));
    this.holdings = new Map(Object.entries(cloneRecord(snapshot.holdings ?? {})));
  }
}
