import { AssetRecord, Identity, TokenHolding } from '../../shared/schema';

export type OwnershipRecord = Pick<AssetRecord, 'id' | 'owner'>;
export type AuthorityRecord = Pick<AssetRecord, 'id' | 'update_authority'>;

/**
 * True when `claimed` is the recorded owner and, if a holding record is
 * given, that record belongs to the same identity, holds at least one unit
 * and points at this asset. Never throws; the caller picks the error.
 */
export function verifyOwner(
  claimed: Identity,
  asset: OwnershipRecord,
  holding?: TokenHolding,
): boolean {
  if (asset.owner !== claimed) {
    return false;
  }
  if (!holding) {
    return true;
  }
  if (holding.owner !== claimed) {
    return false;
  }
  if (holding.amount < 1) {
    return false;
  }
  return holding.asset_id === asset.id;
}

/**
 * Metadata-only capability, independent of who holds the asset.
 */
export function verifyUpdateAuthority(claimed: Identity, asset: AuthorityRecord): boolean {
  return asset.update_authority === claimed;
}
