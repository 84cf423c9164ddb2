import { Ledger } from '../ledger/ledger';
import { Address } from '../ledger/types';
import { MarketplaceError, toMarketplaceError } from './errors';

/** Current holder of an asset, or null when the contract or the asset does not exist. */
export function currentHolder(ledger: Ledger, assetContract: Address, assetId: bigint): Address | null {
  const contract = ledger.getAssetContract(assetContract);
  if (!contract) return null;
  try {
    return contract.ownerOf(assetId);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'NonexistentAsset') return null;
    throw error;
  }
}

/**
 * Move an asset on behalf of its holder. The marketplace must be approved
 * for all of `from`'s assets on the contract.
 */
export function transferAsset(
  ledger: Ledger,
  operator: Address,
  assetContract: Address,
  from: Address,
  to: Address,
  assetId: bigint
): void {
  const contract = ledger.getAssetContract(assetContract);
  if (!contract) {
    throw new MarketplaceError('AssetTransferFailed', `No asset contract at ${assetContract}`);
  }
  try {
    contract.transferFrom(operator, from, to, assetId);
  } catch (error) {
    throw toMarketplaceError(error, 'AssetTransferFailed');
  }
}
