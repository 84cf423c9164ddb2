/**
 * Local Settlement Processor
 *
 * Same-ledger purchase of an ACTIVE_LOCAL listing. The buyer's native
 * value has already moved to the marketplace when this runs (it arrives
 * as the call's value); any throw reverts the whole call, value included.
 */

import { Ledger } from '../ledger/ledger';
import { Address } from '../ledger/types';
import { StructuredLogger } from '../logging/structured-logger';
import { transferAsset } from './asset-custody';
import { MarketplaceError } from './errors';
import { MarketEventType, MarketplaceEventLog } from './event-log';
import { settlementAmounts } from './fee-policy';
import { FeeVault } from './fee-vault';
import { ListingRegistry } from './listing-registry';
import { MarketplaceConfig } from './marketplace-config';
import { ListingStatus, LocalPurchaseReceipt } from './types';

export interface LocalSettlementDeps {
  ledger: Ledger;
  config: MarketplaceConfig;
  registry: ListingRegistry;
  events: MarketplaceEventLog;
  fees: FeeVault;
  /** The marketplace's own address: operator for asset transfers, holder of received value. */
  self: Address;
  log: StructuredLogger;
}

export class LocalSettlementProcessor {
  private deps: LocalSettlementDeps;

  constructor(deps: LocalSettlementDeps) {
    this.deps = deps;
  }

  buyLocal(
    buyer: Address,
    value: bigint,
    assetContract: Address,
    assetId: bigint,
    recipient: Address
  ): LocalPurchaseReceipt {
    const { ledger, registry, self } = this.deps;
    const listing = registry.getListingFor(assetContract, assetId);
    if (listing.status !== ListingStatus.ACTIVE_LOCAL) {
      throw new MarketplaceError('NotActiveLocalListing', `${assetContract} #${assetId} is not listed for local sale`, {
        key: listing.key,
        status: listing.status,
      });
    }
    if (value < listing.price) {
      throw new MarketplaceError('InsufficientFunds', `Sent ${value}, price is ${listing.price}`, {
        price: listing.price.toString(),
      });
    }
    if (value > listing.price) {
      throw new MarketplaceError('ExcessFunds', `Sent ${value}, price is ${listing.price}`, {
        price: listing.price.toString(),
      });
    }

    const amounts = settlementAmounts(listing.price, this.deps.config.feeBps);
    transferAsset(ledger, self, listing.assetContract, listing.seller, recipient, listing.assetId);
    ledger.transfer(self, listing.seller, amounts.sellerProceeds);
    this.deps.fees.accrue(amounts.sellerFee);
    registry.close(listing.key);

    const receipt: LocalPurchaseReceipt = {
      key: listing.key,
      seller: listing.seller,
      buyer: buyer.toLowerCase(),
      recipient: recipient.toLowerCase(),
      price: listing.price,
      ...amounts,
    };
    this.deps.events.append({ type: MarketEventType.LOCAL_PURCHASE_SETTLED, ...receipt });
    this.deps.log.info('LocalSettlement', 'Local purchase settled', { ...receipt });
    return receipt;
  }
}
