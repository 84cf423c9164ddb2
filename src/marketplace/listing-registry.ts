/**
 * Listing Registry
 *
 * One listing per (asset contract, asset id). Re-listing overwrites
 * whatever the previous listing left behind; there is no history here,
 * the event log keeps that.
 *
 *   INACTIVE ──list──▶ ACTIVE_LOCAL | ACTIVE_CROSSCHAIN
 *   ACTIVE_* ──delist / purchase / finalization──▶ INACTIVE
 *   ACTIVE_* ──editPrice──▶ same status, new price
 */

import { domainHash } from '../crypto';
import { ZERO_ADDRESS } from '../ledger/address';
import { Ledger } from '../ledger/ledger';
import { Address, Journaled } from '../ledger/types';
import { StructuredLogger } from '../logging/structured-logger';
import { currentHolder } from './asset-custody';
import { MarketplaceError } from './errors';
import { MarketEventType, MarketplaceEventLog } from './event-log';
import { requirePositivePrice } from './inputs';
import { MarketplaceConfig } from './marketplace-config';
import { Listing, ListingStatus } from './types';

export const LISTING_KEY_DOMAIN = 'MARKET_LISTING_V1';

export interface ListingRegistryDeps {
  ledger: Ledger;
  config: MarketplaceConfig;
  events: MarketplaceEventLog;
  log: StructuredLogger;
}

function isActive(status: ListingStatus): boolean {
  return status === ListingStatus.ACTIVE_LOCAL || status === ListingStatus.ACTIVE_CROSSCHAIN;
}

export class ListingRegistry implements Journaled {
  private deps: ListingRegistryDeps;
  private listings: Map<string, Listing> = new Map();

  constructor(deps: ListingRegistryDeps) {
    this.deps = deps;
  }

  static keyFor(assetContract: Address, assetId: bigint): string {
    return domainHash(LISTING_KEY_DOMAIN, [assetContract.toLowerCase(), assetId]);
  }

  list(
    caller: Address,
    assetContract: Address,
    assetId: bigint,
    price: bigint,
    crossChainEnabled: boolean
  ): Listing {
    const contract = assetContract.toLowerCase();
    if (!this.deps.config.isApprovedAsset(contract) || !this.deps.ledger.getAssetContract(contract)) {
      throw new MarketplaceError('NotApprovedNFT', `Asset contract ${contract} is not approved`, {
        assetContract: contract,
      });
    }
    // Listing is gated on approval and holding together.
    if (!this.isHolder(caller, contract, assetId)) {
      throw new MarketplaceError('NotApprovedNFT', `${caller} does not hold ${contract} #${assetId}`, {
        assetContract: contract,
        assetId: assetId.toString(),
      });
    }
    requirePositivePrice(price);

    const listing: Listing = {
      key: ListingRegistry.keyFor(contract, assetId),
      seller: caller.toLowerCase(),
      assetContract: contract,
      assetId,
      price,
      status: crossChainEnabled ? ListingStatus.ACTIVE_CROSSCHAIN : ListingStatus.ACTIVE_LOCAL,
    };
    this.listings.set(listing.key, listing);

    this.deps.events.append({ type: MarketEventType.LISTING_CREATED, ...listing });
    this.deps.log.info('ListingRegistry', 'Listing created', {
      key: listing.key,
      seller: listing.seller,
      assetContract: contract,
      assetId,
      price,
      status: listing.status,
    });
    return { ...listing };
  }

  editPrice(caller: Address, assetContract: Address, assetId: bigint, newPrice: bigint): Listing {
    const contract = assetContract.toLowerCase();
    this.requireHolder(caller, contract, assetId);
    requirePositivePrice(newPrice);

    const key = ListingRegistry.keyFor(contract, assetId);
    const listing = this.listings.get(key);
    if (!listing || !isActive(listing.status)) {
      throw new MarketplaceError('ListingNotActive', `No active listing for ${contract} #${assetId}`, { key });
    }

    const oldPrice = listing.price;
    listing.price = newPrice;

    this.deps.events.append({
      type: MarketEventType.LISTING_PRICE_UPDATED,
      key,
      oldPrice,
      newPrice,
      updatedBy: caller.toLowerCase(),
    });
    this.deps.log.info('ListingRegistry', 'Listing price updated', { key, oldPrice, newPrice });
    return { ...listing };
  }

  /** Idempotent: delisting an inactive or absent listing succeeds without an event. */
  delist(caller: Address, assetContract: Address, assetId: bigint): Listing {
    const contract = assetContract.toLowerCase();
    this.requireHolder(caller, contract, assetId);

    const key = ListingRegistry.keyFor(contract, assetId);
    const listing = this.listings.get(key);
    if (!listing) return this.emptyListing(key);

    if (isActive(listing.status)) {
      listing.status = ListingStatus.INACTIVE;
      this.deps.events.append({
        type: MarketEventType.LISTING_CANCELLED,
        key,
        cancelledBy: caller.toLowerCase(),
      });
      this.deps.log.info('ListingRegistry', 'Listing cancelled', { key });
    }
    return { ...listing };
  }

  getListing(key: string): Listing {
    const listing = this.listings.get(key);
    return listing ? { ...listing } : this.emptyListing(key);
  }

  getListingFor(assetContract: Address, assetId: bigint): Listing {
    return this.getListing(ListingRegistry.keyFor(assetContract, assetId));
  }

  activeListings(): Listing[] {
    return Array.from(this.listings.values())
      .filter(l => isActive(l.status))
      .map(l => ({ ...l }));
  }

  /** Called by settlement once a purchase has completed. */
  close(key: string): void {
    const listing = this.listings.get(key);
    if (listing) listing.status = ListingStatus.INACTIVE;
  }

  checkpoint(): () => void {
    const saved = new Map<string, Listing>();
    for (const [key, listing] of this.listings) saved.set(key, { ...listing });
    return () => {
      this.listings = new Map();
      for (const [key, listing] of saved) this.listings.set(key, { ...listing });
    };
  }

  private isHolder(caller: Address, assetContract: Address, assetId: bigint): boolean {
    const holder = currentHolder(this.deps.ledger, assetContract, assetId);
    return holder !== null && holder === caller.toLowerCase();
  }

  private requireHolder(caller: Address, assetContract: Address, assetId: bigint): void {
    if (!this.isHolder(caller, assetContract, assetId)) {
      throw new MarketplaceError('NotTokenOwner', `${caller} does not hold ${assetContract} #${assetId}`, {
        assetContract,
        assetId: assetId.toString(),
      });
    }
  }

  private emptyListing(key: string): Listing {
    return {
      key,
      seller: ZERO_ADDRESS,
      assetContract: ZERO_ADDRESS,
      assetId: 0n,
      price: 0n,
      status: ListingStatus.INACTIVE,
    };
  }
}
