/**
 * Marketplace Event Log
 *
 * Append-only, hash-chained record of everything a marketplace instance
 * did. Each event links to the previous event's hash; the hash is a
 * domain-separated SHA-256 over the canonical CBOR of the event body.
 *
 * The log is journaled with the ledger: events appended by a call that
 * reverts disappear with it, the way logs of a reverted transaction do.
 */

import { domainHash } from '../crypto';
import { Address, ChainId, Journaled } from '../ledger/types';
import { MarketplaceErrorCode } from './errors';
import { ListingStatus } from './types';

export const MARKET_EVENT_DOMAIN = 'MARKET_EVT_V1_SHA256';

export enum MarketEventType {
  LISTING_CREATED = 'LISTING_CREATED',
  LISTING_PRICE_UPDATED = 'LISTING_PRICE_UPDATED',
  LISTING_CANCELLED = 'LISTING_CANCELLED',

  LOCAL_PURCHASE_SETTLED = 'LOCAL_PURCHASE_SETTLED',

  CROSSCHAIN_PURCHASE_DISPATCHED = 'CROSSCHAIN_PURCHASE_DISPATCHED',
  CROSSCHAIN_PURCHASE_FINALIZED = 'CROSSCHAIN_PURCHASE_FINALIZED',
  CROSSCHAIN_FINALIZATION_FAILED = 'CROSSCHAIN_FINALIZATION_FAILED',
  CROSSCHAIN_FAILURE_REFUNDED = 'CROSSCHAIN_FAILURE_REFUNDED',
  CROSSCHAIN_DELIVERY_REJECTED = 'CROSSCHAIN_DELIVERY_REJECTED',
  BRIDGED_FUNDS_RECOVERED = 'BRIDGED_FUNDS_RECOVERED',

  FEES_WITHDRAWN = 'FEES_WITHDRAWN',
  CONFIG_UPDATED = 'CONFIG_UPDATED',
}

export interface ListingCreatedPayload {
  type: MarketEventType.LISTING_CREATED;
  key: string;
  seller: Address;
  assetContract: Address;
  assetId: bigint;
  price: bigint;
  status: ListingStatus;
}

export interface ListingPriceUpdatedPayload {
  type: MarketEventType.LISTING_PRICE_UPDATED;
  key: string;
  oldPrice: bigint;
  newPrice: bigint;
  updatedBy: Address;
}

export interface ListingCancelledPayload {
  type: MarketEventType.LISTING_CANCELLED;
  key: string;
  cancelledBy: Address;
}

export interface LocalPurchaseSettledPayload {
  type: MarketEventType.LOCAL_PURCHASE_SETTLED;
  key: string;
  seller: Address;
  buyer: Address;
  recipient: Address;
  price: bigint;
  sellerFee: bigint;
  sellerProceeds: bigint;
}

export interface CrossChainPurchaseDispatchedPayload {
  type: MarketEventType.CROSSCHAIN_PURCHASE_DISPATCHED;
  key: string;
  buyer: Address;
  recipient: Address;
  dstChainId: ChainId;
  messageId: string;
  nonce: bigint;
  price: bigint;
  stableAmount: bigint;
  relayFee: bigint;
}

export interface CrossChainPurchaseFinalizedPayload {
  type: MarketEventType.CROSSCHAIN_PURCHASE_FINALIZED;
  key: string;
  srcChainId: ChainId;
  nonce: bigint;
  seller: Address;
  recipient: Address;
  stableAmount: bigint;
  realizedWrapped: bigint;
  sellerFee: bigint;
  sellerProceeds: bigint;
  /** Set when an owner retry settled a previously failed delivery. */
  failureId: string | null;
}

export interface CrossChainFinalizationFailedPayload {
  type: MarketEventType.CROSSCHAIN_FINALIZATION_FAILED;
  key: string;
  failureId: string;
  srcChainId: ChainId;
  nonce: bigint;
  stableAmount: bigint;
  reason: MarketplaceErrorCode;
  message: string;
}

export interface CrossChainFailureRefundedPayload {
  type: MarketEventType.CROSSCHAIN_FAILURE_REFUNDED;
  failureId: string;
  key: string;
  to: Address;
  stableAmount: bigint;
}

export interface CrossChainDeliveryRejectedPayload {
  type: MarketEventType.CROSSCHAIN_DELIVERY_REJECTED;
  key: string;
  deliveryId: string;
  srcChainId: ChainId;
  nonce: bigint;
  stableAmount: bigint;
  reason: MarketplaceErrorCode;
}

export interface BridgedFundsRecoveredPayload {
  type: MarketEventType.BRIDGED_FUNDS_RECOVERED;
  deliveryId: string;
  key: string;
  to: Address;
  amount: bigint;
}

export interface FeesWithdrawnPayload {
  type: MarketEventType.FEES_WITHDRAWN;
  to: Address;
  amount: bigint;
}

export type ConfigSetting = 'owner' | 'approvedAsset' | 'trustedPeer' | 'feeBps' | 'conversionPolicy';

export interface ConfigUpdatedPayload {
  type: MarketEventType.CONFIG_UPDATED;
  setting: ConfigSetting;
  action: 'set' | 'removed';
  value: string;
  updatedBy: Address;
}

export type MarketEventPayload =
  | ListingCreatedPayload
  | ListingPriceUpdatedPayload
  | ListingCancelledPayload
  | LocalPurchaseSettledPayload
  | CrossChainPurchaseDispatchedPayload
  | CrossChainPurchaseFinalizedPayload
  | CrossChainFinalizationFailedPayload
  | CrossChainFailureRefundedPayload
  | CrossChainDeliveryRejectedPayload
  | BridgedFundsRecoveredPayload
  | FeesWithdrawnPayload
  | ConfigUpdatedPayload;

export type PayloadOf<T extends MarketEventType> = Extract<MarketEventPayload, { type: T }>;

export interface MarketEvent<P extends MarketEventPayload = MarketEventPayload> {
  sequenceNumber: number;
  prevEventHash: string;
  eventHash: string;
  chainId: ChainId;
  /** Ledger clock (unix seconds) when the event was recorded. */
  recordedAt: number;
  payload: P;
}

export function computeEventHash(event: Omit<MarketEvent, 'eventHash'>): string {
  return domainHash(MARKET_EVENT_DOMAIN, {
    prevEventHash: event.prevEventHash,
    sequenceNumber: event.sequenceNumber,
    chainId: event.chainId,
    recordedAt: event.recordedAt,
    payload: event.payload,
  });
}

export class MarketplaceEventLog implements Journaled {
  private chainId: ChainId;
  private clock: () => number;
  private events: MarketEvent[] = [];

  constructor(chainId: ChainId, clock: () => number) {
    this.chainId = chainId;
    this.clock = clock;
  }

  append(payload: MarketEventPayload): MarketEvent {
    const prev = this.events[this.events.length - 1];
    const body = {
      sequenceNumber: this.events.length + 1,
      prevEventHash: prev ? prev.eventHash : '',
      chainId: this.chainId,
      recordedAt: this.clock(),
      payload,
    };
    const event: MarketEvent = { ...body, eventHash: computeEventHash(body) };
    this.events.push(event);
    return event;
  }

  getEvents(): MarketEvent[] {
    return [...this.events];
  }

  getEventsByType<T extends MarketEventType>(type: T): Array<MarketEvent<PayloadOf<T>>> {
    return this.events.filter((e): e is MarketEvent<PayloadOf<T>> => e.payload.type === type);
  }

  getEvent(eventHash: string): MarketEvent | null {
    return this.events.find(e => e.eventHash === eventHash) ?? null;
  }

  latest(): MarketEvent | null {
    return this.events[this.events.length - 1] ?? null;
  }

  size(): number {
    return this.events.length;
  }

  /**
   * Recompute every hash and link. False if any event was altered.
   */
  verifyHashChain(): boolean {
    let prevHash = '';
    for (let i = 0; i < this.events.length; i++) {
      const event = this.events[i];
      if (event.sequenceNumber !== i + 1) return false;
      if (event.prevEventHash !== prevHash) return false;
      if (computeEventHash(event) !== event.eventHash) return false;
      prevHash = event.eventHash;
    }
    return true;
  }

  checkpoint(): () => void {
    const length = this.events.length;
    return () => {
      this.events = this.events.slice(0, length);
    };
  }
}
