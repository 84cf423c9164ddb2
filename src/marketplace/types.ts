/**
 * Marketplace Types
 *
 * Listing records, the conversion policy and the settlement results
 * shared by the local and cross-chain paths.
 */

import { Address, ChainId } from '../ledger/types';
import { MarketplaceErrorCode } from './errors';

export enum ListingStatus {
  INACTIVE = 'INACTIVE',
  ACTIVE_LOCAL = 'ACTIVE_LOCAL',
  ACTIVE_CROSSCHAIN = 'ACTIVE_CROSSCHAIN',
}

export interface Listing {
  /** hash(assetContract, assetId) */
  key: string;
  seller: Address;
  assetContract: Address;
  assetId: bigint;
  /** In the home ledger's native unit (wei). */
  price: bigint;
  status: ListingStatus;
}

/**
 * How bridged value is converted back on the home ledger.
 *
 * The expected wrapped-native output for a listing is
 * `price * (1 - roundTripCostBps)`; the swap floor sits `toleranceBps`
 * below it.
 */
export interface ConversionPolicy {
  roundTripCostBps: number;
  toleranceBps: number;
  /** Swap venue pool fee, hundredths of a basis point (3000 = 0.30%). */
  poolFee: number;
  swapDeadlineSeconds: number;
  /** Accept a zero minimum-output floor. Test configurations only. */
  allowUnboundedSwaps: boolean;
}

/** What travels inside the relay payload. */
export interface PurchaseIntent {
  assetContract: Address;
  assetId: bigint;
  recipient: Address;
}

export interface SettlementAmounts {
  sellerFee: bigint;
  sellerProceeds: bigint;
}

export interface LocalPurchaseReceipt extends SettlementAmounts {
  key: string;
  seller: Address;
  buyer: Address;
  recipient: Address;
  price: bigint;
}

export interface CrossChainPurchaseReceipt {
  key: string;
  dstChainId: ChainId;
  messageId: string;
  nonce: bigint;
  stableAmount: bigint;
  relayFee: bigint;
}

export type FinalizationFailureStatus = 'open' | 'retried' | 'refunded';

/**
 * Bridged value that arrived for a live cross-chain listing but could not
 * be settled. The stable amount stays in the marketplace until the record
 * is retried or refunded.
 */
export interface FinalizationFailure {
  failureId: string;
  key: string;
  srcChainId: ChainId;
  nonce: bigint;
  stableAmount: bigint;
  recipient: Address;
  reason: MarketplaceErrorCode;
  message: string;
  failedAt: number;
  status: FinalizationFailureStatus;
  resolvedAt?: number;
}

export type RejectedDeliveryStatus = 'held' | 'recovered';

/**
 * A delivery that arrived after its listing stopped accepting cross-chain
 * purchases. Its (source chain, nonce) is burned and the bridged stable
 * amount stays held until the owner recovers it.
 */
export interface RejectedDelivery {
  deliveryId: string;
  key: string;
  srcChainId: ChainId;
  nonce: bigint;
  stableAmount: bigint;
  recipient: Address;
  reason: MarketplaceErrorCode;
  rejectedAt: number;
  status: RejectedDeliveryStatus;
  recoveredTo?: Address;
  resolvedAt?: number;
}

export type FinalizationOutcome =
  | ({
      status: 'finalized';
      key: string;
      seller: Address;
      recipient: Address;
      realizedWrapped: bigint;
    } & SettlementAmounts)
  | {
      status: 'failed';
      key: string;
      failureId: string;
      reason: MarketplaceErrorCode;
    }
  | {
      status: 'rejected';
      key: string;
      deliveryId: string;
      reason: MarketplaceErrorCode;
    };
