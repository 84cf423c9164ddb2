/**
 * Cross-Chain Inbound Finalizer
 *
 * Runs on the listing's home ledger when the relay delivers a purchase.
 * By the time the callback runs the relay has already credited the
 * bridged stable amount to the marketplace.
 *
 * Deliveries that should never have happened (wrong caller, untrusted
 * source, wrong asset, unreadable payload, a repeated message) are
 * rejected by throwing: nothing is swapped or transferred and the relay
 * records the delivery as failed.
 *
 * A delivery for a listing that is no longer open for cross-chain sale
 * (the losing side of a race) is rejected without throwing, so that its
 * (source chain, nonce) stays burned. Its stable amount is held against a
 * RejectedDelivery record until the owner calls recoverBridgedFunds.
 *
 * A legitimate delivery whose settlement fails (swap below the floor,
 * asset transfer refused, proceeds short of the fee) does not throw. Its
 * effects are rolled back to a savepoint, the stable amount is held
 * against a FinalizationFailure record, and the owner resolves it later
 * with retryFinalization or refundFailure.
 */

import { domainHash } from '../crypto';
import { sameAddressBytes } from '../ledger/address';
import { Ledger } from '../ledger/ledger';
import { SwapVenue } from '../ledger/swap-venue';
import { Address, ChainId, Journaled } from '../ledger/types';
import { StructuredLogger } from '../logging/structured-logger';
import { transferAsset } from '../marketplace/asset-custody';
import { fromCollaboratorError, MarketplaceError, toMarketplaceError } from '../marketplace/errors';
import { MarketEventType, MarketplaceEventLog } from '../marketplace/event-log';
import { expectedConversionOutput, feeAmount, minimumOutput } from '../marketplace/fee-policy';
import { FeeVault } from '../marketplace/fee-vault';
import { ListingRegistry } from '../marketplace/listing-registry';
import { MarketplaceConfig } from '../marketplace/marketplace-config';
import {
  FinalizationFailure,
  FinalizationOutcome,
  Listing,
  ListingStatus,
  PurchaseIntent,
  RejectedDelivery,
} from '../marketplace/types';
import { InboundDelivery } from '../relay/types';
import { decodePurchaseIntent } from './payload-codec';

export const FAILURE_ID_DOMAIN = 'MARKET_FAILURE_V1';
export const REJECTED_DELIVERY_DOMAIN = 'MARKET_REJECTED_DELIVERY_V1';

export interface InboundFinalizerDeps {
  ledger: Ledger;
  config: MarketplaceConfig;
  registry: ListingRegistry;
  events: MarketplaceEventLog;
  fees: FeeVault;
  swapVenue: SwapVenue;
  stableToken: Address;
  /** Only this address may invoke the delivery callback. */
  relayEndpoint: Address;
  self: Address;
  log: StructuredLogger;
}

export interface RetryOptions {
  /** Replaces the policy floor for this attempt; zero needs `allowUnboundedSwaps`. */
  minOutputOverride?: bigint;
}

interface SettlementOrigin {
  srcChainId: ChainId;
  nonce: bigint;
  failureId: string | null;
}

function deliveryKey(srcChainId: ChainId, nonce: bigint): string {
  return `${srcChainId}:${nonce}`;
}

export class InboundFinalizer implements Journaled {
  private deps: InboundFinalizerDeps;
  private failures: Map<string, FinalizationFailure> = new Map();
  private rejected: Map<string, RejectedDelivery> = new Map();
  private seen: Set<string> = new Set();

  constructor(deps: InboundFinalizerDeps) {
    this.deps = deps;
  }

  receiveCrossChain(caller: Address, delivery: InboundDelivery): FinalizationOutcome {
    const { config, ledger } = this.deps;

    if (caller.toLowerCase() !== this.deps.relayEndpoint) {
      throw new MarketplaceError('UnauthorizedRelay', `${caller} is not the relay endpoint`);
    }
    const peer = config.getTrustedPeer(delivery.srcChainId);
    if (!peer || !sameAddressBytes(peer, delivery.srcAddress)) {
      throw new MarketplaceError(
        'UntrustedSender',
        `${delivery.srcAddress} is not the trusted peer for chain ${delivery.srcChainId}`,
        { srcChainId: delivery.srcChainId }
      );
    }
    if (delivery.token.toLowerCase() !== this.deps.stableToken) {
      throw new MarketplaceError('UnexpectedBridgeAsset', `Bridged token ${delivery.token} is not the stable asset`);
    }
    const id = deliveryKey(delivery.srcChainId, delivery.nonce);
    if (this.seen.has(id)) {
      throw new MarketplaceError('DuplicateDelivery', `Delivery ${id} was already processed`, {
        srcChainId: delivery.srcChainId,
        nonce: delivery.nonce.toString(),
      });
    }

    const intent = decodePurchaseIntent(delivery.payload);
    const listing = this.deps.registry.getListingFor(intent.assetContract, intent.assetId);
    this.seen.add(id);
    if (listing.status !== ListingStatus.ACTIVE_CROSSCHAIN) {
      return this.recordRejection(listing, intent, delivery);
    }

    const origin: SettlementOrigin = { srcChainId: delivery.srcChainId, nonce: delivery.nonce, failureId: null };
    const restore = ledger.checkpoint();
    try {
      return this.settle(listing, intent.recipient, delivery.amount, origin);
    } catch (error) {
      restore();
      const reason = fromCollaboratorError(error);
      if (!(reason instanceof MarketplaceError)) throw error;
      return this.recordFailure(listing, intent.recipient, delivery, reason);
    }
  }

  /**
   * Owner re-run of a failed finalization with the current listing and
   * policy. Throws (leaving the record open) if settlement fails again.
   */
  retryFinalization(caller: Address, failureId: string, opts: RetryOptions = {}): FinalizationOutcome {
    this.deps.config.requireOwner(caller);
    const failure = this.requireOpenFailure(failureId);
    const listing = this.deps.registry.getListing(failure.key);
    if (listing.status !== ListingStatus.ACTIVE_CROSSCHAIN) {
      throw new MarketplaceError('NotActiveCrossChainListing', `Listing ${failure.key} is no longer open`, {
        failureId,
        status: listing.status,
      });
    }

    const outcome = this.settle(
      listing,
      failure.recipient,
      failure.stableAmount,
      { srcChainId: failure.srcChainId, nonce: failure.nonce, failureId },
      opts.minOutputOverride
    );
    failure.status = 'retried';
    failure.resolvedAt = this.deps.ledger.now();
    return outcome;
  }

  /** Release the stable amount held by an open failure to `to`. */
  refundFailure(caller: Address, failureId: string, to: Address): FinalizationFailure {
    this.deps.config.requireOwner(caller);
    const failure = this.requireOpenFailure(failureId);
    this.deps.ledger.transferToken(this.deps.stableToken, this.deps.self, to, failure.stableAmount);
    failure.status = 'refunded';
    failure.resolvedAt = this.deps.ledger.now();

    this.deps.events.append({
      type: MarketEventType.CROSSCHAIN_FAILURE_REFUNDED,
      failureId,
      key: failure.key,
      to: to.toLowerCase(),
      stableAmount: failure.stableAmount,
    });
    this.deps.log.info('InboundFinalizer', 'Finalization failure refunded', {
      failureId,
      to,
      stableAmount: failure.stableAmount,
    });
    return { ...failure };
  }

  /**
   * Release the stable amount of a rejected delivery to `to`, or of every
   * rejected delivery still held when no id is given. Returns the total moved.
   */
  recoverBridgedFunds(caller: Address, to: Address, deliveryId?: string): bigint {
    this.deps.config.requireOwner(caller);
    const records = deliveryId === undefined ? this.heldRejections() : [this.requireHeldRejection(deliveryId)];
    if (records.length === 0) {
      throw new MarketplaceError('InsufficientFunds', 'No rejected delivery holds recoverable stable');
    }

    let moved = 0n;
    for (const record of records) {
      this.deps.ledger.transferToken(this.deps.stableToken, this.deps.self, to, record.stableAmount);
      record.status = 'recovered';
      record.recoveredTo = to.toLowerCase();
      record.resolvedAt = this.deps.ledger.now();
      moved += record.stableAmount;

      this.deps.events.append({
        type: MarketEventType.BRIDGED_FUNDS_RECOVERED,
        deliveryId: record.deliveryId,
        key: record.key,
        to: to.toLowerCase(),
        amount: record.stableAmount,
      });
    }
    this.deps.log.info('InboundFinalizer', 'Bridged funds recovered', { to, deliveries: records.length, amount: moved });
    return moved;
  }

  getRejectedDeliveries(): RejectedDelivery[] {
    return Array.from(this.rejected.values()).map(r => ({ ...r }));
  }

  getFinalizationFailures(): FinalizationFailure[] {
    return Array.from(this.failures.values()).map(f => ({ ...f }));
  }

  getFailure(failureId: string): FinalizationFailure | undefined {
    const failure = this.failures.get(failureId);
    return failure ? { ...failure } : undefined;
  }

  /** Stable held by open failures and unrecovered rejected deliveries. */
  heldStableBalance(): bigint {
    let held = 0n;
    for (const failure of this.failures.values()) {
      if (failure.status === 'open') held += failure.stableAmount;
    }
    for (const record of this.heldRejections()) held += record.stableAmount;
    return held;
  }

  checkpoint(): () => void {
    const failures = new Map<string, FinalizationFailure>();
    for (const [id, failure] of this.failures) failures.set(id, { ...failure });
    const rejected = new Map<string, RejectedDelivery>();
    for (const [id, record] of this.rejected) rejected.set(id, { ...record });
    const seen = new Set(this.seen);
    return () => {
      this.failures = new Map();
      for (const [id, failure] of failures) this.failures.set(id, { ...failure });
      this.rejected = new Map();
      for (const [id, record] of rejected) this.rejected.set(id, { ...record });
      this.seen = new Set(seen);
    };
  }

  private settle(
    listing: Listing,
    recipient: Address,
    stableAmount: bigint,
    origin: SettlementOrigin,
    minOutputOverride?: bigint
  ): FinalizationOutcome {
    const { ledger, config, self } = this.deps;
    const policy = config.conversionPolicy();
    const floor = minOutputOverride ?? minimumOutput(expectedConversionOutput(listing.price, policy), policy.toleranceBps);
    if (floor <= 0n && !policy.allowUnboundedSwaps) {
      throw new MarketplaceError('SlippageFloorRequired', 'Conversion floor must be > 0');
    }

    let realizedWrapped: bigint;
    try {
      realizedWrapped = this.deps.swapVenue.exactInputSingle(self, {
        tokenIn: this.deps.stableToken,
        tokenOut: ledger.wrappedNative,
        fee: policy.poolFee,
        recipient: self,
        deadline: ledger.now() + policy.swapDeadlineSeconds,
        amountIn: stableAmount,
        amountOutMinimum: floor,
      });
    } catch (error) {
      throw toMarketplaceError(error, 'SwapFailed');
    }
    ledger.unwrap(self, realizedWrapped);

    transferAsset(ledger, self, listing.assetContract, listing.seller, recipient, listing.assetId);

    const sellerFee = feeAmount(listing.price, config.feeBps);
    if (realizedWrapped < sellerFee) {
      throw new MarketplaceError('InsufficientFunds', `Realized ${realizedWrapped} does not cover fee ${sellerFee}`);
    }
    const sellerProceeds = realizedWrapped - sellerFee;
    ledger.transfer(self, listing.seller, sellerProceeds);
    this.deps.fees.accrue(sellerFee);
    this.deps.registry.close(listing.key);

    this.deps.events.append({
      type: MarketEventType.CROSSCHAIN_PURCHASE_FINALIZED,
      key: listing.key,
      srcChainId: origin.srcChainId,
      nonce: origin.nonce,
      seller: listing.seller,
      recipient: recipient.toLowerCase(),
      stableAmount,
      realizedWrapped,
      sellerFee,
      sellerProceeds,
      failureId: origin.failureId,
    });
    this.deps.log.info('InboundFinalizer', 'Cross-chain purchase finalized', {
      key: listing.key,
      srcChainId: origin.srcChainId,
      nonce: origin.nonce,
      realizedWrapped,
      sellerFee,
      sellerProceeds,
      failureId: origin.failureId,
    });

    return {
      status: 'finalized',
      key: listing.key,
      seller: listing.seller,
      recipient: recipient.toLowerCase(),
      realizedWrapped,
      sellerFee,
      sellerProceeds,
    };
  }

  private recordFailure(
    listing: Listing,
    recipient: Address,
    delivery: InboundDelivery,
    error: MarketplaceError
  ): FinalizationOutcome {
    const failureId = domainHash(FAILURE_ID_DOMAIN, {
      srcChainId: delivery.srcChainId,
      nonce: delivery.nonce,
      key: listing.key,
    });
    const failure: FinalizationFailure = {
      failureId,
      key: listing.key,
      srcChainId: delivery.srcChainId,
      nonce: delivery.nonce,
      stableAmount: delivery.amount,
      recipient: recipient.toLowerCase(),
      reason: error.code,
      message: error.message,
      failedAt: this.deps.ledger.now(),
      status: 'open',
    };
    this.failures.set(failureId, failure);

    this.deps.events.append({
      type: MarketEventType.CROSSCHAIN_FINALIZATION_FAILED,
      key: listing.key,
      failureId,
      srcChainId: delivery.srcChainId,
      nonce: delivery.nonce,
      stableAmount: delivery.amount,
      reason: error.code,
      message: error.message,
    });
    this.deps.log.warn('InboundFinalizer', 'Cross-chain finalization failed; stable amount held', {
      failureId,
      key: listing.key,
      srcChainId: delivery.srcChainId,
      nonce: delivery.nonce,
      stableAmount: delivery.amount,
      reason: error.code,
      error: error.message,
    });

    return { status: 'failed', key: listing.key, failureId, reason: error.code };
  }

  private recordRejection(listing: Listing, intent: PurchaseIntent, delivery: InboundDelivery): FinalizationOutcome {
    const reason = 'NotActiveCrossChainListing';
    const deliveryId = domainHash(REJECTED_DELIVERY_DOMAIN, {
      srcChainId: delivery.srcChainId,
      nonce: delivery.nonce,
    });
    this.rejected.set(deliveryId, {
      deliveryId,
      key: listing.key,
      srcChainId: delivery.srcChainId,
      nonce: delivery.nonce,
      stableAmount: delivery.amount,
      recipient: intent.recipient.toLowerCase(),
      reason,
      rejectedAt: this.deps.ledger.now(),
      status: 'held',
    });

    this.deps.events.append({
      type: MarketEventType.CROSSCHAIN_DELIVERY_REJECTED,
      key: listing.key,
      deliveryId,
      srcChainId: delivery.srcChainId,
      nonce: delivery.nonce,
      stableAmount: delivery.amount,
      reason,
    });
    this.deps.log.warn('InboundFinalizer', 'Cross-chain delivery rejected; listing not open', {
      deliveryId,
      key: listing.key,
      status: listing.status,
      srcChainId: delivery.srcChainId,
      nonce: delivery.nonce,
      stableAmount: delivery.amount,
    });

    return { status: 'rejected', key: listing.key, deliveryId, reason };
  }

  private heldRejections(): RejectedDelivery[] {
    return Array.from(this.rejected.values()).filter(r => r.status === 'held');
  }

  private requireHeldRejection(deliveryId: string): RejectedDelivery {
    const record = this.rejected.get(deliveryId);
    if (!record) {
      throw new MarketplaceError('UnknownDelivery', `No rejected delivery ${deliveryId}`);
    }
    if (record.status !== 'held') {
      throw new MarketplaceError('FailureAlreadyResolved', `Rejected delivery ${deliveryId} was already recovered`);
    }
    return record;
  }

  private requireOpenFailure(failureId: string): FinalizationFailure {
    const failure = this.failures.get(failureId);
    if (!failure) {
      throw new MarketplaceError('UnknownFailure', `No finalization failure ${failureId}`);
    }
    if (failure.status !== 'open') {
      throw new MarketplaceError('FailureAlreadyResolved', `Failure ${failureId} is already ${failure.status}`);
    }
    return failure;
  }
}
