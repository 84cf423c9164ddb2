/**
 * Cross-Chain Outbound Initiator
 *
 * Runs on the buyer's ledger. Converts the purchase price from native to
 * the stable asset and hands it, together with the purchase payload, to
 * the relay for the listing's home ledger. The listing itself lives on
 * the other ledger and is not consulted here; the home marketplace
 * decides whether the purchase still stands when the packet arrives.
 */

import { Ledger } from '../ledger/ledger';
import { SwapVenue } from '../ledger/swap-venue';
import { Address, ChainId } from '../ledger/types';
import { StructuredLogger } from '../logging/structured-logger';
import { MarketplaceError, toMarketplaceError } from '../marketplace/errors';
import { MarketEventType, MarketplaceEventLog } from '../marketplace/event-log';
import { ListingRegistry } from '../marketplace/listing-registry';
import { requirePositivePrice } from '../marketplace/inputs';
import { MarketplaceConfig } from '../marketplace/marketplace-config';
import { CrossChainPurchaseReceipt } from '../marketplace/types';
import { RelayEndpoint, RelayOptions, RelayReceipt } from '../relay/types';
import { encodePurchaseIntent } from './payload-codec';

export interface CrossChainPurchaseRequest {
  destChainId: ChainId;
  assetContract: Address;
  assetId: bigint;
  /** Receives the asset on the home ledger. */
  recipient: Address;
  /** Native amount converted and bridged; should match the listing price. */
  price: bigint;
  /** Swap floor for native → stable. */
  minStableOut: bigint;
  relayOptions?: RelayOptions;
}

export interface PurchaseQuote {
  price: bigint;
  relayFee: bigint;
  /** Minimum call value: price plus relay fee. */
  totalValue: bigint;
  payload: Buffer;
}

export interface OutboundInitiatorDeps {
  ledger: Ledger;
  config: MarketplaceConfig;
  events: MarketplaceEventLog;
  relay: RelayEndpoint;
  swapVenue: SwapVenue;
  stableToken: Address;
  self: Address;
  log: StructuredLogger;
}

export class OutboundInitiator {
  private deps: OutboundInitiatorDeps;

  constructor(deps: OutboundInitiatorDeps) {
    this.deps = deps;
  }

  quoteRelayFee(destChainId: ChainId, payload: Buffer, options?: RelayOptions): bigint {
    try {
      return this.deps.relay.quoteFee(destChainId, payload, options);
    } catch (error) {
      throw toMarketplaceError(error, 'RelayFailed');
    }
  }

  quotePurchase(request: CrossChainPurchaseRequest): PurchaseQuote {
    this.requirePeer(request.destChainId);
    const payload = encodePurchaseIntent(request);
    const relayFee = this.quoteRelayFee(request.destChainId, payload, request.relayOptions);
    return { price: request.price, relayFee, totalValue: request.price + relayFee, payload };
  }

  /**
   * `value` has already been moved to the marketplace. Anything above
   * price + quoted relay fee goes back to the buyer through the relay's
   * fee refund.
   */
  buyCrosschain(buyer: Address, value: bigint, request: CrossChainPurchaseRequest): CrossChainPurchaseReceipt {
    const { ledger, self, stableToken } = this.deps;
    const peer = this.requirePeer(request.destChainId);
    requirePositivePrice(request.price);

    const payload = encodePurchaseIntent(request);
    const relayFee = this.quoteRelayFee(request.destChainId, payload, request.relayOptions);
    if (value < request.price) {
      throw new MarketplaceError('InsufficientFunds', `Sent ${value}, price is ${request.price}`);
    }
    const relayValue = value - request.price;
    if (relayValue < relayFee) {
      throw new MarketplaceError(
        'InsufficientFunds',
        `Sent ${value}, needs price ${request.price} + relay fee ${relayFee}`,
        { price: request.price.toString(), relayFee: relayFee.toString() }
      );
    }

    const policy = this.deps.config.conversionPolicy();
    if (request.minStableOut <= 0n && !policy.allowUnboundedSwaps) {
      throw new MarketplaceError('SlippageFloorRequired', 'minStableOut must be > 0');
    }

    ledger.wrap(self, request.price);
    let stableAmount: bigint;
    try {
      stableAmount = this.deps.swapVenue.exactInputSingle(self, {
        tokenIn: ledger.wrappedNative,
        tokenOut: stableToken,
        fee: policy.poolFee,
        recipient: self,
        deadline: ledger.now() + policy.swapDeadlineSeconds,
        amountIn: request.price,
        amountOutMinimum: request.minStableOut,
      });
    } catch (error) {
      throw toMarketplaceError(error, 'SwapFailed');
    }

    let sent: RelayReceipt;
    try {
      sent = this.deps.relay.send(
        self,
        {
          dstChainId: request.destChainId,
          to: peer,
          token: stableToken,
          amount: stableAmount,
          payload,
          refundAddress: buyer,
          options: request.relayOptions,
        },
        relayValue
      );
    } catch (error) {
      throw toMarketplaceError(error, 'RelayFailed');
    }

    const receipt: CrossChainPurchaseReceipt = {
      key: ListingRegistry.keyFor(request.assetContract, request.assetId),
      dstChainId: request.destChainId,
      messageId: sent.messageId,
      nonce: sent.nonce,
      stableAmount,
      relayFee: sent.nativeFee,
    };
    this.deps.events.append({
      type: MarketEventType.CROSSCHAIN_PURCHASE_DISPATCHED,
      key: receipt.key,
      buyer: buyer.toLowerCase(),
      recipient: request.recipient.toLowerCase(),
      dstChainId: receipt.dstChainId,
      messageId: receipt.messageId,
      nonce: receipt.nonce,
      price: request.price,
      stableAmount,
      relayFee: receipt.relayFee,
    });
    this.deps.log.info('OutboundInitiator', 'Cross-chain purchase dispatched', {
      ...receipt,
      buyer,
      price: request.price,
    });
    return receipt;
  }

  private requirePeer(destChainId: ChainId): string {
    const peer = this.deps.config.getTrustedPeer(destChainId);
    if (!peer) {
      throw new MarketplaceError('UnknownDestination', `No trusted peer for chain ${destChainId}`, {
        destChainId,
      });
    }
    return peer;
  }
}
