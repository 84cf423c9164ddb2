/**
 * Marketplace
 *
 * One deployed marketplace instance on one ledger. Composes the listing
 * registry, both settlement paths and the owner-gated configuration, and
 * runs every state-changing entry point as a single ledger call: either
 * the whole call happens or none of it does.
 */

import { InboundFinalizer, RetryOptions } from '../crosschain/inbound-finalizer';
import {
  CrossChainPurchaseRequest,
  OutboundInitiator,
  PurchaseQuote,
} from '../crosschain/outbound-initiator';
import { deriveAddress, normalizeAddress } from '../ledger/address';
import { Ledger } from '../ledger/ledger';
import { SwapVenue } from '../ledger/swap-venue';
import { Address, ChainId } from '../ledger/types';
import { logger, StructuredLogger } from '../logging/structured-logger';
import { InboundDelivery, RelayEndpoint, RelayOptions, RelayReceiver } from '../relay/types';
import { fromCollaboratorError } from './errors';
import { ConfigSetting, MarketEventType, MarketplaceEventLog } from './event-log';
import { FeeVault } from './fee-vault';
import { requireAddress, requireAddressBytes, requirePositivePrice } from './inputs';
import { ListingRegistry } from './listing-registry';
import { LocalSettlementProcessor } from './local-settlement';
import { MarketplaceConfig } from './marketplace-config';
import {
  ConversionPolicy,
  CrossChainPurchaseReceipt,
  FinalizationFailure,
  FinalizationOutcome,
  Listing,
  LocalPurchaseReceipt,
  RejectedDelivery,
} from './types';

export interface MarketplaceOptions {
  ledger: Ledger;
  /** Defaults to an address derived from the ledger name. */
  address?: Address;
  owner: Address;
  stableToken: Address;
  swapVenue: SwapVenue;
  relay: RelayEndpoint;
  feeBps?: number;
  conversion?: Partial<ConversionPolicy>;
  approvedAssets?: Address[];
  trustedPeers?: Array<[ChainId, string]>;
}

export class Marketplace implements RelayReceiver {
  readonly address: Address;
  readonly ledger: Ledger;
  readonly stableToken: Address;
  readonly config: MarketplaceConfig;
  readonly events: MarketplaceEventLog;

  private fees: FeeVault;
  private registry: ListingRegistry;
  private local: LocalSettlementProcessor;
  private outbound: OutboundInitiator;
  private inbound: InboundFinalizer;
  private log: StructuredLogger;

  constructor(opts: MarketplaceOptions) {
    this.ledger = opts.ledger;
    this.address = normalizeAddress(opts.address ?? deriveAddress(`${opts.ledger.name}:marketplace`));
    this.stableToken = normalizeAddress(opts.stableToken);
    this.log = logger.child({ chainId: opts.ledger.chainId, marketplace: this.address });

    this.config = new MarketplaceConfig({
      owner: opts.owner,
      feeBps: opts.feeBps,
      conversion: opts.conversion,
      approvedAssets: opts.approvedAssets,
      trustedPeers: opts.trustedPeers,
    });
    this.events = new MarketplaceEventLog(opts.ledger.chainId, () => opts.ledger.now());
    this.fees = new FeeVault(opts.ledger, this.address);

    const shared = {
      ledger: opts.ledger,
      config: this.config,
      events: this.events,
      self: this.address,
      log: this.log,
    };
    this.registry = new ListingRegistry(shared);
    this.local = new LocalSettlementProcessor({ ...shared, registry: this.registry, fees: this.fees });
    this.outbound = new OutboundInitiator({
      ...shared,
      relay: opts.relay,
      swapVenue: opts.swapVenue,
      stableToken: this.stableToken,
    });
    this.inbound = new InboundFinalizer({
      ...shared,
      registry: this.registry,
      fees: this.fees,
      swapVenue: opts.swapVenue,
      stableToken: this.stableToken,
      relayEndpoint: normalizeAddress(opts.relay.address),
    });

    opts.ledger.attach(this.config, this.events, this.fees, this.registry, this.inbound);
    opts.relay.registerReceiver(this.address, this);
  }

  get chainId(): ChainId {
    return this.ledger.chainId;
  }

  // ============================================================
  // LISTINGS
  // ============================================================

  async list(
    caller: Address,
    assetContract: Address,
    assetId: bigint,
    price: bigint,
    crossChainEnabled: boolean
  ): Promise<Listing> {
    const seller = requireAddress(caller, 'caller');
    const contract = requireAddress(assetContract, 'assetContract');
    return this.call(seller, 0n, () => this.registry.list(seller, contract, assetId, price, crossChainEnabled));
  }

  async editPrice(caller: Address, assetContract: Address, assetId: bigint, newPrice: bigint): Promise<Listing> {
    const seller = requireAddress(caller, 'caller');
    const contract = requireAddress(assetContract, 'assetContract');
    return this.call(seller, 0n, () => this.registry.editPrice(seller, contract, assetId, newPrice));
  }

  async delist(caller: Address, assetContract: Address, assetId: bigint): Promise<Listing> {
    const seller = requireAddress(caller, 'caller');
    const contract = requireAddress(assetContract, 'assetContract');
    return this.call(seller, 0n, () => this.registry.delist(seller, contract, assetId));
  }

  getListing(key: string): Listing {
    return this.registry.getListing(key);
  }

  getListingFor(assetContract: Address, assetId: bigint): Listing {
    return this.registry.getListingFor(assetContract, assetId);
  }

  activeListings(): Listing[] {
    return this.registry.activeListings();
  }

  // ============================================================
  // PURCHASES
  // ============================================================

  async buyLocal(
    buyer: Address,
    value: bigint,
    assetContract: Address,
    assetId: bigint,
    recipient: Address
  ): Promise<LocalPurchaseReceipt> {
    const from = requireAddress(buyer, 'buyer');
    const contract = requireAddress(assetContract, 'assetContract');
    const to = requireAddress(recipient, 'recipient');
    return this.call(from, value, () => this.local.buyLocal(from, value, contract, assetId, to));
  }

  quoteRelayFee(destChainId: ChainId, payload: Buffer, options?: RelayOptions): bigint {
    return this.outbound.quoteRelayFee(destChainId, payload, options);
  }

  quotePurchase(request: CrossChainPurchaseRequest): PurchaseQuote {
    return this.outbound.quotePurchase(this.checkedRequest(request));
  }

  async buyCrosschain(
    buyer: Address,
    value: bigint,
    request: CrossChainPurchaseRequest
  ): Promise<CrossChainPurchaseReceipt> {
    const from = requireAddress(buyer, 'buyer');
    const checked = this.checkedRequest(request);
    return this.call(from, value, () => this.outbound.buyCrosschain(from, value, checked));
  }

  /** Relay delivery callback. */
  async receiveCrossChain(caller: Address, delivery: InboundDelivery): Promise<FinalizationOutcome> {
    return this.call(caller, 0n, () => this.inbound.receiveCrossChain(caller, delivery));
  }

  // ============================================================
  // RECONCILIATION
  // ============================================================

  getFinalizationFailures(): FinalizationFailure[] {
    return this.inbound.getFinalizationFailures();
  }

  getFailure(failureId: string): FinalizationFailure | undefined {
    return this.inbound.getFailure(failureId);
  }

  async retryFinalization(caller: Address, failureId: string, opts?: RetryOptions): Promise<FinalizationOutcome> {
    return this.call(caller, 0n, () => this.inbound.retryFinalization(caller, failureId, opts));
  }

  async refundFailure(caller: Address, failureId: string, to: Address): Promise<FinalizationFailure> {
    const dst = requireAddress(to, 'to');
    return this.call(caller, 0n, () => this.inbound.refundFailure(caller, failureId, dst));
  }

  getRejectedDeliveries(): RejectedDelivery[] {
    return this.inbound.getRejectedDeliveries();
  }

  async recoverBridgedFunds(caller: Address, to: Address, deliveryId?: string): Promise<bigint> {
    const dst = requireAddress(to, 'to');
    return this.call(caller, 0n, () => this.inbound.recoverBridgedFunds(caller, dst, deliveryId));
  }

  heldStableBalance(): bigint {
    return this.inbound.heldStableBalance();
  }

  // ============================================================
  // FEES
  // ============================================================

  accruedFees(): bigint {
    return this.fees.balance();
  }

  async withdrawFees(caller: Address, to: Address): Promise<bigint> {
    const dst = requireAddress(to, 'to');
    return this.call(caller, 0n, () => {
      this.config.requireOwner(caller);
      const amount = this.fees.withdraw(dst);
      this.events.append({ type: MarketEventType.FEES_WITHDRAWN, to: dst, amount });
      this.log.info('Marketplace', 'Fees withdrawn', { to: dst, amount });
      return amount;
    });
  }

  // ============================================================
  // CONFIGURATION (owner only)
  // ============================================================

  async addApprovedAsset(caller: Address, assetContract: Address): Promise<void> {
    const contract = requireAddress(assetContract, 'assetContract');
    return this.call(caller, 0n, () => {
      this.config.addApprovedAsset(caller, contract);
      this.configUpdated(caller, 'approvedAsset', 'set', contract);
    });
  }

  async removeApprovedAsset(caller: Address, assetContract: Address): Promise<void> {
    const contract = requireAddress(assetContract, 'assetContract');
    return this.call(caller, 0n, () => {
      this.config.removeApprovedAsset(caller, contract);
      this.configUpdated(caller, 'approvedAsset', 'removed', contract);
    });
  }

  async setTrustedPeer(caller: Address, chainId: ChainId, peer: string): Promise<void> {
    const bytes = requireAddressBytes(peer, 'peer');
    return this.call(caller, 0n, () => {
      this.config.setTrustedPeer(caller, chainId, bytes);
      this.configUpdated(caller, 'trustedPeer', 'set', `${chainId}=${bytes}`);
    });
  }

  async removeTrustedPeer(caller: Address, chainId: ChainId): Promise<void> {
    return this.call(caller, 0n, () => {
      this.config.removeTrustedPeer(caller, chainId);
      this.configUpdated(caller, 'trustedPeer', 'removed', String(chainId));
    });
  }

  async setFeeBps(caller: Address, feeBps: number): Promise<void> {
    return this.call(caller, 0n, () => {
      this.config.setFeeBps(caller, feeBps);
      this.configUpdated(caller, 'feeBps', 'set', String(feeBps));
    });
  }

  async setConversionPolicy(caller: Address, patch: Partial<ConversionPolicy>): Promise<ConversionPolicy> {
    return this.call(caller, 0n, () => {
      const policy = this.config.setConversionPolicy(caller, patch);
      this.configUpdated(caller, 'conversionPolicy', 'set', JSON.stringify(policy));
      return policy;
    });
  }

  async transferOwnership(caller: Address, newOwner: Address): Promise<void> {
    const owner = requireAddress(newOwner, 'newOwner');
    return this.call(caller, 0n, () => {
      this.config.transferOwnership(caller, owner);
      this.configUpdated(caller, 'owner', 'set', owner);
    });
  }

  private configUpdated(caller: Address, setting: ConfigSetting, action: 'set' | 'removed', value: string): void {
    this.events.append({
      type: MarketEventType.CONFIG_UPDATED,
      setting,
      action,
      value,
      updatedBy: caller.toLowerCase(),
    });
    this.log.info('Marketplace', 'Configuration updated', { setting, action, value });
  }

  private checkedRequest(request: CrossChainPurchaseRequest): CrossChainPurchaseRequest {
    return {
      ...request,
      assetContract: requireAddress(request.assetContract, 'assetContract'),
      recipient: requireAddress(request.recipient, 'recipient'),
      price: requirePositivePrice(request.price),
    };
  }

  private async call<T>(sender: Address, value: bigint, fn: () => T): Promise<T> {
    try {
      return await this.ledger.execute({ sender, to: this.address, value }, fn);
    } catch (error) {
      throw fromCollaboratorError(error);
    }
  }
}
