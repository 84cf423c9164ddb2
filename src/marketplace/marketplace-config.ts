/**
 * Access & Trust Configuration
 *
 * Owner-gated state of one marketplace instance: the approved asset
 * contracts, the trusted peer marketplace on every other ledger, the fee
 * rate and the conversion policy. Components hold a reference to this
 * object and read it on every call.
 */

import { normalizeAddress, normalizeAddressBytes } from '../ledger/address';
import { Address, ChainId, Journaled } from '../ledger/types';
import { MarketplaceError } from './errors';
import { isValidBps } from './fee-policy';
import { ConversionPolicy } from './types';

export const DEFAULT_CONVERSION_POLICY: ConversionPolicy = {
  roundTripCostBps: 60,
  toleranceBps: 50,
  poolFee: 3000,
  swapDeadlineSeconds: 15 * 60,
  allowUnboundedSwaps: false,
};

export interface MarketplaceConfigInit {
  owner: Address;
  feeBps?: number;
  conversion?: Partial<ConversionPolicy>;
  approvedAssets?: Address[];
  trustedPeers?: Array<[ChainId, string]>;
}

interface ConfigState {
  owner: Address;
  feeBps: number;
  conversion: ConversionPolicy;
  approvedAssets: Set<Address>;
  trustedPeers: Map<ChainId, string>;
}

export function validateConversionPolicy(policy: ConversionPolicy): void {
  const problems: string[] = [];
  if (!isValidBps(policy.roundTripCostBps) || policy.roundTripCostBps >= 10_000) {
    problems.push(`roundTripCostBps ${policy.roundTripCostBps}`);
  }
  if (!isValidBps(policy.toleranceBps) || policy.toleranceBps >= 10_000) {
    problems.push(`toleranceBps ${policy.toleranceBps}`);
  }
  if (!Number.isInteger(policy.poolFee) || policy.poolFee < 0 || policy.poolFee >= 1_000_000) {
    problems.push(`poolFee ${policy.poolFee}`);
  }
  if (!Number.isInteger(policy.swapDeadlineSeconds) || policy.swapDeadlineSeconds <= 0) {
    problems.push(`swapDeadlineSeconds ${policy.swapDeadlineSeconds}`);
  }
  if (problems.length > 0) {
    throw new MarketplaceError('InvalidConfiguration', `Invalid conversion policy: ${problems.join(', ')}`);
  }
}

export class MarketplaceConfig implements Journaled {
  private state: ConfigState;

  constructor(init: MarketplaceConfigInit) {
    const conversion = { ...DEFAULT_CONVERSION_POLICY, ...init.conversion };
    validateConversionPolicy(conversion);
    const feeBps = init.feeBps ?? 0;
    if (!isValidBps(feeBps)) {
      throw new MarketplaceError('InvalidConfiguration', `Invalid fee ${feeBps} bps`);
    }

    this.state = {
      owner: normalizeAddress(init.owner),
      feeBps,
      conversion,
      approvedAssets: new Set((init.approvedAssets ?? []).map(normalizeAddress)),
      trustedPeers: new Map(
        (init.trustedPeers ?? []).map(([chainId, peer]): [ChainId, string] => [chainId, normalizeAddressBytes(peer)])
      ),
    };
  }

  get owner(): Address {
    return this.state.owner;
  }

  get feeBps(): number {
    return this.state.feeBps;
  }

  requireOwner(caller: Address): void {
    if (caller.toLowerCase() !== this.state.owner) {
      throw new MarketplaceError('Unauthorized', `${caller} is not the marketplace owner`);
    }
  }

  transferOwnership(caller: Address, newOwner: Address): void {
    this.requireOwner(caller);
    this.state.owner = normalizeAddress(newOwner);
  }

  // ============================================================
  // APPROVED ASSET CONTRACTS
  // ============================================================

  isApprovedAsset(assetContract: Address): boolean {
    return this.state.approvedAssets.has(assetContract.toLowerCase());
  }

  approvedAssets(): Address[] {
    return Array.from(this.state.approvedAssets).sort();
  }

  addApprovedAsset(caller: Address, assetContract: Address): void {
    this.requireOwner(caller);
    this.state.approvedAssets.add(normalizeAddress(assetContract));
  }

  removeApprovedAsset(caller: Address, assetContract: Address): void {
    this.requireOwner(caller);
    this.state.approvedAssets.delete(assetContract.toLowerCase());
  }

  // ============================================================
  // TRUSTED PEERS
  // ============================================================

  getTrustedPeer(chainId: ChainId): string | undefined {
    return this.state.trustedPeers.get(chainId);
  }

  trustedPeers(): Array<[ChainId, string]> {
    return Array.from(this.state.trustedPeers.entries()).sort((a, b) => a[0] - b[0]);
  }

  setTrustedPeer(caller: Address, chainId: ChainId, peer: string): void {
    this.requireOwner(caller);
    if (!Number.isInteger(chainId) || chainId <= 0) {
      throw new MarketplaceError('InvalidConfiguration', `Invalid chain id ${chainId}`);
    }
    this.state.trustedPeers.set(chainId, normalizeAddressBytes(peer));
  }

  removeTrustedPeer(caller: Address, chainId: ChainId): void {
    this.requireOwner(caller);
    this.state.trustedPeers.delete(chainId);
  }

  // ============================================================
  // FEES & CONVERSION
  // ============================================================

  setFeeBps(caller: Address, feeBps: number): void {
    this.requireOwner(caller);
    if (!isValidBps(feeBps)) {
      throw new MarketplaceError('InvalidConfiguration', `Invalid fee ${feeBps} bps`);
    }
    this.state.feeBps = feeBps;
  }

  conversionPolicy(): ConversionPolicy {
    return { ...this.state.conversion };
  }

  setConversionPolicy(caller: Address, patch: Partial<ConversionPolicy>): ConversionPolicy {
    this.requireOwner(caller);
    const next = { ...this.state.conversion, ...patch };
    validateConversionPolicy(next);
    this.state.conversion = next;
    return { ...next };
  }

  checkpoint(): () => void {
    const saved = this.cloneState();
    return () => {
      this.state = {
        ...saved,
        conversion: { ...saved.conversion },
        approvedAssets: new Set(saved.approvedAssets),
        trustedPeers: new Map(saved.trustedPeers),
      };
    };
  }

  private cloneState(): ConfigState {
    return {
      owner: this.state.owner,
      feeBps: this.state.feeBps,
      conversion: { ...this.state.conversion },
      approvedAssets: new Set(this.state.approvedAssets),
      trustedPeers: new Map(this.state.trustedPeers),
    };
  }
}
