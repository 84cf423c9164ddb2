/**
 * Asset Contract
 *
 * The non-fungible asset primitive the marketplace settles against:
 * ownership query, standing operator approval, transfer-on-behalf.
 */

import { normalizeAddress } from './address';
import { Address, Journaled } from './types';

export interface AssetContract extends Journaled {
  readonly address: Address;
  ownerOf(assetId: bigint): Address;
  isApprovedForAll(owner: Address, operator: Address): boolean;
  setApprovalForAll(caller: Address, operator: Address, approved: boolean): void;
  /** `operator` must be the owner or approved for all of the owner's assets. */
  transferFrom(operator: Address, from: Address, to: Address, assetId: bigint): void;
}

export type AssetContractErrorCode =
  | 'NonexistentAsset'
  | 'AssetAlreadyMinted'
  | 'NotOwner'
  | 'NotApproved';

export class AssetContractError extends Error {
  readonly code: AssetContractErrorCode;

  constructor(code: AssetContractErrorCode, message: string) {
    super(message);
    this.name = 'AssetContractError';
    this.code = code;
  }
}

export class InMemoryAssetContract implements AssetContract {
  readonly address: Address;
  private owners: Map<bigint, Address> = new Map();
  private operatorApprovals: Map<Address, Set<Address>> = new Map();

  constructor(address: Address) {
    this.address = normalizeAddress(address);
  }

  mint(to: Address, assetId: bigint): void {
    if (this.owners.has(assetId)) {
      throw new AssetContractError('AssetAlreadyMinted', `Asset ${assetId} already exists`);
    }
    this.owners.set(assetId, normalizeAddress(to));
  }

  exists(assetId: bigint): boolean {
    return this.owners.has(assetId);
  }

  ownerOf(assetId: bigint): Address {
    const owner = this.owners.get(assetId);
    if (!owner) {
      throw new AssetContractError('NonexistentAsset', `Asset ${assetId} does not exist`);
    }
    return owner;
  }

  isApprovedForAll(owner: Address, operator: Address): boolean {
    return this.operatorApprovals.get(owner.toLowerCase())?.has(operator.toLowerCase()) ?? false;
  }

  setApprovalForAll(caller: Address, operator: Address, approved: boolean): void {
    const owner = normalizeAddress(caller);
    const op = normalizeAddress(operator);
    const approvals = this.operatorApprovals.get(owner) ?? new Set<Address>();
    if (approved) {
      approvals.add(op);
    } else {
      approvals.delete(op);
    }
    this.operatorApprovals.set(owner, approvals);
  }

  transferFrom(operator: Address, from: Address, to: Address, assetId: bigint): void {
    const owner = this.ownerOf(assetId);
    const src = normalizeAddress(from);
    if (owner !== src) {
      throw new AssetContractError('NotOwner', `Asset ${assetId} is held by ${owner}, not ${src}`);
    }
    const op = normalizeAddress(operator);
    if (op !== owner && !this.isApprovedForAll(owner, op)) {
      throw new AssetContractError('NotApproved', `${op} is not approved to move assets of ${owner}`);
    }
    this.owners.set(assetId, normalizeAddress(to));
  }

  checkpoint(): () => void {
    const owners = new Map(this.owners);
    const approvals = new Map<Address, Set<Address>>();
    for (const [owner, ops] of this.operatorApprovals) {
      approvals.set(owner, new Set(ops));
    }
    return () => {
      this.owners = new Map(owners);
      this.operatorApprovals = new Map();
      for (const [owner, ops] of approvals) {
        this.operatorApprovals.set(owner, new Set(ops));
      }
    };
  }
}
