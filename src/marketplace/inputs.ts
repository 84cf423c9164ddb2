import { isAddress } from '../ledger/address';
import { Address } from '../ledger/types';
import { MarketplaceError } from './errors';

const BYTES_RE = /^0x(?:[0-9a-fA-F]{2})+$/;

export function requireAddress(value: string, field: string): Address {
  if (!isAddress(value)) {
    throw new MarketplaceError('InvalidAddress', `${field} is not a valid address: ${value}`);
  }
  return value.toLowerCase();
}

export function requireAddressBytes(value: string, field: string): string {
  if (!BYTES_RE.test(value)) {
    throw new MarketplaceError('InvalidAddress', `${field} is not valid address bytes: ${value}`);
  }
  return value.toLowerCase();
}

export function requirePositivePrice(price: bigint): bigint {
  if (price <= 0n) {
    throw new MarketplaceError('InvalidPrice', `Price must be > 0, got ${price}`);
  }
  return price;
}
