import { sha256 } from '../crypto';
import { Address, LedgerError } from './types';

export const ZERO_ADDRESS: Address = '0x' + '0'.repeat(40);

const ADDRESS_RE = /^0x[0-9a-fA-F]{40}$/;
const BYTES_RE = /^0x(?:[0-9a-fA-F]{2})+$/;

export function isAddress(value: unknown): value is Address {
  return typeof value === 'string' && ADDRESS_RE.test(value);
}

export function normalizeAddress(value: string): Address {
  if (!isAddress(value)) {
    throw new LedgerError('InvalidAddress', `Invalid address: ${value}`);
  }
  return value.toLowerCase();
}

/**
 * Peer addresses on other ledgers are opaque address-bytes (they need not
 * be 20 bytes), kept as lower-case 0x hex.
 */
export function normalizeAddressBytes(value: string): string {
  if (!BYTES_RE.test(value)) {
    throw new LedgerError('InvalidAddress', `Invalid address bytes: ${value}`);
  }
  return value.toLowerCase();
}

export function sameAddressBytes(a: string, b: string): boolean {
  return BYTES_RE.test(a) && BYTES_RE.test(b) && a.toLowerCase() === b.toLowerCase();
}

/** Deterministic address for a label, e.g. `deriveAddress('chain-1:marketplace')`. */
export function deriveAddress(label: string): Address {
  return '0x' + sha256(label).substring(0, 40);
}

export function addressToBytes(address: Address): Buffer {
  return Buffer.from(normalizeAddress(address).substring(2), 'hex');
}

export function bytesToAddress(bytes: Buffer): Address {
  if (bytes.length !== 20) {
    throw new LedgerError('InvalidAddress', `Address must be 20 bytes, got ${bytes.length}`);
  }
  return '0x' + bytes.toString('hex');
}
