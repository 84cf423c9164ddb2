import * as crypto from 'crypto';
import { canonicalCborEncode } from './canonical-cbor';

export function sha256(data: string | Buffer): string {
  const buffer = typeof data === 'string' ? Buffer.from(data, 'utf8') : data;
  return crypto.createHash('sha256').update(buffer).digest('hex');
}

/**
 * SHA-256 over `domain || 0x00 || canonicalCbor(value)`.
 * Distinct domains keep listing keys, event hashes and message ids apart.
 */
export function domainHash(domain: string, value: unknown): string {
  const domainSep = Buffer.from(domain, 'utf8');
  const delimiter = Buffer.from([0x00]);
  return sha256(Buffer.concat([domainSep, delimiter, canonicalCborEncode(value)]));
}

export { canonicalCborEncode, canonicalCborDecode, CborDecodeError } from './canonical-cbor';
export type { CborValue } from './canonical-cbor';
