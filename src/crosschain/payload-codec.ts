/**
 * Purchase payload carried by a relay packet.
 *
 * Wire form: canonical CBOR array
 *   [version, assetContract (20 bytes), assetId (uint), recipient (20 bytes)]
 */

import { canonicalCborDecode, canonicalCborEncode, CborDecodeError, CborValue } from '../crypto';
import { addressToBytes, bytesToAddress } from '../ledger/address';
import { MarketplaceError } from '../marketplace/errors';
import { PurchaseIntent } from '../marketplace/types';

export const PAYLOAD_VERSION = 1n;

export function encodePurchaseIntent(intent: PurchaseIntent): Buffer {
  return canonicalCborEncode([
    PAYLOAD_VERSION,
    addressToBytes(intent.assetContract),
    intent.assetId,
    addressToBytes(intent.recipient),
  ]);
}

function malformed(reason: string, cause?: unknown): MarketplaceError {
  return new MarketplaceError('MalformedPayload', `Malformed purchase payload: ${reason}`, undefined, { cause });
}

export function decodePurchaseIntent(payload: Buffer): PurchaseIntent {
  let decoded: CborValue;
  try {
    decoded = canonicalCborDecode(payload);
  } catch (error) {
    if (error instanceof CborDecodeError) throw malformed(error.message, error);
    throw error;
  }

  if (!Array.isArray(decoded) || decoded.length !== 4) {
    throw malformed('expected a 4-element array');
  }
  const [version, contractBytes, assetId, recipientBytes] = decoded;
  if (version !== PAYLOAD_VERSION) {
    throw malformed(`unsupported version ${String(version)}`);
  }
  if (!Buffer.isBuffer(contractBytes) || contractBytes.length !== 20) {
    throw malformed('asset contract must be 20 bytes');
  }
  if (typeof assetId !== 'bigint' || assetId < 0n) {
    throw malformed('asset id must be an unsigned integer');
  }
  if (!Buffer.isBuffer(recipientBytes) || recipientBytes.length !== 20) {
    throw malformed('recipient must be 20 bytes');
  }

  return {
    assetContract: bytesToAddress(contractBytes),
    assetId,
    recipient: bytesToAddress(recipientBytes),
  };
}
