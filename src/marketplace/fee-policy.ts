/**
 * Fee & Conversion Policy
 *
 * Pure arithmetic shared by local and cross-chain settlement, so both
 * paths charge the same fee for the same price. All amounts are bigint
 * and every division floors.
 */

import { ConversionPolicy, SettlementAmounts } from './types';

export const FEE_DENOMINATOR = 10_000n;

export function isValidBps(bps: number): boolean {
  return Number.isInteger(bps) && bps >= 0 && BigInt(bps) <= FEE_DENOMINATOR;
}

/** `amount * bps / 10_000` */
export function applyBps(amount: bigint, bps: number): bigint {
  if (!isValidBps(bps)) {
    throw new RangeError(`Basis points must be an integer in [0, ${FEE_DENOMINATOR}], got ${bps}`);
  }
  return (amount * BigInt(bps)) / FEE_DENOMINATOR;
}

export function feeAmount(price: bigint, feeBps: number): bigint {
  return applyBps(price, feeBps);
}

export function netToSeller(price: bigint, feeBps: number): bigint {
  return price - feeAmount(price, feeBps);
}

export function settlementAmounts(price: bigint, feeBps: number): SettlementAmounts {
  const sellerFee = feeAmount(price, feeBps);
  return { sellerFee, sellerProceeds: price - sellerFee };
}

/** Wrapped-native the home ledger should realize for a listing after the native → stable → native round trip. */
export function expectedConversionOutput(price: bigint, policy: Pick<ConversionPolicy, 'roundTripCostBps'>): bigint {
  return price - applyBps(price, policy.roundTripCostBps);
}

/** Slippage floor: `toleranceBps` below the expected output. */
export function minimumOutput(expected: bigint, toleranceBps: number): bigint {
  return expected - applyBps(expected, toleranceBps);
}

/** |actual - expected| <= expected * toleranceBps */
export function withinTolerance(actual: bigint, expected: bigint, toleranceBps: number): boolean {
  const band = applyBps(expected, toleranceBps);
  const diff = actual >= expected ? actual - expected : expected - actual;
  return diff <= band;
}
