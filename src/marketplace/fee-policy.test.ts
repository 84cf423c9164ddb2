import {
  applyBps,
  expectedConversionOutput,
  feeAmount,
  isValidBps,
  minimumOutput,
  netToSeller,
  settlementAmounts,
  withinTolerance,
} from './fee-policy';

const ONE = 10n ** 18n;

describe('fee policy', () => {
  it('takes feeBps of the price, flooring', () => {
    expect(feeAmount(ONE, 250)).toBe(25_000_000_000_000_000n);
    expect(feeAmount(399n, 250)).toBe(9n);
    expect(feeAmount(ONE, 0)).toBe(0n);
    expect(feeAmount(ONE, 10_000)).toBe(ONE);
  });

  it('fee and net always add back up to the price', () => {
    for (const price of [1n, 399n, 10_001n, ONE, 123_456_789_012_345_678_901n]) {
      for (const bps of [0, 1, 250, 9_999, 10_000]) {
        expect(feeAmount(price, bps) + netToSeller(price, bps)).toBe(price);
      }
    }
  });

  it('splits settlement amounts', () => {
    expect(settlementAmounts(ONE, 250)).toEqual({
      sellerFee: 25_000_000_000_000_000n,
      sellerProceeds: 975_000_000_000_000_000n,
    });
  });

  it('rejects basis points outside [0, 10000]', () => {
    expect(isValidBps(10_001)).toBe(false);
    expect(isValidBps(-1)).toBe(false);
    expect(isValidBps(2.5)).toBe(false);
    expect(() => applyBps(ONE, 10_001)).toThrow(RangeError);
  });

  it('derives the expected conversion output and its floor', () => {
    const expected = expectedConversionOutput(ONE, { roundTripCostBps: 60 });
    expect(expected).toBe(994_000_000_000_000_000n);
    expect(minimumOutput(expected, 50)).toBe(989_030_000_000_000_000n);
  });

  it('checks the tolerance band on both sides', () => {
    const expected = 994_000_000_000_000_000n;
    expect(withinTolerance(994_009_000_000_000_000n, expected, 50)).toBe(true);
    expect(withinTolerance(expected - 4_970_000_000_000_000n, expected, 50)).toBe(true);
    expect(withinTolerance(expected - 4_970_000_000_000_001n, expected, 50)).toBe(false);
    expect(withinTolerance(expected + 4_970_000_000_000_001n, expected, 50)).toBe(false);
  });
});
