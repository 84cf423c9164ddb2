/**
 * Swap Venue
 *
 * Exact-input, single-hop swaps. `FixedRateSwapVenue` prices each pool
 * at a fixed rate minus the pool fee (hundredths of a basis point, so
 * 3000 = 0.30%) and pays out of its own token reserves on the ledger.
 */

import { normalizeAddress } from './address';
import { Ledger } from './ledger';
import { Address } from './types';

export interface ExactInputSingleParams {
  tokenIn: Address;
  tokenOut: Address;
  fee: number;
  recipient: Address;
  /** Unix seconds; the swap reverts once the ledger clock is past it. */
  deadline: number;
  amountIn: bigint;
  amountOutMinimum: bigint;
}

export interface SwapVenue {
  readonly address: Address;
  /** Pulls `amountIn` of `tokenIn` from `payer`; returns the realized output. */
  exactInputSingle(payer: Address, params: ExactInputSingleParams): bigint;
}

export type SwapVenueErrorCode =
  | 'DeadlineExpired'
  | 'InvalidAmount'
  | 'NoPool'
  | 'TooLittleReceived'
  | 'InsufficientLiquidity';

export class SwapVenueError extends Error {
  readonly code: SwapVenueErrorCode;

  constructor(code: SwapVenueErrorCode, message: string) {
    super(message);
    this.name = 'SwapVenueError';
    this.code = code;
  }
}

/** Output per input unit, as a fraction. */
export interface SwapRate {
  numerator: bigint;
  denominator: bigint;
}

export const POOL_FEE_DENOMINATOR = 1_000_000n;

interface Pool {
  rate: SwapRate;
}

function poolKey(tokenIn: Address, tokenOut: Address, fee: number): string {
  return `${tokenIn.toLowerCase()}>${tokenOut.toLowerCase()}@${fee}`;
}

export class FixedRateSwapVenue implements SwapVenue {
  readonly address: Address;
  private ledger: Ledger;
  private pools: Map<string, Pool> = new Map();
  /** Adverse price movement applied on top of the pool fee, in basis points. */
  private slippageBps: number = 0;

  constructor(ledger: Ledger, address: Address) {
    this.ledger = ledger;
    this.address = normalizeAddress(address);
  }

  /**
   * Open both directions of a pair. `rateAToB` converts A units into B units;
   * the reverse direction uses the inverted fraction.
   */
  addPair(tokenA: Address, tokenB: Address, fee: number, rateAToB: SwapRate): void {
    if (rateAToB.numerator <= 0n || rateAToB.denominator <= 0n) {
      throw new SwapVenueError('InvalidAmount', 'Pool rate must be positive');
    }
    if (!Number.isInteger(fee) || fee < 0 || BigInt(fee) >= POOL_FEE_DENOMINATOR) {
      throw new SwapVenueError('InvalidAmount', `Invalid pool fee ${fee}`);
    }
    this.pools.set(poolKey(tokenA, tokenB, fee), { rate: { ...rateAToB } });
    this.pools.set(poolKey(tokenB, tokenA, fee), {
      rate: { numerator: rateAToB.denominator, denominator: rateAToB.numerator },
    });
  }

  setSlippageBps(bps: number): void {
    if (!Number.isInteger(bps) || bps < 0 || bps > 10_000) {
      throw new SwapVenueError('InvalidAmount', `Invalid slippage ${bps}`);
    }
    this.slippageBps = bps;
  }

  quoteExactInputSingle(tokenIn: Address, tokenOut: Address, fee: number, amountIn: bigint): bigint {
    const pool = this.pools.get(poolKey(tokenIn, tokenOut, fee));
    if (!pool) {
      throw new SwapVenueError('NoPool', `No pool ${tokenIn} -> ${tokenOut} at fee ${fee}`);
    }
    const afterFee = (amountIn * (POOL_FEE_DENOMINATOR - BigInt(fee))) / POOL_FEE_DENOMINATOR;
    const gross = (afterFee * pool.rate.numerator) / pool.rate.denominator;
    return gross - (gross * BigInt(this.slippageBps)) / 10_000n;
  }

  exactInputSingle(payer: Address, params: ExactInputSingleParams): bigint {
    if (this.ledger.now() > params.deadline) {
      throw new SwapVenueError('DeadlineExpired', `Deadline ${params.deadline} passed at ${this.ledger.now()}`);
    }
    if (params.amountIn <= 0n) {
      throw new SwapVenueError('InvalidAmount', 'amountIn must be > 0');
    }

    const amountOut = this.quoteExactInputSingle(params.tokenIn, params.tokenOut, params.fee, params.amountIn);
    if (amountOut < params.amountOutMinimum) {
      throw new SwapVenueError(
        'TooLittleReceived',
        `Output ${amountOut} below minimum ${params.amountOutMinimum}`
      );
    }
    if (this.ledger.tokenBalanceOf(params.tokenOut, this.address) < amountOut) {
      throw new SwapVenueError('InsufficientLiquidity', `Venue cannot pay out ${amountOut} of ${params.tokenOut}`);
    }

    this.ledger.transferToken(params.tokenIn, payer, this.address, params.amountIn);
    this.ledger.transferToken(params.tokenOut, this.address, params.recipient, amountOut);
    return amountOut;
  }
}
