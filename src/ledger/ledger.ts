/**
 * Ledger
 *
 * In-process model of one chain: native balances, token balances, a
 * wrapped-native token, deployed asset contracts and a block clock.
 *
 * State-changing calls go through `execute()`, which runs them one at a
 * time to completion. Before a call starts, every attached participant is
 * checkpointed; if the call throws, all of them are restored, so a failed
 * call leaves no partial state behind.
 */

import { logger, StructuredLogger } from '../logging/structured-logger';
import { deriveAddress, normalizeAddress } from './address';
import { AssetContract } from './asset-contract';
import { Address, CallContext, ChainId, Journaled, LedgerError } from './types';

export interface LedgerOptions {
  chainId: ChainId;
  name?: string;
  wrappedNative?: Address;
  /** Unix seconds of the first block. */
  genesisTime?: number;
}

export class Ledger implements Journaled {
  readonly chainId: ChainId;
  readonly name: string;
  readonly wrappedNative: Address;

  private nativeBalances: Map<Address, bigint> = new Map();
  private tokenBalances: Map<Address, Map<Address, bigint>> = new Map();
  private assetContracts: Map<Address, AssetContract> = new Map();
  private participants: Journaled[] = [];
  private timestamp: number;
  private queue: Promise<void> = Promise.resolve();
  private log: StructuredLogger;

  constructor(options: LedgerOptions) {
    this.chainId = options.chainId;
    this.name = options.name ?? `chain-${options.chainId}`;
    this.wrappedNative = normalizeAddress(options.wrappedNative ?? deriveAddress(`${this.name}:wrapped-native`));
    this.timestamp = options.genesisTime ?? 1_700_000_000;
    this.log = logger.child({ chainId: this.chainId });
  }

  /**
   * Register state that must roll back together with the ledger's own.
   */
  attach(...participants: Journaled[]): void {
    for (const p of participants) {
      if (!this.participants.includes(p)) this.participants.push(p);
    }
  }

  registerAssetContract(contract: AssetContract): void {
    this.assetContracts.set(normalizeAddress(contract.address), contract);
    this.attach(contract);
  }

  getAssetContract(address: Address): AssetContract | undefined {
    return this.assetContracts.get(address.toLowerCase());
  }

  // ============================================================
  // CLOCK
  // ============================================================

  now(): number {
    return this.timestamp;
  }

  advanceTime(seconds: number): void {
    if (!Number.isInteger(seconds) || seconds < 0) {
      throw new LedgerError('InvalidAmount', `Cannot advance clock by ${seconds}s`);
    }
    this.timestamp += seconds;
  }

  // ============================================================
  // NATIVE BALANCES
  // ============================================================

  balanceOf(account: Address): bigint {
    return this.nativeBalances.get(account.toLowerCase()) ?? 0n;
  }

  /** Faucet: create native value out of nothing (devnet and tests). */
  credit(account: Address, amount: bigint): void {
    this.requireNonNegative(amount);
    const key = normalizeAddress(account);
    this.nativeBalances.set(key, this.balanceOf(key) + amount);
  }

  transfer(from: Address, to: Address, amount: bigint): void {
    this.requireNonNegative(amount);
    const src = normalizeAddress(from);
    const dst = normalizeAddress(to);
    const balance = this.balanceOf(src);
    if (balance < amount) {
      throw new LedgerError(
        'InsufficientBalance',
        `Native balance of ${src} is ${balance}, needs ${amount}`
      );
    }
    this.nativeBalances.set(src, balance - amount);
    this.nativeBalances.set(dst, this.balanceOf(dst) + amount);
  }

  // ============================================================
  // TOKEN BALANCES
  // ============================================================

  tokenBalanceOf(token: Address, account: Address): bigint {
    return this.tokenBalances.get(token.toLowerCase())?.get(account.toLowerCase()) ?? 0n;
  }

  mintToken(token: Address, to: Address, amount: bigint): void {
    this.requireNonNegative(amount);
    const dst = normalizeAddress(to);
    const book = this.tokenBook(token);
    book.set(dst, (book.get(dst) ?? 0n) + amount);
  }

  burnToken(token: Address, from: Address, amount: bigint): void {
    this.requireNonNegative(amount);
    const src = normalizeAddress(from);
    const book = this.tokenBook(token);
    const balance = book.get(src) ?? 0n;
    if (balance < amount) {
      throw new LedgerError(
        'InsufficientBalance',
        `Token ${token} balance of ${src} is ${balance}, needs ${amount}`
      );
    }
    book.set(src, balance - amount);
  }

  transferToken(token: Address, from: Address, to: Address, amount: bigint): void {
    this.burnToken(token, from, amount);
    this.mintToken(token, to, amount);
  }

  /** Native → wrapped-native, 1:1. The wrapped-native contract holds the native value. */
  wrap(account: Address, amount: bigint): void {
    this.transfer(account, this.wrappedNative, amount);
    this.mintToken(this.wrappedNative, account, amount);
  }

  unwrap(account: Address, amount: bigint): void {
    this.burnToken(this.wrappedNative, account, amount);
    this.transfer(this.wrappedNative, account, amount);
  }

  // ============================================================
  // EXECUTION
  // ============================================================

  /**
   * Capture the ledger and every attached participant. The returned function
   * restores all of them; used for whole calls and for savepoints inside one.
   */
  checkpoint(): () => void {
    const native = new Map(this.nativeBalances);
    const tokens = new Map<Address, Map<Address, bigint>>();
    for (const [token, book] of this.tokenBalances) {
      tokens.set(token, new Map(book));
    }
    const timestamp = this.timestamp;
    const restores = this.participants.map(p => p.checkpoint());

    return () => {
      this.nativeBalances = new Map(native);
      this.tokenBalances = new Map();
      for (const [token, book] of tokens) {
        this.tokenBalances.set(token, new Map(book));
      }
      this.timestamp = timestamp;
      for (const restore of restores) restore();
    };
  }

  /**
   * Run one state-changing call to completion. Calls are queued; the
   * attached native value moves from sender to `ctx.to` before `fn` runs.
   */
  execute<T>(ctx: CallContext, fn: () => T | Promise<T>): Promise<T> {
    const run = this.queue.then(() => this.runCall(ctx, fn));
    // The queue only tracks completion; each caller sees its own outcome through `run`.
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private async runCall<T>(ctx: CallContext, fn: () => T | Promise<T>): Promise<T> {
    const restore = this.checkpoint();
    try {
      if (ctx.value < 0n) {
        throw new LedgerError('InvalidAmount', `Call value must be >= 0, got ${ctx.value}`);
      }
      if (ctx.value > 0n) {
        this.transfer(ctx.sender, ctx.to, ctx.value);
      }
      return await fn();
    } catch (error) {
      restore();
      this.log.debug('Ledger', 'Call reverted', {
        sender: ctx.sender,
        to: ctx.to,
        reason: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  }

  private tokenBook(token: Address): Map<Address, bigint> {
    const key = normalizeAddress(token);
    let book = this.tokenBalances.get(key);
    if (!book) {
      book = new Map();
      this.tokenBalances.set(key, book);
    }
    return book;
  }

  private requireNonNegative(amount: bigint): void {
    if (amount < 0n) {
      throw new LedgerError('InvalidAmount', `Amount must be >= 0, got ${amount}`);
    }
  }
}
