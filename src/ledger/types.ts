/**
 * Ledger Types
 *
 * Shared vocabulary for the simulated ledgers the settlement engine runs on.
 */

/** 0x-prefixed, lower-case, 20-byte hex address. */
export type Address = string;

export type ChainId = number;

/**
 * A state-changing call as the ledger sees it: who is calling, which
 * account receives the attached native value, and how much is attached.
 */
export interface CallContext {
  sender: Address;
  to: Address;
  value: bigint;
}

/**
 * Anything holding ledger state that must roll back with a reverted call.
 * `checkpoint()` captures the current state and returns a restore function.
 */
export interface Journaled {
  checkpoint(): () => void;
}

export type LedgerErrorCode =
  | 'InsufficientBalance'
  | 'InvalidAmount'
  | 'InvalidAddress'
  | 'UnknownContract';

export class LedgerError extends Error {
  readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = 'LedgerError';
    this.code = code;
  }
}
