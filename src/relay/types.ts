/**
 * Relay Types
 *
 * The message-and-value bridge between ledgers, as the marketplace sees it.
 * Nothing crosses between ledgers except a RelayPacket.
 */

import { Address, ChainId } from '../ledger/types';

/** Executor settings forwarded to the relay's fee model. */
export interface RelayOptions {
  gasLimit?: bigint;
  /** Native value to airdrop to the receiver on the destination ledger. */
  dstNativeAmount?: bigint;
}

export interface RelaySendParams {
  dstChainId: ChainId;
  /** Receiver address-bytes on the destination ledger. */
  to: string;
  /** Stable token locked on the source ledger and credited on the destination. */
  token: Address;
  amount: bigint;
  payload: Buffer;
  refundAddress: Address;
  options?: RelayOptions;
}

export interface RelayReceipt {
  messageId: string;
  nonce: bigint;
  nativeFee: bigint;
}

export interface RelayPacket {
  messageId: string;
  srcChainId: ChainId;
  srcAddress: string;
  dstChainId: ChainId;
  dstAddress: string;
  nonce: bigint;
  amount: bigint;
  payload: Buffer;
  sentAt: number;
}

/** What the receiver's callback is handed on the destination ledger. */
export interface InboundDelivery {
  srcChainId: ChainId;
  srcAddress: string;
  nonce: bigint;
  token: Address;
  amount: bigint;
  payload: Buffer;
}

export interface RelayReceiver {
  /** Only the registered relay endpoint may call this; `caller` is that endpoint. */
  receiveCrossChain(caller: Address, delivery: InboundDelivery): Promise<unknown>;
}

export interface RelayEndpoint {
  readonly address: Address;
  readonly chainId: ChainId;
  quoteFee(dstChainId: ChainId, payload: Buffer, options?: RelayOptions): bigint;
  /** Must run inside a ledger call of the sender; `nativeFee` is paid from the sender's balance. */
  send(sender: Address, params: RelaySendParams, nativeFee: bigint): RelayReceipt;
  registerReceiver(address: Address, receiver: RelayReceiver): void;
}

export type RelayErrorCode =
  | 'UnknownChain'
  | 'InsufficientFee'
  | 'InvalidAmount'
  | 'UnknownMessage'
  | 'NotRetryable';

export class RelayError extends Error {
  readonly code: RelayErrorCode;

  constructor(code: RelayErrorCode, message: string) {
    super(message);
    this.name = 'RelayError';
    this.code = code;
  }
}
