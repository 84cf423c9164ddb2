/**
 * In-Memory Relay Network
 *
 * Connects ledgers in one process. A send locks the stable amount and the
 * native fee at the source endpoint and queues a packet; delivery credits
 * the bridged amount to the receiver on the destination ledger in its own
 * ledger call, then invokes the receiver's callback in another. A callback
 * that throws leaves the credit in place and marks the delivery failed, so
 * it can be retried without re-crediting.
 *
 * Packets are delivered FIFO by default. `deliver(id)` delivers out of
 * order and `redeliver(id)` repeats a callback, for exercising receivers
 * against reordered and duplicated traffic.
 */

import { domainHash } from '../crypto';
import { logger, StructuredLogger } from '../logging/structured-logger';
import { isAddress, normalizeAddress, normalizeAddressBytes } from '../ledger/address';
import { Ledger } from '../ledger/ledger';
import { Address, ChainId, Journaled } from '../ledger/types';
import {
  InboundDelivery,
  RelayEndpoint,
  RelayError,
  RelayOptions,
  RelayPacket,
  RelayReceipt,
  RelayReceiver,
  RelaySendParams,
} from './types';

export interface RelayFeeModel {
  baseFee: bigint;
  perByteFee: bigint;
  gasPrice: bigint;
  defaultGasLimit: bigint;
}

export const DEFAULT_RELAY_FEE_MODEL: RelayFeeModel = {
  baseFee: 100_000_000_000_000n, // 0.0001 native
  perByteFee: 10_000_000_000n,
  gasPrice: 1_000_000_000n, // 1 gwei
  defaultGasLimit: 200_000n,
};

export type DeliveryStatus = 'delivered' | 'failed';

export interface DeliveryRecord {
  messageId: string;
  srcChainId: ChainId;
  dstChainId: ChainId;
  nonce: bigint;
  status: DeliveryStatus;
  attempts: number;
  /** Set when the bridged amount has been credited on the destination. */
  credited: boolean;
  errorCode?: string;
  error?: string;
}

interface QueuedPacket {
  seq: number;
  packet: RelayPacket;
  options?: RelayOptions;
}

function errorCodeOf(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export class InMemoryRelayEndpoint implements RelayEndpoint, Journaled {
  readonly address: Address;
  readonly chainId: ChainId;
  readonly ledger: Ledger;
  readonly stableToken: Address;

  private network: InMemoryRelayNetwork;
  private receivers: Map<Address, RelayReceiver> = new Map();
  private outbox: QueuedPacket[] = [];
  private nonces: Map<ChainId, bigint> = new Map();

  constructor(network: InMemoryRelayNetwork, ledger: Ledger, address: Address, stableToken: Address) {
    this.network = network;
    this.ledger = ledger;
    this.chainId = ledger.chainId;
    this.address = normalizeAddress(address);
    this.stableToken = normalizeAddress(stableToken);
    ledger.attach(this);
  }

  quoteFee(dstChainId: ChainId, payload: Buffer, options?: RelayOptions): bigint {
    return this.network.quote(this.chainId, dstChainId, payload, options);
  }

  send(sender: Address, params: RelaySendParams, nativeFee: bigint): RelayReceipt {
    if (params.amount < 0n) {
      throw new RelayError('InvalidAmount', `Bridged amount must be >= 0, got ${params.amount}`);
    }
    if (normalizeAddress(params.token) !== this.stableToken) {
      throw new RelayError('InvalidAmount', `Relay only bridges ${this.stableToken}`);
    }
    const quoted = this.quoteFee(params.dstChainId, params.payload, params.options);
    if (nativeFee < quoted) {
      throw new RelayError('InsufficientFee', `Relay fee ${nativeFee} below quote ${quoted}`);
    }

    const src = normalizeAddress(sender);
    this.ledger.transferToken(this.stableToken, src, this.address, params.amount);
    this.ledger.transfer(src, this.address, nativeFee);
    if (nativeFee > quoted) {
      this.ledger.transfer(this.address, params.refundAddress, nativeFee - quoted);
    }

    const nonce = (this.nonces.get(params.dstChainId) ?? 0n) + 1n;
    this.nonces.set(params.dstChainId, nonce);

    const dstAddress = normalizeAddressBytes(params.to);
    const messageId = domainHash('RELAY_MSG_V1', {
      srcChainId: this.chainId,
      srcAddress: src,
      dstChainId: params.dstChainId,
      dstAddress,
      nonce,
      amount: params.amount,
      payload: params.payload,
    });

    const packet: RelayPacket = {
      messageId,
      srcChainId: this.chainId,
      srcAddress: src,
      dstChainId: params.dstChainId,
      dstAddress,
      nonce,
      amount: params.amount,
      payload: Buffer.from(params.payload),
      sentAt: this.ledger.now(),
    };
    this.outbox.push({
      seq: this.network.nextSequence(),
      packet,
      options: params.options ? { ...params.options } : undefined,
    });

    return { messageId, nonce, nativeFee: quoted };
  }

  registerReceiver(address: Address, receiver: RelayReceiver): void {
    this.receivers.set(normalizeAddress(address), receiver);
  }

  receiverAt(address: string): RelayReceiver | undefined {
    return isAddress(address) ? this.receivers.get(address.toLowerCase()) : undefined;
  }

  queued(): QueuedPacket[] {
    return [...this.outbox];
  }

  take(messageId: string): QueuedPacket | undefined {
    const idx = this.outbox.findIndex(q => q.packet.messageId === messageId);
    if (idx < 0) return undefined;
    const [entry] = this.outbox.splice(idx, 1);
    return entry;
  }

  checkpoint(): () => void {
    const outbox = [...this.outbox];
    const nonces = new Map(this.nonces);
    return () => {
      this.outbox = [...outbox];
      this.nonces = new Map(nonces);
    };
  }
}

export class InMemoryRelayNetwork {
  private endpoints: Map<ChainId, InMemoryRelayEndpoint> = new Map();
  private deliveries: Map<string, DeliveryRecord> = new Map();
  private delivered: Map<string, RelayPacket> = new Map();
  private feeModel: RelayFeeModel;
  private bridgeFeeBps: number;
  private sequence: number = 0;
  private log: StructuredLogger;

  constructor(opts: { feeModel?: Partial<RelayFeeModel>; bridgeFeeBps?: number } = {}) {
    this.feeModel = { ...DEFAULT_RELAY_FEE_MODEL, ...opts.feeModel };
    this.bridgeFeeBps = opts.bridgeFeeBps ?? 0;
    if (!Number.isInteger(this.bridgeFeeBps) || this.bridgeFeeBps < 0 || this.bridgeFeeBps >= 10_000) {
      throw new RelayError('InvalidAmount', `Invalid bridge fee ${this.bridgeFeeBps} bps`);
    }
    this.log = logger.child({ relay: 'in-memory' });
  }

  connect(ledger: Ledger, opts: { address: Address; stableToken: Address }): InMemoryRelayEndpoint {
    if (this.endpoints.has(ledger.chainId)) {
      throw new RelayError('UnknownChain', `Chain ${ledger.chainId} is already connected`);
    }
    const endpoint = new InMemoryRelayEndpoint(this, ledger, opts.address, opts.stableToken);
    this.endpoints.set(ledger.chainId, endpoint);
    return endpoint;
  }

  endpoint(chainId: ChainId): InMemoryRelayEndpoint {
    const endpoint = this.endpoints.get(chainId);
    if (!endpoint) {
      throw new RelayError('UnknownChain', `No relay endpoint on chain ${chainId}`);
    }
    return endpoint;
  }

  quote(srcChainId: ChainId, dstChainId: ChainId, payload: Buffer, options?: RelayOptions): bigint {
    if (srcChainId === dstChainId) {
      throw new RelayError('UnknownChain', `Cannot relay chain ${srcChainId} to itself`);
    }
    this.endpoint(dstChainId);
    const gasLimit = options?.gasLimit ?? this.feeModel.defaultGasLimit;
    const airdrop = options?.dstNativeAmount ?? 0n;
    if (gasLimit < 0n || airdrop < 0n) {
      throw new RelayError('InvalidAmount', 'Relay options must be non-negative');
    }
    return (
      this.feeModel.baseFee +
      this.feeModel.perByteFee * BigInt(payload.length) +
      this.feeModel.gasPrice * gasLimit +
      airdrop
    );
  }

  nextSequence(): number {
    this.sequence += 1;
    return this.sequence;
  }

  /** Undelivered packets in send order. */
  pending(): RelayPacket[] {
    const queued: QueuedPacket[] = [];
    for (const endpoint of this.endpoints.values()) {
      queued.push(...endpoint.queued());
    }
    return queued.sort((a, b) => a.seq - b.seq).map(q => q.packet);
  }

  getDelivery(messageId: string): DeliveryRecord | undefined {
    const record = this.deliveries.get(messageId);
    return record ? { ...record } : undefined;
  }

  getDeliveries(): DeliveryRecord[] {
    return Array.from(this.deliveries.values()).map(r => ({ ...r }));
  }

  async deliverNext(): Promise<DeliveryRecord | undefined> {
    const [next] = this.pending();
    return next ? this.deliver(next.messageId) : undefined;
  }

  async deliverAll(): Promise<DeliveryRecord[]> {
    const records: DeliveryRecord[] = [];
    let record = await this.deliverNext();
    while (record) {
      records.push(record);
      record = await this.deliverNext();
    }
    return records;
  }

  /**
   * Deliver a specific queued packet, regardless of its position in the queue.
   */
  async deliver(messageId: string): Promise<DeliveryRecord> {
    const { packet, options } = await this.takeQueued(messageId);
    const dst = this.endpoint(packet.dstChainId);
    const record: DeliveryRecord = {
      messageId,
      srcChainId: packet.srcChainId,
      dstChainId: packet.dstChainId,
      nonce: packet.nonce,
      status: 'failed',
      attempts: 0,
      credited: false,
    };
    this.deliveries.set(messageId, record);
    this.delivered.set(messageId, packet);

    const receiver = dst.receiverAt(packet.dstAddress);
    if (!receiver) {
      record.errorCode = 'UnknownReceiver';
      record.error = `No receiver registered at ${packet.dstAddress} on chain ${packet.dstChainId}`;
      this.log.warn('Relay', 'Packet has no receiver', { messageId, dstAddress: packet.dstAddress });
      return { ...record };
    }

    const bridged = this.bridgedAmount(packet.amount);
    const airdrop = options?.dstNativeAmount ?? 0n;
    await dst.ledger.execute({ sender: dst.address, to: dst.address, value: 0n }, () => {
      dst.ledger.mintToken(dst.stableToken, packet.dstAddress, bridged);
      if (airdrop > 0n) dst.ledger.credit(packet.dstAddress, airdrop);
    });
    record.credited = true;

    return this.invoke(record, receiver, {
      srcChainId: packet.srcChainId,
      srcAddress: packet.srcAddress,
      nonce: packet.nonce,
      token: dst.stableToken,
      amount: bridged,
      payload: Buffer.from(packet.payload),
    });
  }

  /**
   * Invoke the receiver again for a packet that was already delivered,
   * as a relay retrying after a lost acknowledgement would. No new credit.
   */
  async redeliver(messageId: string): Promise<DeliveryRecord> {
    const { record, receiver, delivery } = this.prepareRepeat(messageId);
    return this.invoke(record, receiver, delivery);
  }

  /** Retry the callback of a failed delivery. No new credit. */
  async retry(messageId: string): Promise<DeliveryRecord> {
    const { record, receiver, delivery } = this.prepareRepeat(messageId);
    if (record.status !== 'failed') {
      throw new RelayError('NotRetryable', `Delivery ${messageId} is ${record.status}`);
    }
    return this.invoke(record, receiver, delivery);
  }

  private prepareRepeat(messageId: string): {
    record: DeliveryRecord;
    receiver: RelayReceiver;
    delivery: InboundDelivery;
  } {
    const record = this.deliveries.get(messageId);
    const packet = this.delivered.get(messageId);
    if (!record || !packet) {
      throw new RelayError('UnknownMessage', `No delivery for ${messageId}`);
    }
    const dst = this.endpoint(packet.dstChainId);
    const receiver = dst.receiverAt(packet.dstAddress);
    if (!receiver || !record.credited) {
      throw new RelayError('NotRetryable', `Delivery ${messageId} never reached a receiver`);
    }
    const amount = this.bridgedAmount(packet.amount);
    return {
      record,
      receiver,
      delivery: {
        srcChainId: packet.srcChainId,
        srcAddress: packet.srcAddress,
        nonce: packet.nonce,
        token: dst.stableToken,
        amount,
        payload: Buffer.from(packet.payload),
      },
    };
  }

  private async invoke(
    record: DeliveryRecord,
    receiver: RelayReceiver,
    delivery: InboundDelivery
  ): Promise<DeliveryRecord> {
    const dst = this.endpoint(record.dstChainId);
    record.attempts += 1;
    try {
      await receiver.receiveCrossChain(dst.address, delivery);
      record.status = 'delivered';
      record.errorCode = undefined;
      record.error = undefined;
    } catch (error) {
      // Stored for retry; the credited amount stays with the receiver.
      record.status = 'failed';
      record.errorCode = errorCodeOf(error);
      record.error = error instanceof Error ? error.message : String(error);
      this.log.warn('Relay', 'Receiver rejected delivery', {
        messageId: record.messageId,
        srcChainId: record.srcChainId,
        nonce: record.nonce,
        errorCode: record.errorCode,
        error: record.error,
      });
    }
    return { ...record };
  }

  private bridgedAmount(amount: bigint): bigint {
    return amount - (amount * BigInt(this.bridgeFeeBps)) / 10_000n;
  }

  /** Dequeues inside a source-ledger call so a concurrent revert cannot resurrect the packet. */
  private async takeQueued(messageId: string): Promise<QueuedPacket> {
    for (const src of this.endpoints.values()) {
      if (!src.queued().some(q => q.packet.messageId === messageId)) continue;
      const entry = await src.ledger.execute(
        { sender: src.address, to: src.address, value: 0n },
        () => src.take(messageId)
      );
      if (entry) return entry;
    }
    throw new RelayError('UnknownMessage', `No queued packet ${messageId}`);
  }
}
