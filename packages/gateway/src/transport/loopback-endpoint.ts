/**
 * Loopback Endpoint
 *
 * In-process Transport for local development and tests. Two endpoints are
 * connected as two "chains"; a send on one is delivered to the receiver
 * registered on the other, with per-path outbound nonces.
 *
 * Delivery mirrors a blocking endpoint: if the receiver throws, the payload
 * is stored and the inbound path stays blocked until forceResumeReceive.
 *
 * `dispatched` and `deliveries` keep the most recent `historyLimit` records.
 */

import { hexlify, keccak256, solidityPacked } from 'ethers';
import {
  ADDRESS_LENGTH,
  ChainId,
  EvmAddress,
  chainId,
  concatBytes,
  evmAddress,
  toHex,
} from '../boundaries/index.js';
import { TransportError } from '../errors/index.js';
import type { DispatchRequest, FeeQuote, InboundReceiver, SendReceipt, Transport } from './types.js';

export type DeliveryStatus = 'delivered' | 'stored' | 'blocked' | 'no_receiver';

export interface DeliveryRecord {
  srcChainId: ChainId;
  srcAddress: Uint8Array;
  nonce: bigint;
  payload: Uint8Array;
  status: DeliveryStatus;
  error?: string;
}

export interface StoredPayload {
  nonce: bigint;
  payloadHash: string;
  reason: string;
}

export const DEFAULT_HISTORY_LIMIT = 1000;

export class LoopbackEndpoint implements Transport {
  readonly chainId: ChainId;
  readonly address: EvmAddress;
  private baseFee: bigint;
  private feePerByte: bigint;
  private historyLimit: number;

  private peers: Map<ChainId, LoopbackEndpoint> = new Map();
  private receivers: Map<EvmAddress, InboundReceiver> = new Map();
  private outboundNonces: Map<string, bigint> = new Map();
  private storedPayloads: Map<string, StoredPayload> = new Map();
  private configs: Map<string, Uint8Array> = new Map();
  private sendVersion = 0;
  private receiveVersion = 0;

  readonly dispatched: DispatchRequest[] = [];
  readonly deliveries: DeliveryRecord[] = [];

  constructor(
    options: {
      chainId: number;
      address: string;
      baseFee?: bigint;
      feePerByte?: bigint;
      historyLimit?: number;
    }
  ) {
    this.chainId = chainId(options.chainId);
    this.address = evmAddress(options.address);
    this.baseFee = options.baseFee ?? 0n;
    this.feePerByte = options.feePerByte ?? 0n;
    this.historyLimit = options.historyLimit ?? DEFAULT_HISTORY_LIMIT;
  }

  /**
   * Connect two endpoints in both directions.
   */
  connect(peer: LoopbackEndpoint): void {
    this.peers.set(peer.chainId, peer);
    peer.peers.set(this.chainId, this);
  }

  // ===========================================================================
  // Transport Implementation
  // ===========================================================================

  attach(application: EvmAddress, receiver: InboundReceiver): void {
    this.receivers.set(application, receiver);
  }

  async send(request: DispatchRequest): Promise<SendReceipt> {
    const quote = this.quote(request.payload);
    if (request.nativeFee < quote.nativeFee) {
      throw new TransportError('Insufficient native fee', {
        provided: request.nativeFee.toString(),
        required: quote.nativeFee.toString(),
      });
    }
    if (request.destination.length <= ADDRESS_LENGTH) {
      throw new TransportError(`Destination must be longer than ${ADDRESS_LENGTH} bytes`);
    }
    const peer = this.peers.get(request.dstChainId);
    if (!peer) {
      throw new TransportError(`No route to chain ${request.dstChainId}`);
    }

    const pathKey = `${request.dstChainId}:${toHex(request.destination)}`;
    const nonce = (this.outboundNonces.get(pathKey) ?? 0n) + 1n;
    this.outboundNonces.set(pathKey, nonce);
    record(this.dispatched, request, this.historyLimit);

    // destination = receiver ++ sender; the far side sees sender ++ receiver
    const split = request.destination.length - ADDRESS_LENGTH;
    const receiver = request.destination.slice(0, split);
    const sender = request.destination.slice(split);
    await peer.deliver(this.chainId, concatBytes(sender, receiver), receiver, nonce, request.payload);

    const txHash = keccak256(solidityPacked(
      ['uint16', 'uint16', 'bytes', 'uint64'],
      [this.chainId, request.dstChainId, request.destination, nonce]
    ));
    return { txHash, nonce };
  }

  async estimateFees(
    _dstChainId: ChainId,
    _userApplication: EvmAddress,
    payload: Uint8Array,
    _payInZro: boolean,
    _adapterParams: Uint8Array
  ): Promise<FeeQuote> {
    return this.quote(payload);
  }

  // Single-application endpoint: config is not keyed by user application.
  async getConfig(
    version: number,
    chainId: ChainId,
    _userApplication: EvmAddress,
    configType: number
  ): Promise<Uint8Array> {
    return this.configs.get(configKey(version, chainId, configType))?.slice() ?? new Uint8Array(0);
  }

  async setConfig(version: number, chainId: ChainId, configType: number, config: Uint8Array): Promise<void> {
    this.configs.set(configKey(version, chainId, configType), config.slice());
  }

  async setSendVersion(version: number): Promise<void> {
    this.sendVersion = version;
  }

  async setReceiveVersion(version: number): Promise<void> {
    this.receiveVersion = version;
  }

  async forceResumeReceive(srcChainId: ChainId, srcAddress: Uint8Array): Promise<void> {
    const key = inboundKey(srcChainId, srcAddress);
    if (!this.storedPayloads.delete(key)) {
      throw new TransportError(`No stored payload for chain ${srcChainId}`);
    }
  }

  // ===========================================================================
  // Delivery
  // ===========================================================================

  async deliver(
    srcChainId: ChainId,
    srcAddress: Uint8Array,
    receiver: Uint8Array,
    nonce: bigint,
    payload: Uint8Array
  ): Promise<DeliveryRecord> {
    const entry: DeliveryRecord = { srcChainId, srcAddress, nonce, payload, status: 'delivered' };
    const key = inboundKey(srcChainId, srcAddress);
    const target = receiver.length === ADDRESS_LENGTH
      ? this.receivers.get(evmAddress(hexlify(receiver)))
      : undefined;

    if (this.storedPayloads.has(key)) {
      entry.status = 'blocked';
    } else if (!target) {
      entry.status = 'no_receiver';
    } else {
      try {
        await target({ caller: this.address, srcChainId, srcAddress, nonce, payload });
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        this.storedPayloads.set(key, { nonce, payloadHash: keccak256(payload), reason });
        entry.status = 'stored';
        entry.error = reason;
      }
    }

    record(this.deliveries, entry, this.historyLimit);
    return entry;
  }

  // For testing
  getStoredPayload(srcChainId: number, srcAddress: Uint8Array): StoredPayload | undefined {
    return this.storedPayloads.get(inboundKey(chainId(srcChainId), srcAddress));
  }

  getSendVersion(): number {
    return this.sendVersion;
  }

  getReceiveVersion(): number {
    return this.receiveVersion;
  }

  private quote(payload: Uint8Array): FeeQuote {
    return {
      nativeFee: this.baseFee + this.feePerByte * BigInt(payload.length),
      zroFee: 0n,
    };
  }
}

function record<T>(history: T[], item: T, limit: number): void {
  history.push(item);
  if (history.length > limit) {
    history.splice(0, history.length - limit);
  }
}

function inboundKey(srcChainId: ChainId, srcAddress: Uint8Array): string {
  return `${srcChainId}:${toHex(srcAddress)}`;
}

function configKey(version: number, chainId: number, configType: number): string {
  return `${version}:${chainId}:${configType}`;
}
