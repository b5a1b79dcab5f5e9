/**
 * Gateway Types
 */

import type { BytesLike } from 'ethers';
import type { ChainId, Nonce } from '../boundaries/index.js';

/**
 * An inbound message that passed transport-identity and path verification.
 * Fields are exactly what the transport delivered.
 */
export interface InboundMessage {
  srcChainId: ChainId;
  srcAddress: Uint8Array;
  nonce: Nonce;
  payload: Uint8Array;
}

/**
 * Application-level processing of an authenticated message.
 */
export type ApplicationReceiver = (message: InboundMessage) => void | Promise<void>;

/**
 * A message the application failed on, kept for retry by payload hash.
 */
export interface FailedMessageEntry {
  srcChainId: number;
  srcAddress: Uint8Array;
  nonce: bigint;
  payloadHash: string;
}

/**
 * Delivery strategy between the gateway and the application.
 * Invoked exactly once per authenticated inbound call, after verification.
 */
export interface ReceiveHandler {
  handle(message: InboundMessage): Promise<void>;
  /** Stored failures, for strategies that keep them. */
  failedMessages?(): FailedMessageEntry[];
  restoreFailedMessages?(entries: FailedMessageEntry[]): void;
}

export interface SendRequest {
  dstChainId: number;
  /** Remote application address; the local address is appended on the wire. */
  dstAddress: BytesLike;
  payload: BytesLike;
  refundAddress: string;
  /** Zero address to pay in native. */
  zroPaymentAddress: string;
  adapterParams: BytesLike;
  nativeFee: bigint;
}
