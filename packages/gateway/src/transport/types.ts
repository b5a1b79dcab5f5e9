/**
 * Transport Interface
 *
 * The cross-chain endpoint the gateway hands validated messages to. The
 * transport alone owns delivery, ordering, retry and fee accounting; the
 * gateway never sees past this boundary.
 */

import type { ChainId, EvmAddress } from '../boundaries/index.js';

/**
 * A send that has passed every gateway check.
 */
export interface DispatchRequest {
  dstChainId: ChainId;
  /** `dstAddress ++ localAddress` */
  destination: Uint8Array;
  payload: Uint8Array;
  refundAddress: EvmAddress;
  /** Zero address pays in native; anything else selects ZRO payment. */
  zroPaymentAddress: EvmAddress;
  adapterParams: Uint8Array;
  nativeFee: bigint;
}

export interface SendReceipt {
  txHash: string;
  /** Outbound nonce, when the transport reports it. */
  nonce?: bigint;
}

export interface FeeQuote {
  nativeFee: bigint;
  zroFee: bigint;
}

export interface Transport {
  /** Identity the endpoint delivers as. */
  readonly address: EvmAddress;

  /**
   * Register the inbound channel for `application`. Deliveries addressed to
   * it are handed to `receiver`, carrying the identity this channel
   * authenticated.
   */
  attach(application: EvmAddress, receiver: InboundReceiver): void;

  /**
   * Hand a payload to the endpoint. Resolves once the endpoint accepted it,
   * not when it is delivered.
   */
  send(request: DispatchRequest): Promise<SendReceipt>;

  estimateFees(
    dstChainId: ChainId,
    userApplication: EvmAddress,
    payload: Uint8Array,
    payInZro: boolean,
    adapterParams: Uint8Array
  ): Promise<FeeQuote>;

  getConfig(
    version: number,
    chainId: ChainId,
    userApplication: EvmAddress,
    configType: number
  ): Promise<Uint8Array>;

  setConfig(version: number, chainId: ChainId, configType: number, config: Uint8Array): Promise<void>;

  setSendVersion(version: number): Promise<void>;

  setReceiveVersion(version: number): Promise<void>;

  /**
   * Drop the payload blocking an inbound path so later nonces can flow.
   */
  forceResumeReceive(srcChainId: ChainId, srcAddress: Uint8Array): Promise<void>;
}

/**
 * One delivery from an endpoint. `caller` is the identity the channel
 * authenticated, never a value the sender chose.
 */
export interface InboundDelivery {
  caller: string;
  srcChainId: number;
  srcAddress: Uint8Array;
  nonce: bigint;
  payload: Uint8Array;
}

export type InboundReceiver = (delivery: InboundDelivery) => Promise<void>;
