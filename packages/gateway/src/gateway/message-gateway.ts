/**
 * Message Gateway
 *
 * The trust boundary between a cross-chain transport and one local
 * application.
 *
 * Inbound: deliveries arrive only through the receiver the gateway attaches
 * to its transport. The identity that channel authenticated must be the
 * configured endpoint, and the source chain's trusted path must match the
 * delivered source bytes exactly. Anything else is rejected before the
 * receive handler runs.
 *
 * Outbound: only to chains with a trusted path, only payloads within the
 * size limit. Rejected sends never reach the transport.
 *
 * Every check in receive/send runs synchronously before the first await, so
 * a concurrent admin write is observed either entirely before or entirely
 * after the check.
 */

import { BytesLike, ZeroAddress, getBytes } from 'ethers';
import {
  EvmAddress,
  assertUint256,
  chainId,
  concatBytes,
  evmAddress,
  messageType,
  nonce as toNonce,
  sameAddress,
  toBytes,
  toHex,
} from '../boundaries/index.js';
import { ForbiddenError, NoTrustedRemoteError, errorCode } from '../errors/index.js';
import { GatewayMetrics, NoOpMetrics } from '../observability/index.js';
import type { RegistrySnapshot } from '../persistence/registry-store.js';
import { GasPolicy, PathRegistry, PayloadSizePolicy } from '../registry/index.js';
import type { DispatchRequest, FeeQuote, InboundDelivery, SendReceipt, Transport } from '../transport/index.js';
import { Logger, createLogger } from '../utils/index.js';
import { GatewayEventBus } from './events.js';
import type { InboundMessage, ReceiveHandler, SendRequest } from './types.js';

export interface MessageGatewayOptions {
  /** Transport identity allowed to deliver. */
  endpoint: string;
  /** This application's address, appended to every trusted path. */
  localAddress: string;
  transport: Transport;
  handler: ReceiveHandler;
  events?: GatewayEventBus;
  logger?: Logger;
  metrics?: GatewayMetrics;
}

export class MessageGateway {
  readonly endpoint: EvmAddress;
  readonly localAddress: EvmAddress;
  readonly events: GatewayEventBus;

  readonly paths: PathRegistry;
  readonly gas: GasPolicy;
  readonly payloadSize: PayloadSizePolicy;

  private transport: Transport;
  private handler: ReceiveHandler;
  private logger: Logger;
  private metrics: GatewayMetrics;
  private precrime: string = ZeroAddress;

  constructor(options: MessageGatewayOptions) {
    this.endpoint = evmAddress(options.endpoint);
    this.localAddress = evmAddress(options.localAddress);
    this.transport = options.transport;
    this.handler = options.handler;
    this.logger = (options.logger ?? createLogger()).child({ component: 'message-gateway' });
    this.metrics = options.metrics ?? new NoOpMetrics();
    this.events = options.events ?? new GatewayEventBus(this.logger);

    this.paths = new PathRegistry(this.localAddress, this.events);
    this.gas = new GasPolicy(this.events);
    this.payloadSize = new PayloadSizePolicy(this.events);

    this.transport.attach(this.localAddress, (delivery) => this.receive(delivery));
  }

  // ===========================================================================
  // Inbound
  // ===========================================================================

  /**
   * Inbound entry, reachable only through the attached transport channel.
   * Authenticates the caller and the source path, then hands the message to
   * the receive handler exactly once.
   */
  private async receive(delivery: InboundDelivery): Promise<void> {
    const message = this.authenticate(
      delivery.caller,
      delivery.srcChainId,
      delivery.srcAddress,
      delivery.nonce,
      delivery.payload
    );
    await this.handler.handle(message);
  }

  private authenticate(
    caller: string,
    srcChainId: number,
    srcAddress: BytesLike,
    nonce: bigint | number,
    payload: BytesLike
  ): InboundMessage {
    if (!sameAddress(caller, this.endpoint)) {
      const error = new ForbiddenError('Caller is not the transport endpoint', { caller });
      this.rejectInbound(srcChainId, undefined, error);
      throw error;
    }

    let message: InboundMessage;
    try {
      message = {
        srcChainId: chainId(srcChainId),
        srcAddress: toBytes(srcAddress, 'srcAddress'),
        nonce: toNonce(nonce),
        payload: toBytes(payload, 'payload'),
      };
    } catch (error) {
      this.rejectInbound(srcChainId, undefined, error);
      throw error;
    }

    if (!this.paths.verify(message.srcChainId, message.srcAddress)) {
      const error = new NoTrustedRemoteError(
        message.srcChainId,
        `Invalid source sending contract for chain ${message.srcChainId}`
      );
      this.rejectInbound(srcChainId, message, error);
      throw error;
    }

    this.metrics.messageAccepted(message.srcChainId);
    this.logger.debug({ chainId: message.srcChainId, nonce: message.nonce }, 'Inbound message accepted');
    this.events.emit({
      type: 'MESSAGE_ACCEPTED',
      srcChainId: message.srcChainId,
      srcAddress: toHex(message.srcAddress),
      nonce: message.nonce,
    });
    return message;
  }

  private rejectInbound(srcChainId: number, message: InboundMessage | undefined, error: unknown): void {
    const code = errorCode(error);
    this.metrics.messageRejected(srcChainId, code);
    this.logger.warn({ chainId: srcChainId, code, error }, 'Inbound message rejected');
    if (message) {
      this.events.emit({
        type: 'MESSAGE_REJECTED',
        srcChainId: message.srcChainId,
        srcAddress: toHex(message.srcAddress),
        nonce: message.nonce,
        reason: code,
      });
    }
  }

  // ===========================================================================
  // Outbound
  // ===========================================================================

  /**
   * Dispatch a payload to the trusted application on `dstChainId`.
   *
   * Gas floors are NOT enforced here; call `requireSufficientGas` first or
   * use `sendWithGasCheck`.
   */
  async send(request: SendRequest): Promise<SendReceipt> {
    const dstChainId = chainId(request.dstChainId);
    let dispatch: DispatchRequest;
    try {
      this.paths.requireTrusted(dstChainId);
      const payload = toBytes(request.payload, 'payload');
      this.payloadSize.requireWithinLimit(dstChainId, payload.length);
      assertUint256(request.nativeFee, 'nativeFee');
      dispatch = {
        dstChainId,
        destination: concatBytes(toBytes(request.dstAddress, 'dstAddress'), getBytes(this.localAddress)),
        payload,
        refundAddress: evmAddress(request.refundAddress),
        zroPaymentAddress: evmAddress(request.zroPaymentAddress),
        adapterParams: toBytes(request.adapterParams, 'adapterParams'),
        nativeFee: request.nativeFee,
      };
    } catch (error) {
      this.metrics.sendRejected(dstChainId, errorCode(error));
      this.logger.warn({ chainId: dstChainId, code: errorCode(error), error }, 'Send rejected');
      throw error;
    }

    const receipt = await this.transport.send(dispatch);

    this.metrics.messageSent(dstChainId, dispatch.payload.length);
    this.logger.info({ chainId: dstChainId, txHash: receipt.txHash }, 'Message sent');
    this.events.emit({
      type: 'MESSAGE_SENT',
      dstChainId,
      destination: toHex(dispatch.destination),
      payloadSize: dispatch.payload.length,
      txHash: receipt.txHash,
    });
    return receipt;
  }

  /**
   * `requireSufficientGas` followed by `send`.
   */
  async sendWithGasCheck(request: SendRequest, type: number, extraGas: bigint = 0n): Promise<SendReceipt> {
    try {
      this.requireSufficientGas(request.dstChainId, type, request.adapterParams, extraGas);
    } catch (error) {
      this.metrics.sendRejected(request.dstChainId, errorCode(error));
      throw error;
    }
    return this.send(request);
  }

  requireSufficientGas(dstChainId: number, type: number, adapterParams: BytesLike, extraGas: bigint = 0n): void {
    this.gas.requireSufficient(chainId(dstChainId), messageType(type), adapterParams, extraGas);
  }

  async estimateFees(
    dstChainId: number,
    payload: BytesLike,
    payInZro: boolean,
    adapterParams: BytesLike
  ): Promise<FeeQuote> {
    return this.transport.estimateFees(
      chainId(dstChainId),
      this.localAddress,
      toBytes(payload, 'payload'),
      payInZro,
      toBytes(adapterParams, 'adapterParams')
    );
  }

  // ===========================================================================
  // Precrime
  // ===========================================================================

  // Opaque to the gateway; kept exactly as given.
  setPrecrime(address: string): void {
    this.precrime = address;
    this.events.emit({ type: 'SET_PRECRIME', precrime: address });
  }

  getPrecrime(): string {
    return this.precrime;
  }

  // ===========================================================================
  // State
  // ===========================================================================

  snapshot(): RegistrySnapshot {
    return {
      trustedPaths: this.paths.entries(),
      minDstGas: this.gas.entries(),
      payloadSizeLimits: this.payloadSize.entries(),
      precrime: this.precrime === ZeroAddress ? null : this.precrime,
      failedMessages: this.handler.failedMessages?.() ?? [],
    };
  }

  /**
   * Restore persisted registries. Emits no change events.
   */
  hydrate(snapshot: RegistrySnapshot): void {
    this.paths.hydrate(snapshot.trustedPaths);
    this.gas.hydrate(snapshot.minDstGas);
    this.payloadSize.hydrate(snapshot.payloadSizeLimits);
    if (snapshot.precrime !== null) {
      this.precrime = snapshot.precrime;
    }
    if (this.handler.restoreFailedMessages) {
      this.handler.restoreFailedMessages(snapshot.failedMessages);
    } else if (snapshot.failedMessages.length > 0) {
      this.logger.warn(
        { failedMessages: snapshot.failedMessages.length },
        'Stored failed messages are not retryable by the blocking receive handler'
      );
    }
    this.logger.info(
      {
        trustedPaths: snapshot.trustedPaths.length,
        minDstGas: snapshot.minDstGas.length,
        payloadSizeLimits: snapshot.payloadSizeLimits.length,
        failedMessages: snapshot.failedMessages.length,
      },
      'Registries hydrated'
    );
  }
}
