/**
 * Receive Handlers
 *
 * Two delivery strategies for authenticated inbound messages:
 *
 * - Blocking: application errors propagate back to the transport, which keeps
 *   the payload and blocks the path until it is retried or force-resumed.
 * - Non-blocking: application errors are caught here; the payload hash is
 *   stored under (srcChainId, srcAddress, nonce) and anyone holding the
 *   original payload can retry it. The path keeps flowing. With a store the
 *   stored failures survive a restart.
 */

import { BytesLike, keccak256 } from 'ethers';
import { chainId, nonce as toNonce, toBytes, toHex } from '../boundaries/index.js';
import { InvalidPayloadError, NoStoredMessageError } from '../errors/index.js';
import { GatewayMetrics, NoOpMetrics } from '../observability/index.js';
import type { RegistryStore } from '../persistence/registry-store.js';
import { Logger, createLogger } from '../utils/index.js';
import type { GatewayEventBus } from './events.js';
import type { ApplicationReceiver, FailedMessageEntry, InboundMessage, ReceiveHandler } from './types.js';

// =============================================================================
// BLOCKING
// =============================================================================

export class BlockingReceiveHandler implements ReceiveHandler {
  constructor(private readonly application: ApplicationReceiver) {}

  async handle(message: InboundMessage): Promise<void> {
    await this.application(message);
  }
}

// =============================================================================
// NON-BLOCKING
// =============================================================================

/**
 * Durable side of the failed-message map. A RegistryStore satisfies it.
 */
export type FailedMessageStore = Pick<RegistryStore, 'saveFailedMessage' | 'deleteFailedMessage'>;

function failedKey(srcChainId: number, srcAddress: Uint8Array, nonce: bigint): string {
  return `${srcChainId}:${toHex(srcAddress)}:${nonce}`;
}

export class NonblockingReceiveHandler implements ReceiveHandler {
  private failed: Map<string, FailedMessageEntry> = new Map();
  private store?: FailedMessageStore;
  private logger: Logger;
  private metrics: GatewayMetrics;

  constructor(
    private readonly application: ApplicationReceiver,
    private readonly events: GatewayEventBus,
    options?: {
      logger?: Logger;
      metrics?: GatewayMetrics;
      /** Failures are written here before they are kept in memory. */
      store?: FailedMessageStore;
    }
  ) {
    this.logger = (options?.logger ?? createLogger()).child({ component: 'nonblocking-receiver' });
    this.metrics = options?.metrics ?? new NoOpMetrics();
    this.store = options?.store;
  }

  /**
   * A failure that cannot be persisted propagates to the transport, which
   * keeps the payload itself.
   */
  async handle(message: InboundMessage): Promise<void> {
    try {
      await this.application(message);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      const entry: FailedMessageEntry = {
        srcChainId: message.srcChainId,
        srcAddress: message.srcAddress,
        nonce: message.nonce,
        payloadHash: keccak256(message.payload),
      };
      await this.store?.saveFailedMessage(entry);
      this.failed.set(failedKey(entry.srcChainId, entry.srcAddress, entry.nonce), entry);

      this.metrics.messageFailed(message.srcChainId);
      this.logger.warn(
        { chainId: message.srcChainId, nonce: message.nonce, error },
        'Application failed, message stored for retry'
      );
      this.events.emit({
        type: 'MESSAGE_FAILED',
        srcChainId: message.srcChainId,
        srcAddress: toHex(message.srcAddress),
        nonce: message.nonce,
        payload: toHex(message.payload),
        reason,
      });
    }
  }

  /**
   * keccak256 of the stored payload, or null when nothing is stored.
   */
  getFailedMessageHash(srcChainId: number, srcAddress: BytesLike, nonce: bigint | number): string | null {
    const key = failedKey(chainId(srcChainId), toBytes(srcAddress, 'srcAddress'), toNonce(nonce));
    return this.failed.get(key)?.payloadHash ?? null;
  }

  failedMessages(): FailedMessageEntry[] {
    return Array.from(this.failed.values(), (entry) => ({ ...entry, srcAddress: entry.srcAddress.slice() }));
  }

  restoreFailedMessages(entries: FailedMessageEntry[]): void {
    for (const entry of entries) {
      this.failed.set(failedKey(entry.srcChainId, entry.srcAddress, entry.nonce), {
        ...entry,
        srcAddress: entry.srcAddress.slice(),
      });
    }
  }

  /**
   * Re-run the application on a stored message. The entry is claimed before
   * the attempt and restored if the application fails again.
   */
  async retryMessage(
    srcChainId: number,
    srcAddress: BytesLike,
    nonce: bigint | number,
    payload: BytesLike
  ): Promise<void> {
    const message: InboundMessage = {
      srcChainId: chainId(srcChainId),
      srcAddress: toBytes(srcAddress, 'srcAddress'),
      nonce: toNonce(nonce),
      payload: toBytes(payload, 'payload'),
    };
    const key = failedKey(message.srcChainId, message.srcAddress, message.nonce);
    const entry = this.failed.get(key);
    if (!entry) {
      throw new NoStoredMessageError(`No stored message for chain ${message.srcChainId}, nonce ${message.nonce}`);
    }
    if (keccak256(message.payload) !== entry.payloadHash) {
      throw new InvalidPayloadError('Payload does not match the stored message hash');
    }

    // Claimed synchronously so a concurrent retry finds nothing stored.
    this.failed.delete(key);
    try {
      await this.store?.deleteFailedMessage(message.srcChainId, message.srcAddress, message.nonce);
    } catch (error) {
      this.failed.set(key, entry);
      throw error;
    }

    try {
      await this.application(message);
    } catch (error) {
      this.failed.set(key, entry);
      await this.store?.saveFailedMessage(entry);
      throw error;
    }

    this.metrics.messageRetried(message.srcChainId);
    this.events.emit({
      type: 'RETRY_MESSAGE_SUCCESS',
      srcChainId: message.srcChainId,
      srcAddress: toHex(message.srcAddress),
      nonce: message.nonce,
      payloadHash: entry.payloadHash,
    });
  }
}
