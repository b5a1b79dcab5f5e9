/**
 * Gateway Events
 *
 * Change notifications for every administrative write plus the inbound and
 * outbound message lifecycle. Bytes are carried as lowercase hex so events
 * can be logged and archived verbatim.
 */

import type { GatewayErrorCode } from '../errors/index.js';
import type { Logger } from '../utils/index.js';

export type GatewayEvent =
  // Registry changes
  | { type: 'SET_TRUSTED_REMOTE'; remoteChainId: number; path: string }
  | { type: 'SET_TRUSTED_REMOTE_ADDRESS'; remoteChainId: number; remoteAddress: string }
  | { type: 'SET_MIN_DST_GAS'; dstChainId: number; messageType: number; minDstGas: bigint }
  | { type: 'SET_PAYLOAD_SIZE_LIMIT'; dstChainId: number; size: number }
  // Transport configuration
  | { type: 'SET_PRECRIME'; precrime: string }
  | { type: 'SET_CONFIG'; version: number; chainId: number; configType: number; config: string }
  | { type: 'SET_SEND_VERSION'; version: number }
  | { type: 'SET_RECEIVE_VERSION'; version: number }
  | { type: 'FORCE_RESUME_RECEIVE'; srcChainId: number; srcAddress: string }
  // Message lifecycle
  | { type: 'MESSAGE_ACCEPTED'; srcChainId: number; srcAddress: string; nonce: bigint }
  | {
      type: 'MESSAGE_REJECTED';
      srcChainId: number;
      srcAddress: string;
      nonce: bigint;
      reason: GatewayErrorCode | 'UNKNOWN';
    }
  | { type: 'MESSAGE_SENT'; dstChainId: number; destination: string; payloadSize: number; txHash: string }
  | {
      type: 'MESSAGE_FAILED';
      srcChainId: number;
      srcAddress: string;
      nonce: bigint;
      payload: string;
      reason: string;
    }
  | { type: 'RETRY_MESSAGE_SUCCESS'; srcChainId: number; srcAddress: string; nonce: bigint; payloadHash: string };

export type GatewayEventType = GatewayEvent['type'];

export type EventHandler = (event: GatewayEvent) => void;

/**
 * Synchronous fan-out. A throwing handler is logged and never interrupts the
 * operation that emitted the event.
 */
export class GatewayEventBus {
  private eventHandlers: EventHandler[] = [];

  constructor(private readonly logger: Logger) {}

  /**
   * Subscribe to gateway events. Returns an unsubscribe function.
   */
  onEvent(handler: EventHandler): () => void {
    this.eventHandlers.push(handler);
    return () => {
      this.eventHandlers = this.eventHandlers.filter((h) => h !== handler);
    };
  }

  emit(event: GatewayEvent): void {
    for (const handler of this.eventHandlers) {
      try {
        handler(event);
      } catch (error) {
        this.logger.error({ event: event.type, error }, 'Event handler error');
      }
    }
  }
}
