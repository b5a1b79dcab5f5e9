/**
 * Payload Size Policy
 *
 * dstChainId -> maximum outbound payload size in bytes. A chain without an
 * override (or with 0) uses DEFAULT_PAYLOAD_SIZE_LIMIT.
 */

import { ChainId, InvariantViolation, chainId } from '../boundaries/index.js';
import { PayloadTooLargeError } from '../errors/index.js';
import type { GatewayEventBus } from '../gateway/events.js';

export const DEFAULT_PAYLOAD_SIZE_LIMIT = 10_000;

export interface PayloadSizeEntry {
  dstChainId: number;
  size: number;
}

export class PayloadSizePolicy {
  private limits: Map<ChainId, number> = new Map();

  constructor(private readonly events: GatewayEventBus) {}

  checkLimit(dstChainId: number, size: number): PayloadSizeEntry {
    const dst = chainId(dstChainId);
    if (!Number.isSafeInteger(size) || size < 0) {
      throw new InvariantViolation('PAYLOAD_SIZE', `Payload size limit must be a non-negative integer, got ${size}`);
    }
    return { dstChainId: dst, size };
  }

  setLimit(dstChainId: number, size: number): void {
    const entry = this.checkLimit(dstChainId, size);
    this.limits.set(chainId(entry.dstChainId), entry.size);
    this.events.emit({ type: 'SET_PAYLOAD_SIZE_LIMIT', dstChainId: entry.dstChainId, size: entry.size });
  }

  /**
   * The stored override, 0 when none.
   */
  getConfiguredLimit(dstChainId: number): number {
    return this.limits.get(chainId(dstChainId)) ?? 0;
  }

  getEffectiveLimit(dstChainId: number): number {
    const configured = this.getConfiguredLimit(dstChainId);
    return configured === 0 ? DEFAULT_PAYLOAD_SIZE_LIMIT : configured;
  }

  requireWithinLimit(dstChainId: number, payloadSize: number): void {
    const limit = this.getEffectiveLimit(dstChainId);
    if (payloadSize > limit) {
      throw new PayloadTooLargeError(payloadSize, limit);
    }
  }

  entries(): PayloadSizeEntry[] {
    return Array.from(this.limits, ([dstChainId, size]) => ({ dstChainId, size }));
  }

  hydrate(entries: Iterable<PayloadSizeEntry>): void {
    for (const entry of entries) {
      const checked = this.checkLimit(entry.dstChainId, entry.size);
      this.limits.set(chainId(checked.dstChainId), checked.size);
    }
  }
}
