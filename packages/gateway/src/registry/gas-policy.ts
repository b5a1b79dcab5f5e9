/**
 * Destination Gas Policy
 *
 * (dstChainId, messageType) -> minimum destination gas.
 *
 * A floor of zero is indistinguishable from "unset", so it is refused at
 * write time and treated as a configuration error at check time.
 */

import { BytesLike } from 'ethers';
import { assertUint256, chainId, messageType } from '../boundaries/index.js';
import {
  GasLimitTooLowError,
  InvalidMinGasError,
  MinGasLimitNotSetError,
} from '../errors/index.js';
import type { GatewayEventBus } from '../gateway/events.js';
import { decodeGasLimit } from './adapter-params.js';

export interface MinGasEntry {
  dstChainId: number;
  messageType: number;
  minGas: bigint;
}

function entryKey(dstChainId: number, type: number): string {
  return `${dstChainId}:${type}`;
}

export class GasPolicy {
  private minDstGas: Map<string, MinGasEntry> = new Map();

  constructor(private readonly events: GatewayEventBus) {}

  /**
   * Validate a write without applying it.
   * Throws InvalidMinGasError for zero.
   */
  checkMinGas(dstChainId: number, type: number, minGas: bigint): MinGasEntry {
    const dst = chainId(dstChainId);
    const msgType = messageType(type);
    assertUint256(minGas, 'minGas');
    if (minGas === 0n) {
      throw new InvalidMinGasError(dst, msgType);
    }
    return { dstChainId: dst, messageType: msgType, minGas };
  }

  setMinGas(dstChainId: number, type: number, minGas: bigint): void {
    const entry = this.checkMinGas(dstChainId, type, minGas);
    this.minDstGas.set(entryKey(entry.dstChainId, entry.messageType), entry);
    this.events.emit({
      type: 'SET_MIN_DST_GAS',
      dstChainId: entry.dstChainId,
      messageType: entry.messageType,
      minDstGas: entry.minGas,
    });
  }

  /**
   * Configured floor, 0n when unset.
   */
  getMinGas(dstChainId: number, type: number): bigint {
    const key = entryKey(chainId(dstChainId), messageType(type));
    return this.minDstGas.get(key)?.minGas ?? 0n;
  }

  /**
   * Require `decodeGasLimit(adapterParams) >= minGas + extraGas`.
   *
   * `extraGas` covers the message type's known per-message overhead and is
   * added to the floor, never compared on its own.
   */
  requireSufficient(
    dstChainId: number,
    type: number,
    adapterParams: BytesLike,
    extraGas: bigint = 0n
  ): void {
    assertUint256(extraGas, 'extraGas');
    const provided = decodeGasLimit(adapterParams);
    const minGas = this.getMinGas(dstChainId, type);
    if (minGas === 0n) {
      throw new MinGasLimitNotSetError(dstChainId, type);
    }
    const required = minGas + extraGas;
    if (provided < required) {
      throw new GasLimitTooLowError(provided, required);
    }
  }

  entries(): MinGasEntry[] {
    return Array.from(this.minDstGas.values(), (entry) => ({ ...entry }));
  }

  /**
   * Restore persisted state without emitting change events.
   */
  hydrate(entries: Iterable<MinGasEntry>): void {
    for (const entry of entries) {
      const checked = this.checkMinGas(entry.dstChainId, entry.messageType, entry.minGas);
      this.minDstGas.set(entryKey(checked.dstChainId, checked.messageType), checked);
    }
  }
}
