/**
 * Trusted Path Registry
 *
 * remoteChainId -> expected encoded remote sender ("trusted path").
 *
 * The path is an opaque blob, conventionally `remoteAddress ++ localAddress`.
 * A chain with no path, or with an empty one, is untrusted and every check
 * against it fails closed.
 */

import { BytesLike, getBytes } from 'ethers';
import {
  ADDRESS_LENGTH,
  ChainId,
  EvmAddress,
  bytesEqual,
  chainId,
  concatBytes,
  toBytes,
  toHex,
} from '../boundaries/index.js';
import { NoTrustedRemoteError } from '../errors/index.js';
import type { GatewayEventBus } from '../gateway/events.js';

export interface TrustedPathEntry {
  remoteChainId: number;
  path: Uint8Array;
}

export class PathRegistry {
  private paths: Map<ChainId, Uint8Array> = new Map();

  constructor(
    private readonly localAddress: EvmAddress,
    private readonly events: GatewayEventBus
  ) {}

  /**
   * Overwrite the path for a chain. No length validation.
   * An empty path returns the chain to the untrusted state.
   */
  setTrustedPath(remoteChainId: number, path: BytesLike): void {
    const id = chainId(remoteChainId);
    const bytes = toBytes(path, 'trusted path');
    this.paths.set(id, bytes);
    this.events.emit({ type: 'SET_TRUSTED_REMOTE', remoteChainId: id, path: toHex(bytes) });
  }

  /**
   * Register `remoteAddress ++ localAddress` as the path for a chain.
   */
  setTrustedRemoteAddress(remoteChainId: number, remoteAddress: BytesLike): void {
    const id = chainId(remoteChainId);
    const remote = toBytes(remoteAddress, 'remote address');
    this.paths.set(id, this.composePath(remote));
    this.events.emit({ type: 'SET_TRUSTED_REMOTE_ADDRESS', remoteChainId: id, remoteAddress: toHex(remote) });
  }

  /**
   * The path `setTrustedRemoteAddress` would store for this remote address.
   */
  composePath(remoteAddress: BytesLike): Uint8Array {
    return concatBytes(toBytes(remoteAddress, 'remote address'), getBytes(this.localAddress));
  }

  /**
   * True iff a non-empty path is registered and equals the candidate byte
   * for byte. Unset never matches unset.
   */
  verify(remoteChainId: number, candidate: BytesLike): boolean {
    const registered = this.paths.get(chainId(remoteChainId));
    const bytes = toBytes(candidate, 'candidate path');
    return registered !== undefined
      && registered.length !== 0
      && registered.length === bytes.length
      && bytesEqual(registered, bytes);
  }

  requireTrusted(remoteChainId: number): Uint8Array {
    const path = this.getTrustedPath(remoteChainId);
    if (path.length === 0) {
      throw new NoTrustedRemoteError(remoteChainId);
    }
    return path;
  }

  /**
   * Raw registered path, empty when unset.
   */
  getTrustedPath(remoteChainId: number): Uint8Array {
    const path = this.paths.get(chainId(remoteChainId));
    return path ? path.slice() : new Uint8Array(0);
  }

  /**
   * The remote half of the registered path (trailing local address removed).
   */
  getTrustedRemoteAddress(remoteChainId: number): Uint8Array {
    const path = this.requireTrusted(remoteChainId);
    return path.slice(0, Math.max(0, path.length - ADDRESS_LENGTH));
  }

  entries(): TrustedPathEntry[] {
    return Array.from(this.paths, ([remoteChainId, path]) => ({ remoteChainId, path: path.slice() }));
  }

  /**
   * Restore persisted state without emitting change events.
   */
  hydrate(entries: Iterable<TrustedPathEntry>): void {
    for (const entry of entries) {
      this.paths.set(chainId(entry.remoteChainId), toBytes(entry.path, 'trusted path'));
    }
  }
}
