/**
 * Admin Surface
 *
 * Authorized mutation of the gateway's registries and pass-through
 * configuration of the transport.
 *
 * Mutation order:
 * 1. authorize (Forbidden)
 * 2. validate (nothing is written for a rejected value)
 * 3. write ahead to the RegistryStore
 * 4. apply to memory in one synchronous overwrite
 *
 * Reads are open to anyone.
 */

import { BytesLike } from 'ethers';
import { chainId, toBytes, toHex } from '../boundaries/index.js';
import { ForbiddenError } from '../errors/index.js';
import type { MessageGateway } from '../gateway/index.js';
import { GatewayMetrics, NoOpMetrics } from '../observability/index.js';
import type { RegistryStore } from '../persistence/index.js';
import type { Transport } from '../transport/index.js';
import { Logger, createLogger } from '../utils/index.js';
import type { AccessControl, AdminContext } from './access-control.js';

export class AdminSurface {
  private logger: Logger;
  private metrics: GatewayMetrics;

  constructor(
    private readonly gateway: MessageGateway,
    private readonly transport: Transport,
    private readonly access: AccessControl,
    private readonly store: RegistryStore,
    options?: {
      logger?: Logger;
      metrics?: GatewayMetrics;
    }
  ) {
    this.logger = (options?.logger ?? createLogger()).child({ component: 'admin' });
    this.metrics = options?.metrics ?? new NoOpMetrics();
  }

  // ===========================================================================
  // Trusted paths
  // ===========================================================================

  async setTrustedRemote(ctx: AdminContext, remoteChainId: number, path: BytesLike): Promise<void> {
    this.authorize(ctx, 'setTrustedRemote');
    const id = chainId(remoteChainId);
    const bytes = toBytes(path, 'trusted path');

    await this.store.saveTrustedPath({ remoteChainId: id, path: bytes });
    this.gateway.paths.setTrustedPath(id, bytes);
    this.recordMutation('setTrustedRemote', { chainId: id, path: bytes });
  }

  async setTrustedRemoteAddress(ctx: AdminContext, remoteChainId: number, remoteAddress: BytesLike): Promise<void> {
    this.authorize(ctx, 'setTrustedRemoteAddress');
    const id = chainId(remoteChainId);
    const remote = toBytes(remoteAddress, 'remote address');

    await this.store.saveTrustedPath({ remoteChainId: id, path: this.gateway.paths.composePath(remote) });
    this.gateway.paths.setTrustedRemoteAddress(id, remote);
    this.recordMutation('setTrustedRemoteAddress', { chainId: id, remoteAddress: remote });
  }

  /**
   * Raw registered path; empty when the chain is untrusted.
   */
  getTrustedRemote(remoteChainId: number): Uint8Array {
    return this.gateway.paths.getTrustedPath(remoteChainId);
  }

  getTrustedRemoteAddress(remoteChainId: number): Uint8Array {
    return this.gateway.paths.getTrustedRemoteAddress(remoteChainId);
  }

  isTrustedRemote(remoteChainId: number, path: BytesLike): boolean {
    return this.gateway.paths.verify(remoteChainId, path);
  }

  // ===========================================================================
  // Gas floors
  // ===========================================================================

  async setMinDstGas(ctx: AdminContext, dstChainId: number, type: number, minGas: bigint): Promise<void> {
    this.authorize(ctx, 'setMinDstGas');
    const entry = this.gateway.gas.checkMinGas(dstChainId, type, minGas);

    await this.store.saveMinDstGas(entry);
    this.gateway.gas.setMinGas(entry.dstChainId, entry.messageType, entry.minGas);
    this.recordMutation('setMinDstGas', {
      chainId: entry.dstChainId,
      messageType: entry.messageType,
      minGas: entry.minGas,
    });
  }

  getMinDstGas(dstChainId: number, type: number): bigint {
    return this.gateway.gas.getMinGas(dstChainId, type);
  }

  // ===========================================================================
  // Payload size
  // ===========================================================================

  async setPayloadSizeLimit(ctx: AdminContext, dstChainId: number, size: number): Promise<void> {
    this.authorize(ctx, 'setPayloadSizeLimit');
    const entry = this.gateway.payloadSize.checkLimit(dstChainId, size);

    await this.store.savePayloadSizeLimit(entry);
    this.gateway.payloadSize.setLimit(entry.dstChainId, entry.size);
    this.recordMutation('setPayloadSizeLimit', { chainId: entry.dstChainId, size: entry.size });
  }

  /**
   * Configured override, 0 when the default applies.
   */
  getPayloadSizeLimit(dstChainId: number): number {
    return this.gateway.payloadSize.getConfiguredLimit(dstChainId);
  }

  // ===========================================================================
  // Precrime
  // ===========================================================================

  async setPrecrime(ctx: AdminContext, precrime: string): Promise<void> {
    this.authorize(ctx, 'setPrecrime');

    await this.store.savePrecrime(precrime);
    this.gateway.setPrecrime(precrime);
    this.recordMutation('setPrecrime', { precrime });
  }

  getPrecrime(): string {
    return this.gateway.getPrecrime();
  }

  // ===========================================================================
  // Transport configuration (forwarded verbatim)
  // ===========================================================================

  async getConfig(version: number, remoteChainId: number, configType: number): Promise<Uint8Array> {
    return this.transport.getConfig(version, chainId(remoteChainId), this.gateway.localAddress, configType);
  }

  async setConfig(
    ctx: AdminContext,
    version: number,
    remoteChainId: number,
    configType: number,
    config: BytesLike
  ): Promise<void> {
    this.authorize(ctx, 'setConfig');
    const id = chainId(remoteChainId);
    const bytes = toBytes(config, 'config');

    await this.transport.setConfig(version, id, configType, bytes);
    this.gateway.events.emit({ type: 'SET_CONFIG', version, chainId: id, configType, config: toHex(bytes) });
    this.recordMutation('setConfig', { version, chainId: id, configType });
  }

  async setSendVersion(ctx: AdminContext, version: number): Promise<void> {
    this.authorize(ctx, 'setSendVersion');
    await this.transport.setSendVersion(version);
    this.gateway.events.emit({ type: 'SET_SEND_VERSION', version });
    this.recordMutation('setSendVersion', { version });
  }

  async setReceiveVersion(ctx: AdminContext, version: number): Promise<void> {
    this.authorize(ctx, 'setReceiveVersion');
    await this.transport.setReceiveVersion(version);
    this.gateway.events.emit({ type: 'SET_RECEIVE_VERSION', version });
    this.recordMutation('setReceiveVersion', { version });
  }

  async forceResumeReceive(ctx: AdminContext, srcChainId: number, srcAddress: BytesLike): Promise<void> {
    this.authorize(ctx, 'forceResumeReceive');
    const id = chainId(srcChainId);
    const bytes = toBytes(srcAddress, 'srcAddress');

    await this.transport.forceResumeReceive(id, bytes);
    this.gateway.events.emit({ type: 'FORCE_RESUME_RECEIVE', srcChainId: id, srcAddress: toHex(bytes) });
    this.recordMutation('forceResumeReceive', { chainId: id, srcAddress: bytes });
  }

  // ===========================================================================
  // Private Helpers
  // ===========================================================================

  private authorize(ctx: AdminContext, operation: string): void {
    if (!this.access.isAdmin(ctx.caller)) {
      this.metrics.adminDenied(operation);
      this.logger.warn({ operation, caller: ctx.caller }, 'Admin operation denied');
      throw new ForbiddenError(`Caller is not authorized for ${operation}`, { caller: ctx.caller, operation });
    }
  }

  private recordMutation(operation: string, context: Record<string, unknown>): void {
    this.metrics.adminMutation(operation);
    this.logger.info({ operation, ...context }, 'Admin mutation applied');
  }
}
