/**
 * Shared test doubles: a silent logger, a recording transport, recording
 * metrics and a gateway wired to all three.
 */

import { vi } from 'vitest';
import { getBytes } from 'ethers';
import type { BytesLike } from 'ethers';
import { evmAddress } from '../../src/boundaries/index.js';
import type { ChainId, EvmAddress } from '../../src/boundaries/index.js';
import { MessageGateway } from '../../src/gateway/index.js';
import type { GatewayEvent, ReceiveHandler } from '../../src/gateway/index.js';
import type { GatewayMetrics } from '../../src/observability/index.js';
import type {
  DispatchRequest,
  FeeQuote,
  InboundReceiver,
  SendReceipt,
  Transport,
} from '../../src/transport/index.js';
import type { Logger } from '../../src/utils/index.js';

// Digit-only addresses have a single checksum form.
export const ENDPOINT = '0x1111111111111111111111111111111111111111';
export const LOCAL_APP = '0x2222222222222222222222222222222222222222';
export const REMOTE_APP = '0x3333333333333333333333333333333333333333';
export const OWNER = '0x4444444444444444444444444444444444444444';
export const STRANGER = '0x5555555555555555555555555555555555555555';

export function createSilentLogger(): Logger {
  const logger: Logger = {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    child: () => logger,
  };
  return logger;
}

/**
 * Recording transport. `deliver` plays the endpoint's inbound channel: it
 * hands a delivery to whatever the gateway attached, as `caller`.
 */
export function createMockTransport(address: string = ENDPOINT) {
  let receiver: InboundReceiver | undefined;
  const transport = {
    address: evmAddress(address),
    attach: vi.fn((_application: EvmAddress, attached: InboundReceiver): void => {
      receiver = attached;
    }),
    send: vi.fn(async (_request: DispatchRequest): Promise<SendReceipt> => ({ txHash: '0xabc', nonce: 1n })),
    estimateFees: vi.fn(async (
      _dstChainId: ChainId,
      _userApplication: EvmAddress,
      _payload: Uint8Array,
      _payInZro: boolean,
      _adapterParams: Uint8Array
    ): Promise<FeeQuote> => ({ nativeFee: 100n, zroFee: 0n })),
    getConfig: vi.fn(async (
      _version: number,
      _chainId: ChainId,
      _userApplication: EvmAddress,
      _configType: number
    ): Promise<Uint8Array> => new Uint8Array([1, 2])),
    setConfig: vi.fn(async (
      _version: number,
      _chainId: ChainId,
      _configType: number,
      _config: Uint8Array
    ): Promise<void> => {}),
    setSendVersion: vi.fn(async (_version: number): Promise<void> => {}),
    setReceiveVersion: vi.fn(async (_version: number): Promise<void> => {}),
    forceResumeReceive: vi.fn(async (_srcChainId: ChainId, _srcAddress: Uint8Array): Promise<void> => {}),
  } satisfies Transport;

  return {
    ...transport,
    deliver(
      caller: string,
      srcChainId: number,
      srcAddress: BytesLike,
      nonce: bigint,
      payload: BytesLike
    ): Promise<void> {
      if (!receiver) {
        throw new Error('Nothing attached to the mock transport');
      }
      return receiver({ caller, srcChainId, srcAddress: getBytes(srcAddress), nonce, payload: getBytes(payload) });
    },
  };
}

export function createMockMetrics() {
  return {
    messageAccepted: vi.fn(),
    messageRejected: vi.fn(),
    messageFailed: vi.fn(),
    messageRetried: vi.fn(),
    messageSent: vi.fn(),
    sendRejected: vi.fn(),
    adminMutation: vi.fn(),
    adminDenied: vi.fn(),
  } satisfies GatewayMetrics;
}

export function createTestGateway(handler: ReceiveHandler) {
  const transport = createMockTransport();
  const metrics = createMockMetrics();
  const gateway = new MessageGateway({
    endpoint: ENDPOINT,
    localAddress: LOCAL_APP,
    transport,
    handler,
    logger: createSilentLogger(),
    metrics,
  });
  const events: GatewayEvent[] = [];
  gateway.events.onEvent((event) => {
    events.push(event);
  });
  return { gateway, transport, metrics, events };
}
