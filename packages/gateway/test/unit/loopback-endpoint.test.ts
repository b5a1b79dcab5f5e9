/**
 * Loopback Endpoint Tests
 *
 * Two gateways on two connected loopback "chains". Proves the path a send
 * composes is exactly the path the far side trusts, and that a rejected
 * delivery blocks the inbound path until it is force-resumed.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { Mock } from 'vitest';
import { ZeroAddress, getBytes, hexlify } from 'ethers';
import { chainId, evmAddress } from '../../src/boundaries/index.js';
import { TransportError } from '../../src/errors/index.js';
import { BlockingReceiveHandler, MessageGateway } from '../../src/gateway/index.js';
import type { InboundMessage, SendRequest } from '../../src/gateway/index.js';
import { LoopbackEndpoint } from '../../src/transport/index.js';
import { createSilentLogger } from './fixtures.js';

const ENDPOINT_A = '0x6666666666666666666666666666666666666666';
const ENDPOINT_B = '0x7777777777777777777777777777777777777777';
const APP_A = '0x8888888888888888888888888888888888888888';
const APP_B = '0x9999999999999999999999999999999999999999';

function request(overrides: Partial<SendRequest> = {}): SendRequest {
  return {
    dstChainId: 102,
    dstAddress: APP_B,
    payload: '0x010203',
    refundAddress: APP_A,
    zroPaymentAddress: ZeroAddress,
    adapterParams: '0x',
    nativeFee: 0n,
    ...overrides,
  };
}

describe('LoopbackEndpoint', () => {
  let endpointA: LoopbackEndpoint;
  let endpointB: LoopbackEndpoint;
  let gatewayA: MessageGateway;
  let gatewayB: MessageGateway;
  let applicationB: Mock<(message: InboundMessage) => void>;

  beforeEach(() => {
    endpointA = new LoopbackEndpoint({ chainId: 101, address: ENDPOINT_A, baseFee: 10n, feePerByte: 1n });
    endpointB = new LoopbackEndpoint({ chainId: 102, address: ENDPOINT_B });
    endpointA.connect(endpointB);

    applicationB = vi.fn<(message: InboundMessage) => void>();
    gatewayA = new MessageGateway({
      endpoint: ENDPOINT_A,
      localAddress: APP_A,
      transport: endpointA,
      handler: new BlockingReceiveHandler(vi.fn()),
      logger: createSilentLogger(),
    });
    gatewayB = new MessageGateway({
      endpoint: ENDPOINT_B,
      localAddress: APP_B,
      transport: endpointB,
      handler: new BlockingReceiveHandler(applicationB),
      logger: createSilentLogger(),
    });
    gatewayA.paths.setTrustedRemoteAddress(102, APP_B);
  });

  describe('delivery between trusted peers', () => {
    beforeEach(() => {
      gatewayB.paths.setTrustedRemoteAddress(101, APP_A);
    });

    it('should deliver sender ++ receiver as the source path', async () => {
      const receipt = await gatewayA.send(request({ nativeFee: 13n }));

      expect(receipt.nonce).toBe(1n);
      expect(applicationB).toHaveBeenCalledTimes(1);
      const [message] = applicationB.mock.calls[0];
      expect(message.srcChainId).toBe(101);
      expect(hexlify(message.srcAddress)).toBe(APP_A + APP_B.slice(2));
      expect(message.nonce).toBe(1n);
      expect(hexlify(message.payload)).toBe('0x010203');
    });

    it('should number outbound messages per path', async () => {
      await gatewayA.send(request({ nativeFee: 13n }));
      const second = await gatewayA.send(request({ nativeFee: 13n }));

      expect(second.nonce).toBe(2n);
      expect(applicationB.mock.calls.map(([message]) => message.nonce)).toEqual([1n, 2n]);
    });

    it('should record the dispatched request', async () => {
      await gatewayA.send(request({ nativeFee: 13n }));

      expect(endpointA.dispatched).toHaveLength(1);
      expect(hexlify(endpointA.dispatched[0].destination)).toBe(APP_B + APP_A.slice(2));
      expect(endpointB.deliveries.map((d) => d.status)).toEqual(['delivered']);
    });
  });

  describe('blocked paths', () => {
    const srcPath = getBytes(APP_A + APP_B.slice(2));

    it('should store a rejected delivery and block the path', async () => {
      await gatewayA.send(request({ nativeFee: 13n }));
      await gatewayA.send(request({ nativeFee: 13n }));

      expect(endpointB.deliveries.map((d) => d.status)).toEqual(['stored', 'blocked']);
      expect(endpointB.deliveries[0].error).toBe('Invalid source sending contract for chain 101');
      expect(endpointB.getStoredPayload(101, srcPath)?.nonce).toBe(1n);
      expect(applicationB).not.toHaveBeenCalled();
    });

    it('should resume delivery after forceResumeReceive', async () => {
      await gatewayA.send(request({ nativeFee: 13n }));
      gatewayB.paths.setTrustedRemoteAddress(101, APP_A);

      await endpointB.forceResumeReceive(chainId(101), srcPath);
      await gatewayA.send(request({ nativeFee: 13n }));

      expect(endpointB.getStoredPayload(101, srcPath)).toBeUndefined();
      expect(applicationB).toHaveBeenCalledTimes(1);
      expect(applicationB.mock.calls[0][0].nonce).toBe(2n);
    });

    it('should refuse to resume a path with nothing stored', async () => {
      await expect(endpointB.forceResumeReceive(chainId(101), srcPath)).rejects.toThrow(TransportError);
    });
  });

  describe('fees and routing', () => {
    it('should quote a base fee plus a per-byte fee', async () => {
      const quote = await gatewayA.estimateFees(102, '0x010203', false, '0x');

      expect(quote).toEqual({ nativeFee: 13n, zroFee: 0n });
    });

    it('should refuse an insufficient native fee', async () => {
      await expect(gatewayA.send(request({ nativeFee: 12n }))).rejects.toThrow('Insufficient native fee');
      expect(endpointA.dispatched).toEqual([]);
    });

    it('should refuse chains with no connected endpoint', async () => {
      gatewayA.paths.setTrustedRemoteAddress(103, APP_B);

      await expect(gatewayA.send(request({ dstChainId: 103, nativeFee: 13n }))).rejects.toThrow(
        'No route to chain 103'
      );
    });

    it('should mark deliveries with no attached receiver', async () => {
      const stranger = '0x' + '12'.repeat(20);
      gatewayA.paths.setTrustedRemoteAddress(102, stranger);

      await gatewayA.send(request({ dstAddress: stranger, nativeFee: 13n }));

      expect(endpointB.deliveries.map((d) => d.status)).toEqual(['no_receiver']);
    });
  });

  describe('inbound identity', () => {
    it('should be refused by a gateway that expects another endpoint', async () => {
      const endpointC = new LoopbackEndpoint({ chainId: 103, address: '0x' + '13'.repeat(20) });
      endpointA.connect(endpointC);
      const applicationC = vi.fn<(message: InboundMessage) => void>();
      new MessageGateway({
        endpoint: ENDPOINT_B,
        localAddress: APP_B,
        transport: endpointC,
        handler: new BlockingReceiveHandler(applicationC),
        logger: createSilentLogger(),
      }).paths.setTrustedRemoteAddress(101, APP_A);
      gatewayA.paths.setTrustedRemoteAddress(103, APP_B);

      await gatewayA.send(request({ dstChainId: 103, nativeFee: 13n }));

      expect(endpointC.deliveries.map((d) => d.status)).toEqual(['stored']);
      expect(endpointC.deliveries[0].error).toBe('Caller is not the transport endpoint');
      expect(applicationC).not.toHaveBeenCalled();
    });
  });

  describe('history', () => {
    it('should keep only the most recent records', async () => {
      const small = new LoopbackEndpoint({ chainId: 101, address: ENDPOINT_A, historyLimit: 2 });
      small.connect(endpointB);
      gatewayB.paths.setTrustedRemoteAddress(101, APP_A);
      const sender = new MessageGateway({
        endpoint: ENDPOINT_A,
        localAddress: APP_A,
        transport: small,
        handler: new BlockingReceiveHandler(vi.fn()),
        logger: createSilentLogger(),
      });
      sender.paths.setTrustedRemoteAddress(102, APP_B);

      for (let i = 0; i < 3; i++) {
        await sender.send(request({ payload: hexlify(new Uint8Array([i])) }));
      }

      expect(small.dispatched.map((d) => hexlify(d.payload))).toEqual(['0x01', '0x02']);
      expect(endpointB.deliveries.map((d) => d.nonce)).toEqual([1n, 2n, 3n]);
    });
  });

  describe('configuration', () => {
    it('should store config by version, chain and type', async () => {
      await endpointA.setConfig(1, chainId(102), 2, new Uint8Array([7, 8]));

      expect(await endpointA.getConfig(1, chainId(102), evmAddress(APP_A), 2)).toEqual(new Uint8Array([7, 8]));
      expect(await endpointA.getConfig(1, chainId(102), evmAddress(APP_A), 3)).toEqual(new Uint8Array(0));
    });

    it('should track send and receive versions', async () => {
      await endpointA.setSendVersion(2);
      await endpointA.setReceiveVersion(3);

      expect(endpointA.getSendVersion()).toBe(2);
      expect(endpointA.getReceiveVersion()).toBe(3);
    });
  });
});
