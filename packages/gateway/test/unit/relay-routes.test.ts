/**
 * Inbound Relay HTTP Tests
 *
 * A relayer posts deliveries with its bearer token; the endpoint transport
 * turns the token into the endpoint identity the gateway checks.
 */

import { describe, it, expect, beforeAll, afterAll, beforeEach, vi } from 'vitest';
import type { Mock } from 'vitest';
import express from 'express';
import type { Server } from 'http';
import type { AddressInfo } from 'net';
import { BlockingReceiveHandler, MessageGateway } from '../../src/gateway/index.js';
import type { InboundMessage } from '../../src/gateway/index.js';
import { createRelayRoutes, errorHandler } from '../../src/http/index.js';
import { EthersEndpointTransport } from '../../src/transport/index.js';
import { ENDPOINT, LOCAL_APP, createSilentLogger } from './fixtures.js';

const RELAY_TOKEN = 'test-relay-secret';

describe('Inbound relay API', () => {
  let server: Server;
  let baseUrl: string;
  let application: Mock<(message: InboundMessage) => Promise<void>>;

  function relay(body: unknown, token: string = RELAY_TOKEN): Promise<Response> {
    return fetch(`${baseUrl}/relay`, {
      method: 'POST',
      headers: { 'content-type': 'application/json', authorization: `Bearer ${token}` },
      body: JSON.stringify(body),
    });
  }

  beforeAll(async () => {
    const logger = createSilentLogger();
    application = vi.fn(async (_message: InboundMessage) => {});
    const transport = new EthersEndpointTransport(ENDPOINT, { provider: null }, { relayTokens: [RELAY_TOKEN] });
    const gateway = new MessageGateway({
      endpoint: ENDPOINT,
      localAddress: LOCAL_APP,
      transport,
      handler: new BlockingReceiveHandler(application),
      logger,
    });
    gateway.paths.setTrustedPath(101, '0xaabb');

    const app = express();
    app.use(express.json());
    app.use(createRelayRoutes(transport, logger));
    app.use(errorHandler(logger));

    await new Promise<void>((resolve) => {
      server = app.listen(0, '127.0.0.1', () => resolve());
    });
    const address: AddressInfo | string | null = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('Server did not bind a TCP port');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
  });

  beforeEach(() => {
    application.mockReset();
  });

  it('should deliver a relayed message over the trusted path', async () => {
    const res = await relay({ srcChainId: 101, srcAddress: '0xaabb', nonce: '9', payload: '0x0102' });

    expect(res.status).toBe(204);
    expect(application).toHaveBeenCalledWith({
      srcChainId: 101,
      srcAddress: new Uint8Array([0xaa, 0xbb]),
      nonce: 9n,
      payload: new Uint8Array([1, 2]),
    });
  });

  it('should return 403 for an unknown token before reading the body', async () => {
    const res = await relay({ srcChainId: 'x' }, 'other-token');

    expect(res.status).toBe(403);
    expect(await res.json()).toEqual({ error: 'Unknown relay credential', code: 'FORBIDDEN' });
    expect(application).not.toHaveBeenCalled();
  });

  it('should return 404 for an untrusted source path', async () => {
    const res = await relay({ srcChainId: 101, srcAddress: '0xaabc', nonce: '10', payload: '0x01' });

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({
      error: 'Invalid source sending contract for chain 101',
      code: 'NO_TRUSTED_REMOTE',
    });
    expect(application).not.toHaveBeenCalled();
  });

  it('should return 400 for a malformed delivery', async () => {
    const res = await relay({ srcChainId: 101, srcAddress: '0xaabb', nonce: 11, payload: '0x01' });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'nonce must be a decimal string' });
  });
});
