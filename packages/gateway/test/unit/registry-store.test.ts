/**
 * Registry Store Tests
 *
 * The Postgres store runs against an in-process SqlClient that records each
 * statement and answers SELECTs from canned rows.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { InMemoryRegistryStore, PostgresRegistryStore } from '../../src/persistence/index.js';
import type { RegistrySnapshot, SqlClient } from '../../src/persistence/index.js';

const EMPTY: RegistrySnapshot = {
  trustedPaths: [],
  minDstGas: [],
  payloadSizeLimits: [],
  precrime: null,
  failedMessages: [],
};

const HASH = '0x' + 'ab'.repeat(32);

class FakeSqlClient implements SqlClient {
  readonly statements: { text: string; values?: unknown[] }[] = [];
  readonly tables: Map<string, unknown[]> = new Map();

  async query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }> {
    this.statements.push({ text, values });
    if (!text.trimStart().startsWith('SELECT')) {
      return { rows: [] };
    }
    for (const [table, rows] of this.tables) {
      if (text.includes(`FROM ${table}`)) {
        return { rows };
      }
    }
    return { rows: [] };
  }
}

describe('InMemoryRegistryStore', () => {
  let store: InMemoryRegistryStore;

  beforeEach(() => {
    store = new InMemoryRegistryStore();
  });

  it('should start empty', async () => {
    expect(await store.load()).toEqual(EMPTY);
  });

  it('should overwrite entries by key', async () => {
    await store.saveTrustedPath({ remoteChainId: 101, path: new Uint8Array([1]) });
    await store.saveTrustedPath({ remoteChainId: 101, path: new Uint8Array([2]) });
    await store.saveMinDstGas({ dstChainId: 200, messageType: 1, minGas: 5n });
    await store.saveMinDstGas({ dstChainId: 200, messageType: 1, minGas: 6n });

    const snapshot = await store.load();
    expect(snapshot.trustedPaths).toEqual([{ remoteChainId: 101, path: new Uint8Array([2]) }]);
    expect(snapshot.minDstGas).toEqual([{ dstChainId: 200, messageType: 1, minGas: 6n }]);
  });

  it('should copy stored bytes', async () => {
    const path = new Uint8Array([1, 2]);
    await store.saveTrustedPath({ remoteChainId: 101, path });
    path[0] = 9;

    expect((await store.load()).trustedPaths[0].path).toEqual(new Uint8Array([1, 2]));
  });

  it('should save and delete failed messages by key', async () => {
    await store.saveFailedMessage({ srcChainId: 101, srcAddress: new Uint8Array([0xaa]), nonce: 1n, payloadHash: HASH });
    await store.saveFailedMessage({ srcChainId: 101, srcAddress: new Uint8Array([0xaa]), nonce: 2n, payloadHash: HASH });
    await store.deleteFailedMessage(101, new Uint8Array([0xaa]), 1n);

    expect((await store.load()).failedMessages).toEqual([
      { srcChainId: 101, srcAddress: new Uint8Array([0xaa]), nonce: 2n, payloadHash: HASH },
    ]);
  });

  it('should clear everything', async () => {
    await store.saveFailedMessage({ srcChainId: 101, srcAddress: new Uint8Array([0xaa]), nonce: 1n, payloadHash: HASH });
    await store.savePayloadSizeLimit({ dstChainId: 101, size: 10 });
    await store.savePrecrime('0x' + '12'.repeat(20));
    store.clear();

    expect(await store.load()).toEqual(EMPTY);
  });
});

describe('PostgresRegistryStore', () => {
  let client: FakeSqlClient;
  let store: PostgresRegistryStore;

  beforeEach(() => {
    client = new FakeSqlClient();
    store = new PostgresRegistryStore(client);
  });

  it('should create every table', async () => {
    await store.ensureSchema();

    const created = client.statements.map((s) => /CREATE TABLE IF NOT EXISTS (\w+)/.exec(s.text)?.[1]);
    expect(created).toEqual([
      'trusted_remotes',
      'min_dst_gas',
      'payload_size_limits',
      'gateway_settings',
      'failed_messages',
    ]);
  });

  it('should upsert with bound values', async () => {
    await store.saveTrustedPath({ remoteChainId: 101, path: new Uint8Array([0xaa, 0xbb]) });
    await store.saveMinDstGas({ dstChainId: 200, messageType: 1, minGas: 2n ** 100n });
    await store.savePayloadSizeLimit({ dstChainId: 101, size: 512 });
    await store.savePrecrime('0x1212121212121212121212121212121212121212');

    expect(client.statements.map((s) => s.values)).toEqual([
      [101, Buffer.from([0xaa, 0xbb])],
      [200, 1, '1267650600228229401496703205376'],
      [101, 512],
      ['precrime', '0x1212121212121212121212121212121212121212'],
    ]);
    expect(client.statements.every((s) => s.text.includes('ON CONFLICT'))).toBe(true);
  });

  it('should write and delete failed messages by their full key', async () => {
    await store.saveFailedMessage({ srcChainId: 101, srcAddress: new Uint8Array([0xaa, 0xbb]), nonce: 7n, payloadHash: HASH });
    await store.deleteFailedMessage(101, new Uint8Array([0xaa, 0xbb]), 7n);

    expect(client.statements.map((s) => s.values)).toEqual([
      [101, Buffer.from([0xaa, 0xbb]), '7', HASH],
      [101, Buffer.from([0xaa, 0xbb]), '7'],
    ]);
    expect(client.statements[0].text).toContain('ON CONFLICT (chain_id, src_address, nonce)');
    expect(client.statements[1].text).toContain('DELETE FROM failed_messages');
  });

  it('should load an empty snapshot', async () => {
    expect(await store.load()).toEqual(EMPTY);
    expect(client.statements[3].values).toEqual(['precrime']);
  });

  it('should decode rows into a snapshot', async () => {
    const precrime = '0x' + 'ab'.repeat(20);
    client.tables.set('trusted_remotes', [{ chain_id: 101, path: Buffer.from([0xaa, 0xbb]) }]);
    client.tables.set('min_dst_gas', [{ chain_id: 200, message_type: 1, min_gas: '200000' }]);
    client.tables.set('payload_size_limits', [{ chain_id: 101, size: 512 }]);
    client.tables.set('gateway_settings', [{ value: precrime }]);
    client.tables.set('failed_messages', [
      { chain_id: 101, src_address: Buffer.from([0xaa, 0xbb]), nonce: '18446744073709551615', payload_hash: HASH },
    ]);

    expect(await store.load()).toEqual({
      trustedPaths: [{ remoteChainId: 101, path: new Uint8Array([0xaa, 0xbb]) }],
      minDstGas: [{ dstChainId: 200, messageType: 1, minGas: 200_000n }],
      payloadSizeLimits: [{ dstChainId: 101, size: 512 }],
      precrime,
      failedMessages: [
        { srcChainId: 101, srcAddress: new Uint8Array([0xaa, 0xbb]), nonce: 2n ** 64n - 1n, payloadHash: HASH },
      ],
    });
  });

  it('should refuse malformed rows', async () => {
    client.tables.set('payload_size_limits', [{ chain_id: '101', size: 512 }]);

    await expect(store.load()).rejects.toThrow('Malformed row: chain_id is not an integer');
  });
});
