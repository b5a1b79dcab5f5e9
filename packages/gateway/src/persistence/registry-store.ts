/**
 * Registry Persistence
 *
 * Durable copy of the gateway's administrative state:
 * - trusted paths
 * - destination gas floors
 * - payload size overrides
 * - precrime address
 * - failed inbound messages (non-blocking receive)
 *
 * Writes go here first, then to the in-memory registries. On startup the
 * snapshot is loaded and hydrated into the gateway.
 */

import { toHex } from '../boundaries/index.js';
import type { FailedMessageEntry } from '../gateway/types.js';
import type { MinGasEntry, PayloadSizeEntry, TrustedPathEntry } from '../registry/index.js';

export interface RegistrySnapshot {
  trustedPaths: TrustedPathEntry[];
  minDstGas: MinGasEntry[];
  payloadSizeLimits: PayloadSizeEntry[];
  /** null when never set (zero address). */
  precrime: string | null;
  failedMessages: FailedMessageEntry[];
}

export interface RegistryStore {
  load(): Promise<RegistrySnapshot>;
  saveTrustedPath(entry: TrustedPathEntry): Promise<void>;
  saveMinDstGas(entry: MinGasEntry): Promise<void>;
  savePayloadSizeLimit(entry: PayloadSizeEntry): Promise<void>;
  savePrecrime(address: string): Promise<void>;
  saveFailedMessage(entry: FailedMessageEntry): Promise<void>;
  deleteFailedMessage(srcChainId: number, srcAddress: Uint8Array, nonce: bigint): Promise<void>;
}

function failedMessageKey(srcChainId: number, srcAddress: Uint8Array, nonce: bigint): string {
  return `${srcChainId}:${toHex(srcAddress)}:${nonce}`;
}

// =============================================================================
// IN-MEMORY (tests, local development)
// =============================================================================

/**
 * WARNING: Data is lost on restart.
 */
export class InMemoryRegistryStore implements RegistryStore {
  private trustedPaths: Map<number, Uint8Array> = new Map();
  private minDstGas: Map<string, MinGasEntry> = new Map();
  private payloadSizeLimits: Map<number, number> = new Map();
  private precrime: string | null = null;
  private failedMessages: Map<string, FailedMessageEntry> = new Map();

  async load(): Promise<RegistrySnapshot> {
    return {
      trustedPaths: Array.from(this.trustedPaths, ([remoteChainId, path]) => ({
        remoteChainId,
        path: path.slice(),
      })),
      minDstGas: Array.from(this.minDstGas.values(), (entry) => ({ ...entry })),
      payloadSizeLimits: Array.from(this.payloadSizeLimits, ([dstChainId, size]) => ({ dstChainId, size })),
      precrime: this.precrime,
      failedMessages: Array.from(this.failedMessages.values(), (entry) => ({
        ...entry,
        srcAddress: entry.srcAddress.slice(),
      })),
    };
  }

  async saveTrustedPath(entry: TrustedPathEntry): Promise<void> {
    this.trustedPaths.set(entry.remoteChainId, entry.path.slice());
  }

  async saveMinDstGas(entry: MinGasEntry): Promise<void> {
    this.minDstGas.set(`${entry.dstChainId}:${entry.messageType}`, { ...entry });
  }

  async savePayloadSizeLimit(entry: PayloadSizeEntry): Promise<void> {
    this.payloadSizeLimits.set(entry.dstChainId, entry.size);
  }

  async savePrecrime(address: string): Promise<void> {
    this.precrime = address;
  }

  async saveFailedMessage(entry: FailedMessageEntry): Promise<void> {
    this.failedMessages.set(
      failedMessageKey(entry.srcChainId, entry.srcAddress, entry.nonce),
      { ...entry, srcAddress: entry.srcAddress.slice() }
    );
  }

  async deleteFailedMessage(srcChainId: number, srcAddress: Uint8Array, nonce: bigint): Promise<void> {
    this.failedMessages.delete(failedMessageKey(srcChainId, srcAddress, nonce));
  }

  // For testing: clear all
  clear(): void {
    this.trustedPaths.clear();
    this.minDstGas.clear();
    this.payloadSizeLimits.clear();
    this.precrime = null;
    this.failedMessages.clear();
  }
}

// =============================================================================
// POSTGRES
// =============================================================================

/**
 * The subset of pg.Pool / pg.Client the store uses.
 */
export interface SqlClient {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
}

const PRECRIME_KEY = 'precrime';

/**
 * Schema:
 * ```sql
 * CREATE TABLE trusted_remotes (chain_id INTEGER PRIMARY KEY, path BYTEA NOT NULL, ...);
 * CREATE TABLE min_dst_gas (chain_id INTEGER, message_type INTEGER, min_gas NUMERIC(78, 0), ...);
 * CREATE TABLE payload_size_limits (chain_id INTEGER PRIMARY KEY, size INTEGER NOT NULL, ...);
 * CREATE TABLE gateway_settings (key TEXT PRIMARY KEY, value TEXT NOT NULL, ...);
 * CREATE TABLE failed_messages (chain_id INTEGER, src_address BYTEA, nonce NUMERIC(20, 0), payload_hash TEXT, ...);
 * ```
 */
export class PostgresRegistryStore implements RegistryStore {
  constructor(private readonly client: SqlClient) {}

  async ensureSchema(): Promise<void> {
    await this.client.query(`
      CREATE TABLE IF NOT EXISTS trusted_remotes (
        chain_id INTEGER PRIMARY KEY,
        path BYTEA NOT NULL,
        updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )
    `);
    await this.client.query(`
      CREATE TABLE IF NOT EXISTS min_dst_gas (
        chain_id INTEGER NOT NULL,
        message_type INTEGER NOT NULL,
        min_gas NUMERIC(78, 0) NOT NULL,
        updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        PRIMARY KEY (chain_id, message_type)
      )
    `);
    await this.client.query(`
      CREATE TABLE IF NOT EXISTS payload_size_limits (
        chain_id INTEGER PRIMARY KEY,
        size INTEGER NOT NULL,
        updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )
    `);
    await this.client.query(`
      CREATE TABLE IF NOT EXISTS gateway_settings (
        key TEXT PRIMARY KEY,
        value TEXT NOT NULL,
        updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )
    `);
    await this.client.query(`
      CREATE TABLE IF NOT EXISTS failed_messages (
        chain_id INTEGER NOT NULL,
        src_address BYTEA NOT NULL,
        nonce NUMERIC(20, 0) NOT NULL,
        payload_hash TEXT NOT NULL,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        PRIMARY KEY (chain_id, src_address, nonce)
      )
    `);
  }

  async load(): Promise<RegistrySnapshot> {
    const paths = await this.client.query('SELECT chain_id, path FROM trusted_remotes ORDER BY chain_id');
    const gas = await this.client.query(
      'SELECT chain_id, message_type, min_gas::text AS min_gas FROM min_dst_gas ORDER BY chain_id, message_type'
    );
    const limits = await this.client.query('SELECT chain_id, size FROM payload_size_limits ORDER BY chain_id');
    const settings = await this.client.query('SELECT value FROM gateway_settings WHERE key = $1', [PRECRIME_KEY]);
    const failed = await this.client.query(
      'SELECT chain_id, src_address, nonce::text AS nonce, payload_hash FROM failed_messages ORDER BY chain_id, nonce'
    );

    const precrimeRow = settings.rows[0];
    return {
      trustedPaths: paths.rows.map((row) => ({
        remoteChainId: readInteger(row, 'chain_id'),
        path: readBytes(row, 'path'),
      })),
      minDstGas: gas.rows.map((row) => ({
        dstChainId: readInteger(row, 'chain_id'),
        messageType: readInteger(row, 'message_type'),
        minGas: BigInt(readString(row, 'min_gas')),
      })),
      payloadSizeLimits: limits.rows.map((row) => ({
        dstChainId: readInteger(row, 'chain_id'),
        size: readInteger(row, 'size'),
      })),
      precrime: precrimeRow === undefined ? null : readString(precrimeRow, 'value'),
      failedMessages: failed.rows.map((row) => ({
        srcChainId: readInteger(row, 'chain_id'),
        srcAddress: readBytes(row, 'src_address'),
        nonce: BigInt(readString(row, 'nonce')),
        payloadHash: readString(row, 'payload_hash'),
      })),
    };
  }

  async saveTrustedPath(entry: TrustedPathEntry): Promise<void> {
    await this.client.query(
      `INSERT INTO trusted_remotes (chain_id, path, updated_at)
       VALUES ($1, $2, NOW())
       ON CONFLICT (chain_id) DO UPDATE SET
         path = excluded.path,
         updated_at = excluded.updated_at`,
      [entry.remoteChainId, Buffer.from(entry.path)]
    );
  }

  async saveMinDstGas(entry: MinGasEntry): Promise<void> {
    await this.client.query(
      `INSERT INTO min_dst_gas (chain_id, message_type, min_gas, updated_at)
       VALUES ($1, $2, $3, NOW())
       ON CONFLICT (chain_id, message_type) DO UPDATE SET
         min_gas = excluded.min_gas,
         updated_at = excluded.updated_at`,
      [entry.dstChainId, entry.messageType, entry.minGas.toString()]
    );
  }

  async savePayloadSizeLimit(entry: PayloadSizeEntry): Promise<void> {
    await this.client.query(
      `INSERT INTO payload_size_limits (chain_id, size, updated_at)
       VALUES ($1, $2, NOW())
       ON CONFLICT (chain_id) DO UPDATE SET
         size = excluded.size,
         updated_at = excluded.updated_at`,
      [entry.dstChainId, entry.size]
    );
  }

  async savePrecrime(address: string): Promise<void> {
    await this.client.query(
      `INSERT INTO gateway_settings (key, value, updated_at)
       VALUES ($1, $2, NOW())
       ON CONFLICT (key) DO UPDATE SET
         value = excluded.value,
         updated_at = excluded.updated_at`,
      [PRECRIME_KEY, address]
    );
  }

  async saveFailedMessage(entry: FailedMessageEntry): Promise<void> {
    await this.client.query(
      `INSERT INTO failed_messages (chain_id, src_address, nonce, payload_hash)
       VALUES ($1, $2, $3, $4)
       ON CONFLICT (chain_id, src_address, nonce) DO UPDATE SET
         payload_hash = excluded.payload_hash`,
      [entry.srcChainId, Buffer.from(entry.srcAddress), entry.nonce.toString(), entry.payloadHash]
    );
  }

  async deleteFailedMessage(srcChainId: number, srcAddress: Uint8Array, nonce: bigint): Promise<void> {
    await this.client.query(
      'DELETE FROM failed_messages WHERE chain_id = $1 AND src_address = $2 AND nonce = $3',
      [srcChainId, Buffer.from(srcAddress), nonce.toString()]
    );
  }
}

// =============================================================================
// ROW DECODING
// =============================================================================

function readColumn(row: unknown, column: string): unknown {
  if (typeof row !== 'object' || row === null) {
    throw new Error(`Malformed row: expected an object with column ${column}`);
  }
  const value: unknown = Object.getOwnPropertyDescriptor(row, column)?.value;
  return value;
}

function readInteger(row: unknown, column: string): number {
  const value = readColumn(row, column);
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new Error(`Malformed row: ${column} is not an integer`);
  }
  return value;
}

function readString(row: unknown, column: string): string {
  const value = readColumn(row, column);
  if (typeof value !== 'string') {
    throw new Error(`Malformed row: ${column} is not a string`);
  }
  return value;
}

// BYTEA is returned as a Buffer
function readBytes(row: unknown, column: string): Uint8Array {
  const value = readColumn(row, column);
  if (!(value instanceof Uint8Array)) {
    throw new Error(`Malformed row: ${column} is not a byte array`);
  }
  return new Uint8Array(value);
}
