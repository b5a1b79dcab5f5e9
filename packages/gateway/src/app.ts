/**
 * Gateway Application
 *
 * Bootstrap + lifecycle management.
 *
 * Lifecycle:
 * - On startup: load persisted registries, hydrate the gateway, serve the
 *   admin API and the inbound relay
 * - On shutdown: stop accepting requests, close database connections
 */

// Load environment variables from .env file
import 'dotenv/config';

import express, { Express } from 'express';
import { Pool } from 'pg';

import { AdminSurface, OwnerAccessControl } from './admin/index.js';
import {
  BlockingReceiveHandler,
  GatewayEventBus,
  MessageGateway,
  NonblockingReceiveHandler,
} from './gateway/index.js';
import type { ApplicationReceiver, ReceiveHandler } from './gateway/index.js';
import { createAdminRoutes, createRelayRoutes, errorHandler } from './http/index.js';
import { ConsoleMetrics, GatewayMetrics } from './observability/index.js';
import { PostgresRegistryStore } from './persistence/index.js';
import { createEndpointTransport } from './transport/index.js';
import { LogLevel, Logger, createLogger, isLogLevel } from './utils/index.js';

// =============================================================================
// CONFIGURATION
// =============================================================================

export type ReceiveMode = 'blocking' | 'nonblocking';

export interface GatewayAppConfig {
  // Server
  port: number;
  host: string;

  // Database
  databaseUrl: string;

  // Chain
  rpcUrl: string;
  endpointAddress: string;
  localAppAddress: string;
  signerPrivateKey: string;
  confirmationBlocks: number;

  // Administration
  adminAddress: string;
  adminToken: string;

  // Inbound relay credential
  relayToken: string;

  receiveMode: ReceiveMode;

  // Logging
  logLevel: LogLevel;
}

function requireEnv(env: NodeJS.ProcessEnv, name: string): string {
  const value = env[name];
  if (!value) {
    throw new Error(`Missing required environment variable ${name}`);
  }
  return value;
}

function parseIntegerEnv(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(`${name} must be a non-negative integer, got ${JSON.stringify(raw)}`);
  }
  return value;
}

export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): GatewayAppConfig {
  const logLevel = env.LOG_LEVEL ?? 'info';
  if (!isLogLevel(logLevel)) {
    throw new Error(`LOG_LEVEL must be one of debug, info, warn, error, got ${JSON.stringify(logLevel)}`);
  }
  const receiveMode = env.RECEIVE_MODE ?? 'blocking';
  if (receiveMode !== 'blocking' && receiveMode !== 'nonblocking') {
    throw new Error(`RECEIVE_MODE must be blocking or nonblocking, got ${JSON.stringify(receiveMode)}`);
  }

  return {
    port: parseIntegerEnv(env, 'PORT', 3000),
    host: env.HOST ?? '0.0.0.0',
    databaseUrl: env.DATABASE_URL ?? 'postgresql://localhost:5432/gateway',
    rpcUrl: env.RPC_URL ?? 'http://localhost:8545',
    endpointAddress: requireEnv(env, 'ENDPOINT_ADDRESS'),
    localAppAddress: requireEnv(env, 'LOCAL_APP_ADDRESS'),
    signerPrivateKey: requireEnv(env, 'SIGNER_PRIVATE_KEY'),
    confirmationBlocks: parseIntegerEnv(env, 'CONFIRMATION_BLOCKS', 2),
    adminAddress: requireEnv(env, 'ADMIN_ADDRESS'),
    adminToken: requireEnv(env, 'ADMIN_TOKEN'),
    relayToken: requireEnv(env, 'RELAY_TOKEN'),
    receiveMode,
    logLevel,
  };
}

// =============================================================================
// GATEWAY APPLICATION
// =============================================================================

export class GatewayApp {
  private config: GatewayAppConfig;
  private logger: Logger;
  private metrics: GatewayMetrics;
  private app: Express;
  private pool: Pool;
  private gateway?: MessageGateway;
  private server?: ReturnType<Express['listen']>;
  private shutdownPromise?: Promise<void>;

  /**
   * @param application - invoked with every authenticated inbound message
   */
  constructor(config: GatewayAppConfig, private readonly application: ApplicationReceiver) {
    this.config = config;
    this.logger = createLogger({ level: config.logLevel, service: 'message-gateway' });
    this.metrics = new ConsoleMetrics();
    this.app = express();
    this.pool = new Pool({ connectionString: config.databaseUrl });
  }

  /**
   * Start the gateway.
   *
   * 1. Initialize persistence and load registries
   * 2. Build the transport, receive handler and gateway
   * 3. Start HTTP server (admin API + inbound relay)
   */
  async start(): Promise<void> {
    this.logger.info({}, 'Starting gateway...');

    // Initialize persistence
    const store = new PostgresRegistryStore(this.pool);
    await store.ensureSchema();
    const snapshot = await store.load();
    this.logger.info({}, 'Database connection established');

    // Initialize transport
    const transport = createEndpointTransport(
      this.config.rpcUrl,
      this.config.endpointAddress,
      this.config.signerPrivateKey,
      { confirmationBlocks: this.config.confirmationBlocks, relayTokens: [this.config.relayToken] }
    );
    this.logger.info(
      { rpcUrl: this.config.rpcUrl, endpoint: transport.address },
      'Endpoint transport initialized'
    );

    // Initialize gateway (attaches itself to the transport's inbound channel)
    const events = new GatewayEventBus(this.logger);
    const nonblocking = this.config.receiveMode === 'nonblocking'
      ? new NonblockingReceiveHandler(this.application, events, {
        logger: this.logger,
        metrics: this.metrics,
        store,
      })
      : undefined;
    const handler: ReceiveHandler = nonblocking ?? new BlockingReceiveHandler(this.application);

    const gateway = new MessageGateway({
      endpoint: transport.address,
      localAddress: this.config.localAppAddress,
      transport,
      handler,
      events,
      logger: this.logger,
      metrics: this.metrics,
    });
    gateway.hydrate(snapshot);
    this.gateway = gateway;

    const admin = new AdminSurface(
      gateway,
      transport,
      new OwnerAccessControl(this.config.adminAddress),
      store,
      { logger: this.logger, metrics: this.metrics }
    );

    // Subscribe to gateway events for logging
    events.onEvent((event) => {
      switch (event.type) {
        case 'MESSAGE_REJECTED':
          this.logger.warn({ chainId: event.srcChainId, nonce: event.nonce, reason: event.reason }, 'Message rejected');
          break;
        case 'MESSAGE_FAILED':
          this.logger.warn({ chainId: event.srcChainId, nonce: event.nonce, reason: event.reason }, 'Message failed');
          break;
        case 'MESSAGE_ACCEPTED':
        case 'MESSAGE_SENT':
        case 'RETRY_MESSAGE_SUCCESS':
          this.logger.debug({ event: event.type }, 'Message event');
          break;
        default:
          this.logger.info({ event }, 'Configuration changed');
      }
    });

    // Setup HTTP server
    this.app.use(express.json({ limit: '1mb' }));
    this.app.use(createAdminRoutes(
      admin,
      new Map([[this.config.adminToken, this.config.adminAddress]]),
      this.logger,
      { retryHandler: nonblocking }
    ));
    this.app.use(createRelayRoutes(transport, this.logger));
    this.app.use(errorHandler(this.logger));

    // Start listening
    await new Promise<void>((resolve) => {
      this.server = this.app.listen(this.config.port, this.config.host, () => {
        this.logger.info(
          { port: this.config.port, host: this.config.host },
          'Gateway HTTP server started'
        );
        resolve();
      });
    });

    // Setup shutdown handlers
    this.setupShutdownHandlers();

    this.logger.info({ receiveMode: this.config.receiveMode }, 'Gateway started successfully');
  }

  /**
   * The running gateway, for the process that originates sends.
   */
  getGateway(): MessageGateway {
    if (!this.gateway) {
      throw new Error('Gateway not started');
    }
    return this.gateway;
  }

  /**
   * Stop the gateway gracefully.
   */
  async stop(): Promise<void> {
    if (this.shutdownPromise) {
      return this.shutdownPromise;
    }

    this.shutdownPromise = this.doStop();
    return this.shutdownPromise;
  }

  private async doStop(): Promise<void> {
    this.logger.info({}, 'Stopping gateway...');

    // Stop HTTP server
    const server = this.server;
    if (server) {
      await new Promise<void>((resolve, reject) => {
        server.close((err) => {
          if (err) reject(err);
          else resolve();
        });
      });
      this.logger.info({}, 'HTTP server stopped');
    }

    // Close database pool
    await this.pool.end();
    this.logger.info({}, 'Database connections closed');

    this.logger.info({}, 'Gateway stopped');
  }

  private setupShutdownHandlers(): void {
    const shutdown = async (signal: string) => {
      this.logger.info({ signal }, 'Received shutdown signal');
      await this.stop();
      process.exit(0);
    };

    process.on('SIGINT', () => void shutdown('SIGINT'));
    process.on('SIGTERM', () => void shutdown('SIGTERM'));
  }
}

// =============================================================================
// ENTRY POINT
// =============================================================================

export async function main(): Promise<void> {
  const config = loadConfigFromEnv();
  const logger = createLogger({ level: config.logLevel, service: 'message-gateway' });
  const app = new GatewayApp(config, (message) => {
    logger.info(
      { chainId: message.srcChainId, nonce: message.nonce, payloadSize: message.payload.length },
      'Message delivered'
    );
  });
  await app.start();
}

// Run if this is the main module
if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch((err) => {
    console.error('Fatal error:', err);
    process.exit(1);
  });
}
