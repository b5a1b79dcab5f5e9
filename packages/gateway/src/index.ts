/**
 * Message Gateway
 *
 * Trust boundary between a cross-chain transport and a local application.
 */

export * from './boundaries/index.js';
export * from './errors/index.js';
export * from './registry/index.js';
export * from './gateway/index.js';
export * from './admin/index.js';
export * from './transport/index.js';
export * from './persistence/index.js';
export * from './observability/index.js';
export * from './utils/index.js';
export * from './http/index.js';
// The service entry (dotenv, pg pool, HTTP server) is the "./app" subpath.
export type { GatewayAppConfig, ReceiveMode } from './app.js';
