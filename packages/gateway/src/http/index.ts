/**
 * HTTP Module
 */

export type { AdminCredentials, RelayChannel } from './routes.js';
export { createAdminRoutes, createRelayRoutes, errorHandler } from './routes.js';
