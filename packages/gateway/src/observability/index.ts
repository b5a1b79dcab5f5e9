/**
 * Observability Module
 */

// Type-only exports
export type { GatewayMetrics } from './metrics.js';

// Value exports
export { NoOpMetrics, ConsoleMetrics } from './metrics.js';
