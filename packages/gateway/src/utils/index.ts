/**
 * Utilities Module
 */

// Type-only exports (interfaces)
export type { Logger, LogContext, LogLevel } from './logger.js';

// Value exports (classes and functions)
export { JsonLogger, createLogger, isLogLevel, LOG_LEVELS } from './logger.js';
