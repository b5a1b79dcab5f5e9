/**
 * Structured Logger
 *
 * Minimal JSON logger with chain/message context.
 * bigint and byte values are rendered as decimal and hex strings.
 */

import { hexlify } from 'ethers';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface LogContext {
  chainId?: number;
  [key: string]: unknown;
}

export interface Logger {
  info(context: LogContext, message: string): void;
  warn(context: LogContext, message: string): void;
  error(context: LogContext, message: string): void;
  debug(context: LogContext, message: string): void;
  child(context: LogContext): Logger;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

// =============================================================================
// JSON LOGGER IMPLEMENTATION
// =============================================================================

export class JsonLogger implements Logger {
  private context: LogContext;
  private level: LogLevel;

  constructor(context: LogContext = {}, level: LogLevel = 'info') {
    this.context = context;
    this.level = level;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.level);
  }

  private log(level: LogLevel, context: LogContext, message: string): void {
    if (!this.shouldLog(level)) return;

    const entry: Record<string, unknown> = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...this.context,
      ...context,
    };

    const cleaned: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(entry)) {
      if (value === undefined) continue;
      cleaned[key] = value instanceof Error
        ? { name: value.name, message: value.message, stack: value.stack }
        : value;
    }

    console.log(JSON.stringify(cleaned, replacer));
  }

  info(context: LogContext, message: string): void {
    this.log('info', context, message);
  }

  warn(context: LogContext, message: string): void {
    this.log('warn', context, message);
  }

  error(context: LogContext, message: string): void {
    this.log('error', context, message);
  }

  debug(context: LogContext, message: string): void {
    this.log('debug', context, message);
  }

  child(context: LogContext): Logger {
    return new JsonLogger({ ...this.context, ...context }, this.level);
  }
}

function replacer(_key: string, value: unknown): unknown {
  if (typeof value === 'bigint') return value.toString();
  if (value instanceof Uint8Array) return hexlify(value);
  return value;
}

// =============================================================================
// FACTORY
// =============================================================================

export function createLogger(
  options?: {
    level?: LogLevel;
    service?: string;
  }
): Logger {
  return new JsonLogger(
    { service: options?.service ?? 'message-gateway' },
    options?.level ?? 'info'
  );
}
