import type { Logger } from 'pino';
import { rootLogger } from './logging/pino-setup.js';

/**
 * Logging abstraction used by the registry and the CLI.
 *
 * Keeps components independent of pino so tests can pass a silent or
 * capturing implementation.
 * @public
 */
export interface ILogger {
  /**
   * Log a debug message.
   * @param message - The log message
   * @param context - Optional context object for structured logging
   */
  debug(message: string, context?: Record<string, unknown>): void;

  /**
   * Log an info message.
   * @param message - The log message
   * @param context - Optional context object for structured logging
   */
  info(message: string, context?: Record<string, unknown>): void;

  /**
   * Log a warning message.
   * @param message - The log message
   * @param context - Optional context object for structured logging
   */
  warn(message: string, context?: Record<string, unknown>): void;

  /**
   * Log an error message.
   * @param message - The log message
   * @param error - Optional error object
   * @param context - Optional context object for structured logging
   */
  error(message: string, error?: unknown, context?: Record<string, unknown>): void;
}

/**
 * {@link ILogger} backed by a pino logger.
 * @public
 */
export class PinoLogger implements ILogger {
  public constructor(private readonly logger: Logger) {}

  public debug(message: string, context?: Record<string, unknown>): void {
    this.logger.debug(context ?? {}, message);
  }

  public info(message: string, context?: Record<string, unknown>): void {
    this.logger.info(context ?? {}, message);
  }

  public warn(message: string, context?: Record<string, unknown>): void {
    this.logger.warn(context ?? {}, message);
  }

  public error(message: string, error?: unknown, context?: Record<string, unknown>): void {
    const baseContext = context ?? {};
    const errorContext =
      error === undefined
        ? {}
        : { err: error instanceof Error ? error : new Error(String(error)) };
    this.logger.error({ ...baseContext, ...errorContext }, message);
  }
}

/**
 * No-op logger implementation for testing or when logging is disabled.
 * @public
 */
export class NoOpLogger implements ILogger {
  public debug(): void {}
  public info(): void {}
  public warn(): void {}
  public error(): void {}
}

/**
 * Creates a logger bound to a scope, e.g. `registry` or `cli`.
 * @param scope - Value recorded as `scope` on every line
 * @param base - Parent pino logger, defaults to the root logger
 * @public
 */
export function createScopedLogger(scope: string, base: Logger = rootLogger): ILogger {
  return new PinoLogger(base.child({ scope }));
}
