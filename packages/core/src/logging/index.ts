/**
 * Logging infrastructure exports
 *
 * Provides structured logging with automatic redaction via pino
 */

export { rootLogger, createRootLogger, REDACT_PATHS } from './pino-setup.js';
export type { RootLoggerOptions } from './pino-setup.js';
