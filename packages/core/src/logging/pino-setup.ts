/**
 * Pino logger setup with automatic redaction of sensitive data
 *
 * Server definitions carry secrets in `env` values and `headers`, so both are
 * censored wherever they appear in a log payload.
 */

import pino, { type DestinationStream, type Logger } from 'pino';
import { resolveCatalogSettings } from '../settings.js';

export const REDACT_PATHS = [
  // Server definition secrets
  'env.*',
  '*.env',
  'headers.*',
  '*.headers',
  'Authorization',
  '*.Authorization',

  // Generic sensitive patterns
  'password',
  '*.password',
  'token',
  '*.token',
  'api_key',
  '*.api_key',
  'authorization',
  '*.authorization',
  '*.secret',
  '*.SECRET',
];

export interface RootLoggerOptions {
  level?: string;
  destination?: DestinationStream;
}

/**
 * Creates a pino logger with the catalog's redaction rules.
 *
 * @example
 * ```typescript
 * const lines: string[] = [];
 * const logger = createRootLogger({ level: 'info', destination: { write: (l) => lines.push(l) } });
 * logger.info({ env: { API_KEY: 'test-secret' } }, 'loaded');
 * // lines[0] contains "API_KEY":"[REDACTED]"
 * ```
 * @public
 */
export function createRootLogger(options: RootLoggerOptions = {}): Logger {
  const config = {
    level: options.level ?? resolveCatalogSettings().logLevel,
    redact: {
      paths: REDACT_PATHS,
      censor: '[REDACTED]',
      remove: false, // Keep the keys, just redact values
    },
    serializers: {
      ...pino.stdSerializers,
      err: pino.stdSerializers.err,
    },
  };
  return options.destination ? pino(config, options.destination) : pino(config);
}

/**
 * Root logger instance. Level comes from `MCP_CATALOG_LOG_LEVEL` and is
 * `silent` unless set.
 * @public
 */
const rootLogger = createRootLogger();

export { rootLogger };
