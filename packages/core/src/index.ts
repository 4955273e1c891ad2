export * from './logger.js';
export * from './settings.js';
export * from './errors/registry-error.js';
export { isRecord } from './utils/is-record.js';
export { setOwnEntry, getOwnEntry } from './utils/own-entries.js';

// Logging with sanitization
export * from './logging/index.js';
