export * from './config/index.js';
export { REQUIRED_FIELDS, validateServerEntry, hasValidationErrors } from './validate.js';
export { parseServerEntry, safeParseServerEntry, parseRegistry } from './parse.js';
export type { SafeParseEntryResult } from './parse.js';
export { serializeServerEntry, serializeRegistry } from './serialize.js';
