import type { ServerEntry } from './entry.js';

/**
 * In-memory registry document.
 *
 * Category members are not required to exist in `servers`; lookups through a
 * category simply skip unknown ids.
 */
export interface RegistryDocument {
  version: string;
  servers: Record<string, ServerEntry>;
  categories?: Record<string, string[]>;
}

/**
 * Raw, decoded registry document as read from YAML or JSON. Keys use the
 * persisted snake_case spelling.
 */
export type RawRegistryDocument = Record<string, unknown>;

/**
 * Raw server entry as found under `servers.<id>` in a registry document.
 */
export type RawServerEntry = Record<string, unknown>;
