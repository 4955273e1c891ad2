/**
 * MCP server catalog
 *
 * Lookup, filtering and client-format conversion over a registry of server
 * definitions, plus YAML/JSON persistence.
 * @example
 * ```typescript
 * import { loadRegistryFile } from '@mcp-catalog/registry';
 *
 * const registry = await loadRegistryFile('mcp-registry.yaml');
 * console.log(JSON.stringify(registry.toClaudeDesktop('weather'), null, 2));
 * ```
 * @public
 */

export * from './converters/index.js';
export { ServerRegistry, DEFAULT_REGISTRY_VERSION } from './server-registry.js';
export type { ServerRegistryOptions, ListServersFilter, ImportResult } from './server-registry.js';
export {
  loadRegistryFile,
  loadRegistryOrEmpty,
  saveRegistryFile,
  readDocumentFile,
  writeDocumentFile,
  decodeDocument,
  encodeDocument,
  isYamlPath,
} from './registry-store.js';
export * from './commands/index.js';
