export { DEFAULT_TIMEOUT_SECONDS } from './entry.js';
export type {
  ServerConfig,
  Capabilities,
  Requirements,
  Security,
  Compatibility,
  ServerEntry,
  ValidationErrors,
} from './entry.js';

export type { RegistryDocument, RawRegistryDocument, RawServerEntry } from './registry.js';

export type {
  ClaudeDesktopServer,
  ClaudeDesktopConfig,
  GithubMcpServer,
  GithubMcpConfig,
  DxtRuntime,
  DxtMcpConfig,
  DxtTool,
  DxtCompatibility,
  DxtManifest,
  ConversionFormat,
} from './formats.js';
