export {
  toClaudeDesktopFormat,
  fromClaudeDesktopFormat,
  titleFromServerId,
  IMPORTED_DESCRIPTION,
  IMPORTED_VERSION,
} from './claude-desktop.js';
export { toGithubMcpFormat } from './github-mcp.js';
export { toDxtManifest, detectDxtRuntime } from './dxt-manifest.js';
export { toHostsLine } from './hosts.js';
