import { RegistryError } from '@mcp-catalog/core';
import {
  isHttpTransport,
  type GithubMcpConfig,
  type GithubMcpServer,
  type ServerEntry,
} from '@mcp-catalog/models';
import { hasEntries } from './utils.js';

/**
 * Converts an http/https entry to the GitHub MCP `servers` format.
 *
 * An empty `url` is emitted as is, matching what validation accepts.
 *
 * @throws \{RegistryError\} `unsupported_transport` for stdio and websocket entries,
 *   `invalid_entry` when `url` is unset (only possible for entries built in code)
 * @public
 */
export function toGithubMcpFormat(entry: ServerEntry, serverId: string): GithubMcpConfig {
  const { connectionConfig: config } = entry;

  if (!isHttpTransport(config.transport)) {
    throw RegistryError.unsupportedTransport('GitHub MCP format', 'HTTP', config.transport);
  }
  if (config.url === undefined) {
    throw RegistryError.invalidEntry({ 'config.url': 'URL is required for HTTP transport' });
  }

  const server: GithubMcpServer = { type: 'http', url: config.url };
  if (hasEntries(config.headers)) {
    server.headers = { ...config.headers };
  }

  return { servers: { [serverId]: server } };
}
