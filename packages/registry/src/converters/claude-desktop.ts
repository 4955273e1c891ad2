import { isRecord, setOwnEntry } from '@mcp-catalog/core';
import {
  DeploymentTypes,
  TransportTypes,
  isHttpTransport,
  type ClaudeDesktopConfig,
  type ClaudeDesktopServer,
  type RawServerEntry,
  type ServerEntry,
} from '@mcp-catalog/models';
import { hasEntries, hasItems } from './utils.js';

export const IMPORTED_DESCRIPTION = 'Imported from Claude Desktop configuration';
export const IMPORTED_VERSION = '1.0.0';

/**
 * Converts an entry to a Claude Desktop `mcpServers` block.
 *
 * Stdio entries carry `command`, `args` and `env`; http/https entries carry
 * `url` and `headers`. Empty or unset fields are left out. Websocket entries
 * produce an empty server block.
 *
 * @example
 * ```typescript
 * toClaudeDesktopFormat(entry, 'weather');
 * // { mcpServers: { weather: { command: 'python', args: ['weather.py'] } } }
 * ```
 * @public
 */
export function toClaudeDesktopFormat(entry: ServerEntry, serverId: string): ClaudeDesktopConfig {
  const { connectionConfig: config } = entry;
  const server: ClaudeDesktopServer = {};

  if (config.transport === TransportTypes.STDIO) {
    if (config.command) server.command = config.command;
    if (hasItems(config.args)) server.args = [...config.args];
    if (hasEntries(config.env)) server.env = { ...config.env };
  } else if (isHttpTransport(config.transport)) {
    if (config.url) server.url = config.url;
    if (hasEntries(config.headers)) server.headers = { ...config.headers };
  }

  return { mcpServers: { [serverId]: server } };
}

/**
 * `my-weather-server` → `My Weather Server`. Every run of letters is
 * capitalised, so `tool2go` becomes `Tool2Go`.
 */
export function titleFromServerId(serverId: string): string {
  return serverId
    .replace(/-/g, ' ')
    .replace(/[A-Za-z]+/g, (word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase());
}

function toRawEntry(serverId: string, source: Record<string, unknown>): RawServerEntry {
  const hasCommand = Object.hasOwn(source, 'command');
  const config: Record<string, unknown> = {};

  if (hasCommand) {
    config.transport = TransportTypes.STDIO;
    config.command = source.command;
    if (Object.hasOwn(source, 'args')) config.args = source.args;
    if (Object.hasOwn(source, 'env')) config.env = source.env;
  } else if (Object.hasOwn(source, 'url')) {
    const { url } = source;
    config.transport =
      typeof url === 'string' && url.startsWith('https') ? TransportTypes.HTTPS : TransportTypes.HTTP;
    config.url = url;
    if (Object.hasOwn(source, 'headers')) config.headers = source.headers;
  }

  return {
    name: titleFromServerId(serverId),
    description: IMPORTED_DESCRIPTION,
    version: IMPORTED_VERSION,
    deployment: hasCommand ? DeploymentTypes.LOCAL : DeploymentTypes.REMOTE,
    config,
  };
}

/**
 * Converts a Claude Desktop configuration into raw registry entries.
 *
 * Never throws. A missing `mcpServers` section gives an empty result; a
 * server with neither `command` nor `url` is returned with a config that has
 * no transport, which {@link validateServerEntry} then rejects.
 *
 * @param config - Decoded `claude_desktop_config.json` content
 * @returns Raw entries keyed by server id, ready for validation and parsing
 * @public
 */
export function fromClaudeDesktopFormat(config: unknown): Record<string, RawServerEntry> {
  const servers: Record<string, RawServerEntry> = {};

  if (!isRecord(config) || !isRecord(config.mcpServers)) {
    return servers;
  }

  for (const [serverId, serverConfig] of Object.entries(config.mcpServers)) {
    const source = isRecord(serverConfig) ? serverConfig : {};
    setOwnEntry(servers, serverId, toRawEntry(serverId, source));
  }

  return servers;
}
