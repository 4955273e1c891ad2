import { RegistryError } from '@mcp-catalog/core';
import {
  TransportTypes,
  type DxtCompatibility,
  type DxtManifest,
  type DxtMcpConfig,
  type DxtRuntime,
  type ServerEntry,
} from '@mcp-catalog/models';
import { hasEntries, hasItems } from './utils.js';

const PYTHON_LAUNCHERS: readonly string[] = ['python', 'python3', 'uv', 'uvx'];

/**
 * Runtime a DXT bundle should declare for a launch command. Anything that is
 * not a known Python launcher is treated as Node.
 */
export function detectDxtRuntime(command: string | undefined): DxtRuntime {
  return command !== undefined && PYTHON_LAUNCHERS.includes(command) ? 'python' : 'node';
}

/**
 * Builds a DXT (desktop extension) manifest for a stdio entry.
 *
 * Tools are listed from `capabilities.tools` with a generated description.
 * `compatibility` is emitted when either a Claude Desktop version constraint
 * or a platform list is known.
 *
 * @throws \{RegistryError\} `unsupported_transport` for any transport other than stdio
 * @public
 */
export function toDxtManifest(entry: ServerEntry, serverId: string): DxtManifest {
  const { connectionConfig: config } = entry;

  if (config.transport !== TransportTypes.STDIO) {
    throw RegistryError.unsupportedTransport('DXT manifest', 'stdio', config.transport);
  }

  const mcpConfig: DxtMcpConfig = {};
  if (config.command) mcpConfig.command = config.command;
  if (hasItems(config.args)) mcpConfig.args = [...config.args];
  if (hasEntries(config.env)) mcpConfig.env = { ...config.env };

  const manifest: DxtManifest = {
    dxt_version: '1.0',
    name: serverId,
    display_name: entry.name,
    version: entry.version,
    description: entry.description,
    server: {
      type: detectDxtRuntime(config.command),
      mcp_config: mcpConfig,
    },
  };

  if (entry.license) manifest.license = entry.license;
  if (entry.sourceUrl) manifest.repository = entry.sourceUrl;

  const tools = entry.capabilities?.tools;
  if (hasItems(tools)) {
    manifest.tools = tools.map((tool) => ({ name: tool, description: `Tool: ${tool}` }));
  }

  const compatibility: DxtCompatibility = {};
  const claudeDesktop = entry.compatibility?.claudeDesktop;
  const platforms = entry.requirements?.platforms;
  if (claudeDesktop) compatibility.claude_desktop = claudeDesktop;
  if (hasItems(platforms)) compatibility.platforms = [...platforms];
  if (Object.keys(compatibility).length > 0) {
    manifest.compatibility = compatibility;
  }

  return manifest;
}
