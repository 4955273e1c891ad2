import { TransportTypes, type ServerConfig, type ServerEntry } from '@mcp-catalog/models';
import { hasEntries, hasItems } from './utils.js';

function endpointOf(config: ServerConfig): string {
  if (config.transport === TransportTypes.STDIO && config.command) {
    return hasItems(config.args) ? `${config.command}:${config.args.join(':')}` : config.command;
  }
  return config.url || 'unknown';
}

function authOption(config: ServerConfig): string | undefined {
  const authorization = config.headers?.Authorization;
  if (authorization !== undefined) {
    return authorization.startsWith('Bearer') ? 'auth=bearer' : 'auth=key';
  }
  if (
    config.env &&
    Object.keys(config.env).some((key) => key.endsWith('KEY') || key.endsWith('TOKEN'))
  ) {
    return 'auth=key';
  }
  return undefined;
}

/**
 * Renders an entry as one hosts-file style line:
 * `<id> <deployment> <transport> <endpoint> [<options>]`.
 *
 * Options are `auth=bearer|key`, `env=<names>` and `sandbox=true`, in that
 * order. Env names keep the insertion order of the `env` map.
 *
 * @example
 * ```typescript
 * toHostsLine(entry, 'test-server');
 * // 'test-server local stdio python:server.py auth=key env=API_KEY'
 * ```
 * @public
 */
export function toHostsLine(entry: ServerEntry, serverId: string): string {
  const { connectionConfig: config } = entry;
  const parts = [serverId, entry.deployment, config.transport, endpointOf(config)];

  const options: string[] = [];
  const auth = authOption(config);
  if (auth) options.push(auth);
  if (hasEntries(config.env)) options.push(`env=${Object.keys(config.env).join(',')}`);
  if (entry.security?.sandbox) options.push('sandbox=true');

  if (options.length > 0) {
    parts.push(options.join(' '));
  }

  return parts.join(' ');
}
