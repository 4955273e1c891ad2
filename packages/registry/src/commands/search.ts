import { loadRegistryOrEmpty } from '../registry-store.js';
import { TABLE_HEADER, TABLE_RULE, formatServerRow } from './format.js';
import type { CommandContext, ExitCode } from './types.js';

export async function runSearch(ctx: CommandContext, query: string): Promise<ExitCode> {
  const registry = await loadRegistryOrEmpty(ctx.registryPath, { logger: ctx.logger });
  const results = registry.searchServers(query);

  if (results.length === 0) {
    ctx.io.out(`No servers found matching '${query}'.`);
    return 0;
  }

  ctx.io.out(`Found ${results.length} servers:`);
  ctx.io.out(TABLE_HEADER);
  ctx.io.out(TABLE_RULE);
  for (const serverId of results) {
    ctx.io.out(formatServerRow(serverId, registry.requireServer(serverId)));
  }
  return 0;
}
