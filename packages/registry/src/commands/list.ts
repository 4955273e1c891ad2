import { loadRegistryOrEmpty } from '../registry-store.js';
import { TABLE_HEADER, TABLE_RULE, formatServerDetails, formatServerRow } from './format.js';
import type { CommandContext, ExitCode } from './types.js';

export interface ListOptions {
  deployment?: string;
  category?: string;
  detailed?: boolean;
}

export async function runList(ctx: CommandContext, options: ListOptions): Promise<ExitCode> {
  const registry = await loadRegistryOrEmpty(ctx.registryPath, { logger: ctx.logger });
  const serverIds = registry.listServers({
    deployment: options.deployment,
    category: options.category,
  });

  if (serverIds.length === 0) {
    ctx.io.out('No servers found.');
    return 0;
  }

  if (options.detailed) {
    const blocks = serverIds.map((id) => formatServerDetails(id, registry.requireServer(id)));
    ctx.io.out(blocks.join('\n\n'));
    return 0;
  }

  ctx.io.out(TABLE_HEADER);
  ctx.io.out(TABLE_RULE);
  for (const serverId of serverIds) {
    ctx.io.out(formatServerRow(serverId, registry.requireServer(serverId)));
  }
  return 0;
}
