import { loadRegistryOrEmpty } from '../registry-store.js';
import { formatServerDetails } from './format.js';
import type { CommandContext, ExitCode } from './types.js';

export async function runShow(ctx: CommandContext, serverId: string): Promise<ExitCode> {
  const registry = await loadRegistryOrEmpty(ctx.registryPath, { logger: ctx.logger });
  const entry = registry.getServer(serverId);

  if (!entry) {
    ctx.io.err(`Server '${serverId}' not found.`);
    return 1;
  }

  ctx.io.out(formatServerDetails(serverId, entry));
  return 0;
}
