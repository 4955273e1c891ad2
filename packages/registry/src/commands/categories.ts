import { loadRegistryOrEmpty } from '../registry-store.js';
import type { CommandContext, ExitCode } from './types.js';

export async function runCategories(ctx: CommandContext): Promise<ExitCode> {
  const registry = await loadRegistryOrEmpty(ctx.registryPath, { logger: ctx.logger });
  const categories = Object.entries(registry.getCategories());

  if (categories.length === 0) {
    ctx.io.out('No categories defined.');
    return 0;
  }

  for (const [category, serverIds] of categories) {
    ctx.io.out(`${category}: ${serverIds.join(', ')}`);
  }
  return 0;
}
