import { loadRegistryOrEmpty } from '../registry-store.js';
import { formatFieldErrorLines } from './format.js';
import type { CommandContext, ExitCode } from './types.js';

export async function runValidate(ctx: CommandContext, serverId?: string): Promise<ExitCode> {
  const registry = await loadRegistryOrEmpty(ctx.registryPath, { logger: ctx.logger });

  if (serverId !== undefined) {
    if (!registry.getServer(serverId)) {
      ctx.io.err(`Server '${serverId}' not found.`);
      return 1;
    }

    const errors = registry.validateServer(serverId);
    const lines = formatFieldErrorLines(errors);
    if (lines.length > 0) {
      ctx.io.out(`Validation errors for '${serverId}':`);
      lines.forEach((line) => ctx.io.out(line));
      return 1;
    }
    ctx.io.out(`Server '${serverId}' is valid.`);
    return 0;
  }

  const failures = Object.entries(registry.validateAll());
  if (failures.length === 0) {
    ctx.io.out('All servers are valid.');
    return 0;
  }

  for (const [id, errors] of failures) {
    ctx.io.out(`Validation errors for '${id}':`);
    formatFieldErrorLines(errors).forEach((line) => ctx.io.out(line));
  }
  return 1;
}
