import { existsSync } from 'fs';
import { formatFieldErrors } from '@mcp-catalog/core';
import { loadRegistryOrEmpty, readDocumentFile, saveRegistryFile } from '../registry-store.js';
import type { CommandContext, ExitCode } from './types.js';

export interface ImportOptions {
  save?: boolean;
}

/**
 * Imports servers from a Claude Desktop configuration file into the registry.
 * Nothing is written unless `save` is set.
 */
export async function runImport(
  ctx: CommandContext,
  configPath: string,
  options: ImportOptions,
): Promise<ExitCode> {
  if (!existsSync(configPath)) {
    ctx.io.err(`Configuration file not found: ${configPath}`);
    return 1;
  }

  const config = await readDocumentFile(configPath);
  const registry = await loadRegistryOrEmpty(ctx.registryPath, { logger: ctx.logger });
  const { imported, skipped } = registry.importClaudeDesktop(config);

  for (const [serverId, errors] of Object.entries(skipped)) {
    ctx.io.err(`Skipped '${serverId}': ${formatFieldErrors(errors)}`);
  }

  if (options.save) {
    await saveRegistryFile(ctx.registryPath, registry);
    ctx.io.out(`Imported ${imported.length} servers and saved to registry.`);
  } else {
    ctx.io.out(`Imported ${imported.length} servers (not saved, use --save to persist).`);
  }
  return 0;
}
