import { isRegistryError } from '@mcp-catalog/core';
import type { ConversionFormat } from '@mcp-catalog/models';
import { loadRegistryOrEmpty, writeDocumentFile } from '../registry-store.js';
import type { ServerRegistry } from '../server-registry.js';
import type { CommandContext, ExitCode } from './types.js';

export const CONVERSION_FORMATS: readonly ConversionFormat[] = ['claude', 'github', 'dxt', 'hosts'];

export interface ConvertOptions {
  output?: string;
}

function convertStructured(
  registry: ServerRegistry,
  serverId: string,
  format: Exclude<ConversionFormat, 'hosts'>,
): unknown {
  switch (format) {
    case 'claude':
      return registry.toClaudeDesktop(serverId);
    case 'github':
      return registry.toGithubMcp(serverId);
    case 'dxt':
      return registry.toDxtManifest(serverId);
  }
}

/**
 * Prints a server converted to a client format, or writes it to `--output`
 * (YAML or JSON by extension). The hosts format is always a single line on
 * stdout.
 */
export async function runConvert(
  ctx: CommandContext,
  serverId: string,
  format: ConversionFormat,
  options: ConvertOptions,
): Promise<ExitCode> {
  const registry = await loadRegistryOrEmpty(ctx.registryPath, { logger: ctx.logger });

  try {
    if (format === 'hosts') {
      ctx.io.out(registry.toHostsFormat(serverId));
      return 0;
    }

    const result = convertStructured(registry, serverId, format);
    if (options.output) {
      await writeDocumentFile(options.output, result);
      ctx.io.out(`Configuration written to ${options.output}`);
    } else {
      ctx.io.out(JSON.stringify(result, null, 2));
    }
    return 0;
  } catch (error) {
    if (!isRegistryError(error)) {
      throw error;
    }
    ctx.logger.error('conversion failed', error, { serverId, format });
    ctx.io.err(`Error: ${error.message}`);
    return 1;
  }
}
