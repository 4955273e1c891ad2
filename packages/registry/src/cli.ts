import { Argument, Command, Option } from 'commander';
import { createScopedLogger, resolveCatalogSettings } from '@mcp-catalog/core';
import { DeploymentTypes, type ConversionFormat } from '@mcp-catalog/models';
import {
  CONVERSION_FORMATS,
  runCategories,
  runConvert,
  runImport,
  runList,
  runSearch,
  runShow,
  runValidate,
  type CommandContext,
  type ExitCode,
} from './commands/index.js';

const logger = createScopedLogger('cli');
const settings = resolveCatalogSettings();

process.on('uncaughtException', (error) => {
  console.error('Uncaught Exception:', error);
  logger.error('uncaught exception', error);
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  console.error('Unhandled Rejection:', reason);
  logger.error('unhandled rejection', reason);
  process.exit(1);
});

const program = new Command();

program
  .name('mcp-catalog')
  .description('MCP server registry management')
  .option('-r, --registry <path>', 'Registry file path', settings.registryPath)
  .showHelpAfterError();

function context(): CommandContext {
  const { registry } = program.opts<{ registry: string }>();
  return {
    registryPath: registry,
    logger,
    io: {
      out: (text) => console.log(text),
      err: (text) => console.error(text),
    },
  };
}

/**
 * Runs a command handler and turns its result (or failure) into the exit code.
 */
async function execute(handler: (ctx: CommandContext) => Promise<ExitCode>): Promise<void> {
  const ctx = context();
  try {
    process.exitCode = await handler(ctx);
  } catch (error) {
    logger.error('command failed', error);
    ctx.io.err(`Error: ${error instanceof Error ? error.message : String(error)}`);
    process.exitCode = 1;
  }
}

program
  .command('list')
  .description('List servers')
  .addOption(
    new Option('--deployment <type>', 'Filter by deployment type').choices(
      Object.values(DeploymentTypes),
    ),
  )
  .option('--category <name>', 'Filter by category')
  .option('-d, --detailed', 'Show detailed information')
  .action(async (options: { deployment?: string; category?: string; detailed?: boolean }) => {
    await execute((ctx) => runList(ctx, options));
  });

program
  .command('show <server>')
  .description('Show server details')
  .action(async (server: string) => {
    await execute((ctx) => runShow(ctx, server));
  });

program
  .command('search <query>')
  .description('Search servers by id, name, description or capabilities')
  .action(async (query: string) => {
    await execute((ctx) => runSearch(ctx, query));
  });

program
  .command('convert')
  .description('Convert a server definition to a client configuration format')
  .argument('<server>', 'Server ID to convert')
  .addArgument(new Argument('<format>', 'Target format').choices(CONVERSION_FORMATS))
  .option('-o, --output <file>', 'Output file (default: stdout)')
  .action(async (server: string, format: ConversionFormat, options: { output?: string }) => {
    await execute((ctx) => runConvert(ctx, server, format, options));
  });

program
  .command('validate [server]')
  .description('Validate one server, or all servers when none is given')
  .action(async (server: string | undefined) => {
    await execute((ctx) => runValidate(ctx, server));
  });

program
  .command('categories')
  .description('List categories')
  .action(async () => {
    await execute((ctx) => runCategories(ctx));
  });

program
  .command('import <config>')
  .description('Import servers from a Claude Desktop configuration file')
  .option('--save', 'Save to registry after import')
  .action(async (config: string, options: { save?: boolean }) => {
    await execute((ctx) => runImport(ctx, config, options));
  });

await program.parseAsync(process.argv);
