import type { ILogger } from '@mcp-catalog/core';

/**
 * Output sink for command handlers. The CLI binds it to stdout/stderr; tests
 * collect the lines.
 */
export interface CommandIO {
  out(text: string): void;
  err(text: string): void;
}

export interface CommandContext {
  /** Registry file the command reads (and, for `import --save`, writes) */
  registryPath: string;
  io: CommandIO;
  logger: ILogger;
}

/** Process exit code a command finished with */
export type ExitCode = 0 | 1;
