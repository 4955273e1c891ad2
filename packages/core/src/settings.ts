import { z } from 'zod';

export const DEFAULT_REGISTRY_PATH = 'mcp-registry.yaml';

const LogLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

export type CatalogLogLevel = z.infer<typeof LogLevelSchema>;

const CatalogSettingsSchema = z.object({
  registryPath: z.string().trim().min(1).catch(DEFAULT_REGISTRY_PATH),
  logLevel: z
    .preprocess(
      (value) => (typeof value === 'string' ? value.toLowerCase() : value),
      LogLevelSchema,
    )
    .catch('silent'),
});

export type CatalogSettings = z.infer<typeof CatalogSettingsSchema>;

/**
 * Reads catalog settings from the environment.
 *
 * - `MCP_CATALOG_REGISTRY` - registry file path (default `mcp-registry.yaml`)
 * - `MCP_CATALOG_LOG_LEVEL` - pino level (default `silent`)
 *
 * Unset, blank or unknown values fall back to the defaults.
 * @param env - Environment to read, defaults to `process.env`
 * @public
 */
export function resolveCatalogSettings(
  env: NodeJS.ProcessEnv = process.env,
): CatalogSettings {
  return CatalogSettingsSchema.parse({
    registryPath: env.MCP_CATALOG_REGISTRY,
    logLevel: env.MCP_CATALOG_LOG_LEVEL,
  });
}
