import { z } from 'zod';
import { DeploymentTypes } from '@mcp-catalog/models';
import { ServerConfigSchema } from './ServerConfigSchema.js';
import {
  CapabilitiesSchema,
  CompatibilitySchema,
  RequirementsSchema,
  SecuritySchema,
} from './EntryMetadataSchemas.js';

/**
 * Version strings are free-form. Numbers are accepted and stringified, which
 * loses trailing zeros: `1.0` becomes `"1"`. YAML registry files keep the
 * source text of `version` values when loaded through the registry store;
 * JSON documents and already-decoded objects cannot, so quote such versions
 * there.
 */
export const VersionSchema = z.union([z.string(), z.number()]).transform((value) => String(value));

export const ServerEntrySchema = z.object({
  name: z.string(),
  description: z.string(),
  version: VersionSchema,
  deployment: z.nativeEnum(DeploymentTypes),
  config: ServerConfigSchema,
  license: z.string().nullish(),
  source_url: z.string().nullish(),
  capabilities: CapabilitiesSchema.nullish(),
  requirements: RequirementsSchema.nullish(),
  security: SecuritySchema.nullish(),
  compatibility: CompatibilitySchema.nullish(),
});
