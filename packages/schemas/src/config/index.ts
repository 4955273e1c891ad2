import type { z } from 'zod';
import type { ServerConfigSchema } from './ServerConfigSchema.js';
import type { ServerEntrySchema } from './ServerEntrySchema.js';

export { ServerConfigSchema } from './ServerConfigSchema.js';
export { ServerEntrySchema, VersionSchema } from './ServerEntrySchema.js';
export {
  CapabilitiesSchema,
  RequirementsSchema,
  SecuritySchema,
  CompatibilitySchema,
} from './EntryMetadataSchemas.js';

export type ServerConfigZod = z.infer<typeof ServerConfigSchema>;
export type ServerEntryZod = z.infer<typeof ServerEntrySchema>;
