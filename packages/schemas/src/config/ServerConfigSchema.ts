import { z } from 'zod';
import { TransportTypes } from '@mcp-catalog/models';

// Raw `config` block of a server entry, snake_case as persisted
export const ServerConfigSchema = z.object({
  transport: z.nativeEnum(TransportTypes),
  command: z.string().nullish(),
  args: z.array(z.string()).nullish(),
  url: z.string().nullish(),
  headers: z.record(z.string(), z.string()).nullish(),
  env: z.record(z.string(), z.string()).nullish(),
  working_dir: z.string().nullish(),
  timeout: z.number().int().nonnegative().nullish(),
});
