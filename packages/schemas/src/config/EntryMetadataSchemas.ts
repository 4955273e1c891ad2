import { z } from 'zod';

export const CapabilitiesSchema = z.object({
  tools: z.array(z.string()).nullish(),
  resources: z.array(z.string()).nullish(),
  prompts: z.array(z.string()).nullish(),
});

export const RequirementsSchema = z.object({
  platforms: z.array(z.string()).nullish(),
  runtimes: z.record(z.string(), z.string()).nullish(),
  dependencies: z.array(z.string()).nullish(),
  network: z.boolean().nullish(),
});

export const SecuritySchema = z.object({
  requires_auth: z.boolean().nullish(),
  permissions: z.array(z.string()).nullish(),
  sandbox: z.boolean().nullish(),
});

export const CompatibilitySchema = z.object({
  claude_desktop: z.string().nullish(),
  mcpconf: z.string().nullish(),
});
