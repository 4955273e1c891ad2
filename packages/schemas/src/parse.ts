import { isRecord, RegistryError, setOwnEntry } from '@mcp-catalog/core';
import {
  DEFAULT_TIMEOUT_SECONDS,
  type RegistryDocument,
  type ServerEntry,
  type ValidationErrors,
} from '@mcp-catalog/models';
import type { ZodError } from 'zod';
import { ServerEntrySchema, VersionSchema, type ServerEntryZod } from './config/index.js';
import { hasValidationErrors, validateServerEntry } from './validate.js';

export type SafeParseEntryResult =
  | { success: true; entry: ServerEntry }
  | { success: false; errors: ValidationErrors };

function zodIssuesToErrors(error: ZodError): ValidationErrors {
  const errors: ValidationErrors = {};
  for (const issue of error.issues) {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    if (!Object.hasOwn(errors, path)) {
      setOwnEntry(errors, path, issue.message);
    }
  }
  return errors;
}

function toServerEntry(data: ServerEntryZod): ServerEntry {
  const { config } = data;

  const entry: ServerEntry = {
    name: data.name,
    description: data.description,
    version: data.version,
    deployment: data.deployment,
    connectionConfig: {
      transport: config.transport,
      command: config.command ?? undefined,
      args: config.args ?? undefined,
      url: config.url ?? undefined,
      headers: config.headers ?? undefined,
      env: config.env ?? undefined,
      workingDir: config.working_dir ?? undefined,
      timeout: config.timeout ?? DEFAULT_TIMEOUT_SECONDS,
    },
    license: data.license ?? undefined,
    sourceUrl: data.source_url ?? undefined,
  };

  if (data.capabilities) {
    entry.capabilities = {
      tools: data.capabilities.tools ?? undefined,
      resources: data.capabilities.resources ?? undefined,
      prompts: data.capabilities.prompts ?? undefined,
    };
  }

  if (data.requirements) {
    entry.requirements = {
      platforms: data.requirements.platforms ?? undefined,
      runtimes: data.requirements.runtimes ?? undefined,
      dependencies: data.requirements.dependencies ?? undefined,
      network: data.requirements.network ?? undefined,
    };
  }

  if (data.security) {
    entry.security = {
      requiresAuth: data.security.requires_auth ?? false,
      permissions: data.security.permissions ?? undefined,
      sandbox: data.security.sandbox ?? false,
    };
  }

  if (data.compatibility) {
    entry.compatibility = {
      claudeDesktop: data.compatibility.claude_desktop ?? undefined,
      mcpconf: data.compatibility.mcpconf ?? undefined,
    };
  }

  return entry;
}

/**
 * Validates and parses a raw server entry without throwing.
 *
 * Runs {@link validateServerEntry} first; when that passes, the optional
 * sections are shape-checked so that e.g. a string where `args` expects a
 * list is reported instead of carried into the model.
 * @public
 */
export function safeParseServerEntry(raw: unknown): SafeParseEntryResult {
  const errors = validateServerEntry(raw);
  if (hasValidationErrors(errors)) {
    return { success: false, errors };
  }

  const result = ServerEntrySchema.safeParse(raw);
  if (!result.success) {
    return { success: false, errors: zodIssuesToErrors(result.error) };
  }

  return { success: true, entry: toServerEntry(result.data) };
}

/**
 * Parses a raw server entry into the canonical model.
 *
 * Optional sections (`capabilities`, `requirements`, `security`,
 * `compatibility`) are built only when present. `timeout` defaults to 30,
 * `security.requires_auth` and `security.sandbox` to false.
 *
 * @throws \{RegistryError\} `invalid_entry` when the entry fails validation
 * @public
 */
export function parseServerEntry(raw: unknown): ServerEntry {
  const result = safeParseServerEntry(raw);
  if (!result.success) {
    throw RegistryError.invalidEntry(result.errors);
  }
  return result.entry;
}

function parseCategories(raw: unknown): Record<string, string[]> | undefined {
  if (!isRecord(raw)) {
    return undefined;
  }

  const categories: Record<string, string[]> = {};
  for (const [name, members] of Object.entries(raw)) {
    if (Array.isArray(members)) {
      setOwnEntry(
        categories,
        name,
        members.filter((member): member is string => typeof member === 'string'),
      );
    }
  }
  return categories;
}

/**
 * Parses a whole registry document. All-or-nothing: the first invalid server
 * aborts the parse.
 *
 * Category members are copied without checking that the servers exist.
 *
 * @param raw - Decoded document with `version`, `servers` and optional `categories`
 * @throws \{RegistryError\} `missing_field` when `version` or `servers` is absent,
 *   `invalid_document` when the document or `servers` is not a mapping,
 *   `aggregate_validation` naming the first invalid server
 * @public
 */
export function parseRegistry(raw: unknown): RegistryDocument {
  if (!isRecord(raw)) {
    throw RegistryError.invalidDocument('Registry document must be a mapping');
  }

  if (!Object.hasOwn(raw, 'version')) {
    throw RegistryError.missingField('Registry version is required');
  }

  if (!Object.hasOwn(raw, 'servers')) {
    throw RegistryError.missingField('Servers section is required');
  }

  const version = VersionSchema.safeParse(raw.version);
  if (!version.success) {
    throw RegistryError.invalidDocument('Registry version must be a string');
  }

  // An empty YAML section decodes as null
  const rawServers = raw.servers ?? {};
  if (!isRecord(rawServers)) {
    throw RegistryError.invalidDocument('Servers section must be a mapping');
  }

  const servers: Record<string, ServerEntry> = {};
  for (const [serverId, serverData] of Object.entries(rawServers)) {
    const result = safeParseServerEntry(serverData);
    if (!result.success) {
      throw RegistryError.aggregateValidation(serverId, result.errors);
    }
    setOwnEntry(servers, serverId, result.entry);
  }

  const document: RegistryDocument = { version: version.data, servers };
  const categories = parseCategories(raw.categories);
  if (categories) {
    document.categories = categories;
  }
  return document;
}

