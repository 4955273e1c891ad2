import { setOwnEntry } from '@mcp-catalog/core';
import {
  DEFAULT_TIMEOUT_SECONDS,
  type RawRegistryDocument,
  type RawServerEntry,
  type RegistryDocument,
  type ServerEntry,
} from '@mcp-catalog/models';

function hasItems(value: readonly unknown[] | undefined): value is readonly unknown[] {
  return value !== undefined && value.length > 0;
}

function hasKeys(value: Readonly<Record<string, unknown>> | undefined): boolean {
  return value !== undefined && Object.keys(value).length > 0;
}

/**
 * Converts a canonical entry back to its persisted, snake_case form.
 *
 * Empty lists, empty maps and unset strings are left out, `timeout` only when
 * it differs from the default, security flags only when true. The output
 * passes {@link validateServerEntry} for any entry that came from the parser.
 * @public
 */
export function serializeServerEntry(entry: ServerEntry): RawServerEntry {
  const { connectionConfig: cfg } = entry;

  const config: Record<string, unknown> = { transport: cfg.transport };
  if (cfg.command) config.command = cfg.command;
  if (hasItems(cfg.args)) config.args = [...cfg.args];
  if (cfg.url) config.url = cfg.url;
  if (cfg.headers && hasKeys(cfg.headers)) config.headers = { ...cfg.headers };
  if (cfg.env && hasKeys(cfg.env)) config.env = { ...cfg.env };
  if (cfg.workingDir) config.working_dir = cfg.workingDir;
  if (cfg.timeout !== DEFAULT_TIMEOUT_SECONDS) config.timeout = cfg.timeout;

  const result: RawServerEntry = {
    name: entry.name,
    description: entry.description,
    version: entry.version,
    deployment: entry.deployment,
    config,
  };

  if (entry.license) result.license = entry.license;
  if (entry.sourceUrl) result.source_url = entry.sourceUrl;

  if (entry.capabilities) {
    const caps: Record<string, unknown> = {};
    if (hasItems(entry.capabilities.tools)) caps.tools = [...entry.capabilities.tools];
    if (hasItems(entry.capabilities.resources)) caps.resources = [...entry.capabilities.resources];
    if (hasItems(entry.capabilities.prompts)) caps.prompts = [...entry.capabilities.prompts];
    if (hasKeys(caps)) result.capabilities = caps;
  }

  if (entry.requirements) {
    const { platforms, runtimes, dependencies, network } = entry.requirements;
    const reqs: Record<string, unknown> = {};
    if (hasItems(platforms)) reqs.platforms = [...platforms];
    if (runtimes && hasKeys(runtimes)) reqs.runtimes = { ...runtimes };
    if (hasItems(dependencies)) reqs.dependencies = [...dependencies];
    if (network !== undefined) reqs.network = network;
    if (hasKeys(reqs)) result.requirements = reqs;
  }

  if (entry.security) {
    const sec: Record<string, unknown> = {};
    if (entry.security.requiresAuth) sec.requires_auth = true;
    if (hasItems(entry.security.permissions)) sec.permissions = [...entry.security.permissions];
    if (entry.security.sandbox) sec.sandbox = true;
    if (hasKeys(sec)) result.security = sec;
  }

  if (entry.compatibility) {
    const compat: Record<string, unknown> = {};
    if (entry.compatibility.claudeDesktop) compat.claude_desktop = entry.compatibility.claudeDesktop;
    if (entry.compatibility.mcpconf) compat.mcpconf = entry.compatibility.mcpconf;
    if (hasKeys(compat)) result.compatibility = compat;
  }

  return result;
}

/**
 * Converts a registry document to the shape written to disk.
 * @public
 */
export function serializeRegistry(document: RegistryDocument): RawRegistryDocument {
  const servers: Record<string, RawServerEntry> = {};
  for (const [serverId, entry] of Object.entries(document.servers)) {
    setOwnEntry(servers, serverId, serializeServerEntry(entry));
  }

  const data: RawRegistryDocument = { version: document.version, servers };
  if (document.categories && hasKeys(document.categories)) {
    const categories: Record<string, string[]> = {};
    for (const [name, members] of Object.entries(document.categories)) {
      setOwnEntry(categories, name, [...members]);
    }
    data.categories = categories;
  }
  return data;
}
