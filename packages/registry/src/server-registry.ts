import {
  createScopedLogger,
  getOwnEntry,
  RegistryError,
  setOwnEntry,
  type ILogger,
} from '@mcp-catalog/core';
import {
  isDeploymentType,
  type ClaudeDesktopConfig,
  type DxtManifest,
  type GithubMcpConfig,
  type RawRegistryDocument,
  type RegistryDocument,
  type ServerEntry,
  type ValidationErrors,
} from '@mcp-catalog/models';
import {
  hasValidationErrors,
  parseRegistry,
  safeParseServerEntry,
  serializeRegistry,
  serializeServerEntry,
  validateServerEntry,
} from '@mcp-catalog/schemas';
import {
  fromClaudeDesktopFormat,
  toClaudeDesktopFormat,
  toDxtManifest,
  toGithubMcpFormat,
  toHostsLine,
} from './converters/index.js';

export const DEFAULT_REGISTRY_VERSION = '1.0';

export interface ServerRegistryOptions {
  logger?: ILogger;
}

export interface ListServersFilter {
  /** Deployment literal; an unknown value matches nothing */
  deployment?: string;
  /** Category name; an unknown category matches nothing */
  category?: string;
}

export interface ImportResult {
  imported: string[];
  skipped: Record<string, ValidationErrors>;
}

/**
 * In-memory registry of server entries.
 *
 * An explicit value owned by the caller: nothing here touches the file system
 * and there is no shared instance. Mutations are last-write-wins and callers
 * serialize access themselves.
 *
 * @example
 * ```typescript
 * const registry = ServerRegistry.fromDocument(yaml.parse(text));
 * registry.listServers({ deployment: 'local' });
 * registry.toHostsFormat('weather');
 * ```
 * @public
 */
export class ServerRegistry {
  private readonly logger: ILogger;
  private readonly document: RegistryDocument;

  public constructor(document: RegistryDocument, options: ServerRegistryOptions = {}) {
    this.document = document;
    this.logger = options.logger ?? createScopedLogger('registry');
  }

  public static empty(
    version: string = DEFAULT_REGISTRY_VERSION,
    options?: ServerRegistryOptions,
  ): ServerRegistry {
    return new ServerRegistry({ version, servers: {} }, options);
  }

  /**
   * Parses a decoded registry document.
   * @throws \{RegistryError\} see {@link parseRegistry}
   */
  public static fromDocument(raw: unknown, options?: ServerRegistryOptions): ServerRegistry {
    return new ServerRegistry(parseRegistry(raw), options);
  }

  public get version(): string {
    return this.document.version;
  }

  public get size(): number {
    return Object.keys(this.document.servers).length;
  }

  public addServer(serverId: string, entry: ServerEntry): void {
    const replaced = Object.hasOwn(this.document.servers, serverId);
    setOwnEntry(this.document.servers, serverId, entry);
    this.logger.debug(replaced ? 'server replaced' : 'server added', { serverId });
  }

  /**
   * @returns true when the server existed
   */
  public removeServer(serverId: string): boolean {
    if (!Object.hasOwn(this.document.servers, serverId)) {
      return false;
    }
    delete this.document.servers[serverId];
    this.logger.debug('server removed', { serverId });
    return true;
  }

  public getServer(serverId: string): ServerEntry | undefined {
    return getOwnEntry(this.document.servers, serverId);
  }

  /**
   * @throws \{RegistryError\} `not_found` when no server has this id
   */
  public requireServer(serverId: string): ServerEntry {
    const entry = this.getServer(serverId);
    if (!entry) {
      throw RegistryError.notFound(`Server '${serverId}'`);
    }
    return entry;
  }

  /**
   * Server ids in ascending order, optionally filtered.
   */
  public listServers(filter: ListServersFilter = {}): string[] {
    let serverIds = Object.keys(this.document.servers);

    if (filter.deployment !== undefined) {
      const { deployment } = filter;
      if (!isDeploymentType(deployment)) {
        return [];
      }
      serverIds = serverIds.filter((id) => this.document.servers[id].deployment === deployment);
    }

    if (filter.category !== undefined) {
      const members = this.getCategoryMembers(filter.category);
      serverIds = serverIds.filter((id) => members.has(id));
    }

    return serverIds.sort();
  }

  /**
   * Case-insensitive substring search over id, name and description, then
   * tool, resource and prompt names.
   */
  public searchServers(query: string): string[] {
    const needle = query.toLowerCase();
    const matches = (value: string): boolean => value.toLowerCase().includes(needle);

    const results = Object.entries(this.document.servers)
      .filter(([serverId, entry]) => {
        if (matches(serverId) || matches(entry.name) || matches(entry.description)) {
          return true;
        }
        const { tools = [], resources = [], prompts = [] } = entry.capabilities ?? {};
        return [...tools, ...resources, ...prompts].some(matches);
      })
      .map(([serverId]) => serverId);

    return results.sort();
  }

  public getCategories(): Record<string, string[]> {
    const categories: Record<string, string[]> = {};
    for (const [name, members] of Object.entries(this.document.categories ?? {})) {
      setOwnEntry(categories, name, [...members]);
    }
    return categories;
  }

  /**
   * Adds a server id to a category, creating the category on first use. The
   * id is not checked against the registered servers.
   */
  public addToCategory(category: string, serverId: string): void {
    this.document.categories ??= {};
    const members = getOwnEntry(this.document.categories, category);
    if (!members) {
      setOwnEntry(this.document.categories, category, [serverId]);
    } else if (!members.includes(serverId)) {
      members.push(serverId);
    }
  }

  /**
   * Removes a server id from a category and drops the category once empty.
   * @returns true when the id was a member
   */
  public removeFromCategory(category: string, serverId: string): boolean {
    const { categories } = this.document;
    const members = categories && getOwnEntry(categories, category);
    if (!categories || !members) {
      return false;
    }

    const index = members.indexOf(serverId);
    if (index === -1) {
      return false;
    }

    members.splice(index, 1);
    if (members.length === 0) {
      delete categories[category];
    }
    return true;
  }

  public toClaudeDesktop(serverId: string): ClaudeDesktopConfig {
    return toClaudeDesktopFormat(this.requireServer(serverId), serverId);
  }

  public toGithubMcp(serverId: string): GithubMcpConfig {
    return toGithubMcpFormat(this.requireServer(serverId), serverId);
  }

  public toDxtManifest(serverId: string): DxtManifest {
    return toDxtManifest(this.requireServer(serverId), serverId);
  }

  public toHostsFormat(serverId: string): string {
    return toHostsLine(this.requireServer(serverId), serverId);
  }

  /**
   * Imports servers from a Claude Desktop configuration. Entries that fail
   * validation are skipped and reported; the rest replace any server with
   * the same id.
   */
  public importClaudeDesktop(config: unknown): ImportResult {
    const result: ImportResult = { imported: [], skipped: {} };

    for (const [serverId, raw] of Object.entries(fromClaudeDesktopFormat(config))) {
      const parsed = safeParseServerEntry(raw);
      if (!parsed.success) {
        this.logger.warn('skipping imported server', { serverId, errors: parsed.errors });
        setOwnEntry(result.skipped, serverId, parsed.errors);
        continue;
      }
      this.addServer(serverId, parsed.entry);
      result.imported.push(serverId);
    }

    return result;
  }

  /**
   * Re-validates a registered server from its persisted form.
   * @throws \{RegistryError\} `not_found` when no server has this id
   */
  public validateServer(serverId: string): ValidationErrors {
    return validateServerEntry(serializeServerEntry(this.requireServer(serverId)));
  }

  /**
   * Validation errors for every server that has any, keyed by id.
   */
  public validateAll(): Record<string, ValidationErrors> {
    const failures: Record<string, ValidationErrors> = {};
    for (const serverId of this.listServers()) {
      const errors = this.validateServer(serverId);
      if (hasValidationErrors(errors)) {
        setOwnEntry(failures, serverId, errors);
      }
    }
    return failures;
  }

  public toDocument(): RawRegistryDocument {
    return serializeRegistry(this.document);
  }

  private getCategoryMembers(category: string): Set<string> {
    return new Set(getOwnEntry(this.document.categories ?? {}, category) ?? []);
  }
}
