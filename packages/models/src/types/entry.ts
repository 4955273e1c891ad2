import type { DeploymentType } from '../enums/deployment.js';
import type { TransportType } from '../enums/transport.js';

/** Default connection timeout in seconds when a config does not set one. */
export const DEFAULT_TIMEOUT_SECONDS = 30;

/**
 * How a client launches or connects to a server.
 *
 * The transport decides which fields are meaningful (`command` for stdio,
 * `url` for http/https); the type itself allows all of them together.
 */
export interface ServerConfig {
  transport: TransportType;
  command?: string;
  /** Positional command-line arguments, order-significant */
  args?: string[];
  url?: string;
  headers?: Record<string, string>;
  env?: Record<string, string>;
  workingDir?: string;
  /** Seconds; describes the connector, not a behaviour of the registry */
  timeout: number;
}

export interface Capabilities {
  tools?: string[];
  resources?: string[];
  prompts?: string[];
}

export interface Requirements {
  platforms?: string[];
  /** Runtime name mapped to a version constraint, e.g. `{ python: '>=3.10' }` */
  runtimes?: Record<string, string>;
  dependencies?: string[];
  network?: boolean;
}

export interface Security {
  requiresAuth: boolean;
  permissions?: string[];
  sandbox: boolean;
}

/**
 * Consumer-tool versions an entry is known to work with.
 */
export interface Compatibility {
  claudeDesktop?: string;
  mcpconf?: string;
}

/**
 * One server definition in the registry.
 */
export interface ServerEntry {
  name: string;
  description: string;
  version: string;
  deployment: DeploymentType;
  connectionConfig: ServerConfig;
  license?: string;
  sourceUrl?: string;
  capabilities?: Capabilities;
  requirements?: Requirements;
  security?: Security;
  compatibility?: Compatibility;
}

/**
 * Field path (e.g. `config.transport`) mapped to a human-readable message.
 * Empty when the raw entry is acceptable for parsing.
 */
export type ValidationErrors = Record<string, string>;
