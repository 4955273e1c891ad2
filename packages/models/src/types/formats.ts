/**
 * External configuration dialects the registry converts to and from.
 * Keys keep each dialect's own wire spelling.
 */

/** Single server block inside a Claude Desktop `mcpServers` map */
export interface ClaudeDesktopServer {
  command?: string;
  args?: string[];
  env?: Record<string, string>;
  url?: string;
  headers?: Record<string, string>;
}

export interface ClaudeDesktopConfig {
  mcpServers: Record<string, ClaudeDesktopServer>;
}

export interface GithubMcpServer {
  type: 'http';
  url: string;
  headers?: Record<string, string>;
}

export interface GithubMcpConfig {
  servers: Record<string, GithubMcpServer>;
}

/** Runtime a DXT bundle declares for its server process */
export type DxtRuntime = 'python' | 'node';

export interface DxtMcpConfig {
  command?: string;
  args?: string[];
  env?: Record<string, string>;
}

export interface DxtTool {
  name: string;
  description: string;
}

export interface DxtCompatibility {
  claude_desktop?: string;
  platforms?: string[];
}

export interface DxtManifest {
  dxt_version: '1.0';
  name: string;
  display_name: string;
  version: string;
  description: string;
  server: {
    type: DxtRuntime;
    mcp_config: DxtMcpConfig;
  };
  license?: string;
  repository?: string;
  tools?: DxtTool[];
  compatibility?: DxtCompatibility;
}

/** Identifiers of the outbound formats, as accepted on the command line */
export type ConversionFormat = 'claude' | 'github' | 'dxt' | 'hosts';
