import type { ServerEntry } from '@mcp-catalog/models';

const ID_WIDTH = 20;
const DEPLOYMENT_WIDTH = 8;
const TRANSPORT_WIDTH = 10;

export const TABLE_HEADER = [
  'NAME'.padEnd(ID_WIDTH),
  'DEPLOY'.padEnd(DEPLOYMENT_WIDTH),
  'TRANSPORT'.padEnd(TRANSPORT_WIDTH),
  'DESCRIPTION',
].join(' ');

export const TABLE_RULE = '-'.repeat(70);

export function formatServerRow(serverId: string, entry: ServerEntry): string {
  return [
    serverId.padEnd(ID_WIDTH),
    entry.deployment.padEnd(DEPLOYMENT_WIDTH),
    entry.connectionConfig.transport.padEnd(TRANSPORT_WIDTH),
    entry.description,
  ].join(' ');
}

/**
 * Multi-line description of a server for `show` and `list --detailed`.
 */
export function formatServerDetails(serverId: string, entry: ServerEntry): string {
  const { connectionConfig: config, capabilities, requirements } = entry;
  const lines = [
    `Server: ${serverId}`,
    `Name: ${entry.name}`,
    `Description: ${entry.description}`,
    `Version: ${entry.version}`,
    `Deployment: ${entry.deployment}`,
    `Transport: ${config.transport}`,
  ];

  if (entry.license) lines.push(`License: ${entry.license}`);
  if (entry.sourceUrl) lines.push(`Source: ${entry.sourceUrl}`);

  lines.push('', 'Configuration:');
  if (config.command) lines.push(`  Command: ${config.command}`);
  if (config.args?.length) lines.push(`  Args: ${config.args.join(' ')}`);
  if (config.url) lines.push(`  URL: ${config.url}`);
  if (config.env && Object.keys(config.env).length > 0) {
    lines.push('  Environment:');
    for (const key of Object.keys(config.env)) {
      // values are usually secrets
      lines.push(`    ${key}: ***`);
    }
  }

  if (capabilities) {
    lines.push('', 'Capabilities:');
    if (capabilities.tools?.length) lines.push(`  Tools: ${capabilities.tools.join(', ')}`);
    if (capabilities.resources?.length) {
      lines.push(`  Resources: ${capabilities.resources.join(', ')}`);
    }
    if (capabilities.prompts?.length) lines.push(`  Prompts: ${capabilities.prompts.join(', ')}`);
  }

  if (requirements) {
    lines.push('', 'Requirements:');
    if (requirements.platforms?.length) {
      lines.push(`  Platforms: ${requirements.platforms.join(', ')}`);
    }
    for (const [runtime, constraint] of Object.entries(requirements.runtimes ?? {})) {
      lines.push(`  ${runtime}: ${constraint}`);
    }
  }

  return lines.join('\n');
}

export function formatFieldErrorLines(errors: Readonly<Record<string, string>>): string[] {
  return Object.entries(errors).map(([field, message]) => `  ${field}: ${message}`);
}
