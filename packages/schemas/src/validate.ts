import { isRecord } from '@mcp-catalog/core';
import {
  TransportTypes,
  isDeploymentType,
  isTransportType,
  type ValidationErrors,
} from '@mcp-catalog/models';

/** Top-level keys every raw server entry must carry. */
export const REQUIRED_FIELDS = ['name', 'description', 'version', 'deployment', 'config'] as const;

function describeValue(value: unknown): string {
  return typeof value === 'string' ? value : String(JSON.stringify(value));
}

/**
 * Checks a raw server entry and collects every problem found.
 *
 * Rules run independently: missing required keys, unknown deployment,
 * missing or unknown transport, then the transport-specific key (`command`
 * for stdio, `url` for http/https). Transport checks are skipped when `config`
 * is absent or not a mapping. A value that is not a mapping at all is treated
 * as an entry with no keys.
 *
 * Never throws; an empty result means the entry can be parsed.
 *
 * @param raw - Decoded entry as found under `servers.<id>`
 * @returns Field path mapped to message, e.g. `{ 'config.url': 'URL is required for HTTP transport' }`
 * @public
 */
export function validateServerEntry(raw: unknown): ValidationErrors {
  const errors: ValidationErrors = {};
  const data = isRecord(raw) ? raw : {};

  for (const field of REQUIRED_FIELDS) {
    if (!Object.hasOwn(data, field)) {
      errors[field] = `Required field '${field}' is missing`;
    }
  }

  if (Object.hasOwn(data, 'deployment') && !isDeploymentType(data.deployment)) {
    errors.deployment = `Invalid deployment type: ${describeValue(data.deployment)}`;
  }

  const config = data.config;
  if (isRecord(config)) {
    if (!Object.hasOwn(config, 'transport')) {
      errors['config.transport'] = 'Transport type is required in config';
    } else if (!isTransportType(config.transport)) {
      errors['config.transport'] = `Invalid transport type: ${describeValue(config.transport)}`;
    }

    const transport = config.transport;
    if (transport === TransportTypes.STDIO && !Object.hasOwn(config, 'command')) {
      errors['config.command'] = 'Command is required for stdio transport';
    } else if (
      (transport === TransportTypes.HTTP || transport === TransportTypes.HTTPS) &&
      !Object.hasOwn(config, 'url')
    ) {
      errors['config.url'] = 'URL is required for HTTP transport';
    }
  }

  return errors;
}

export function hasValidationErrors(errors: ValidationErrors): boolean {
  return Object.keys(errors).length > 0;
}
