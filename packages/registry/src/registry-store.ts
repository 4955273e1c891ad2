import { existsSync } from 'fs';
import { mkdir, readFile, writeFile } from 'fs/promises';
import { dirname, extname } from 'path';
import { isScalar, parseDocument, stringify as stringifyYaml, visit } from 'yaml';
import { RegistryError } from '@mcp-catalog/core';
import { ServerRegistry, type ServerRegistryOptions } from './server-registry.js';

const INDENT_SIZE = 2;

/**
 * True for paths that are read and written as YAML; everything else is JSON.
 */
export function isYamlPath(path: string): boolean {
  const ext = extname(path).toLowerCase();
  return ext === '.yaml' || ext === '.yml';
}

/**
 * Parses YAML, keeping the source text of numeric `version` values so that
 * `version: 1.0` stays `"1.0"` instead of becoming `1`.
 * @throws \{YAMLParseError\} on the first syntax error
 */
function parseYamlDocument(content: string): unknown {
  const doc = parseDocument(content);
  if (doc.errors.length > 0) {
    throw doc.errors[0];
  }

  visit(doc, {
    Pair(_, pair) {
      const { key, value } = pair;
      if (
        isScalar(key) &&
        key.value === 'version' &&
        isScalar(value) &&
        typeof value.value === 'number' &&
        value.range
      ) {
        value.value = content.slice(value.range[0], value.range[1]);
      }
    },
  });

  const data: unknown = doc.toJS();
  return data;
}

/**
 * Decodes YAML or JSON text by file extension. Blank content decodes to
 * `null`.
 * @throws \{SyntaxError\} when JSON content is malformed, or a YAML parse error
 */
export function decodeDocument(path: string, content: string): unknown {
  if (content.trim() === '') {
    return null;
  }
  if (isYamlPath(path)) {
    return parseYamlDocument(content);
  }
  const data: unknown = JSON.parse(content);
  return data;
}

/**
 * Encodes a document as YAML or JSON by file extension, 2-space indented.
 */
export function encodeDocument(path: string, data: unknown): string {
  if (isYamlPath(path)) {
    return stringifyYaml(data, { indent: INDENT_SIZE });
  }
  return `${JSON.stringify(data, null, INDENT_SIZE)}\n`;
}

/**
 * Reads a document file (YAML or JSON by extension).
 * @throws \{RegistryError\} `not_found` when the file does not exist
 */
export async function readDocumentFile(path: string): Promise<unknown> {
  if (!existsSync(path)) {
    throw RegistryError.notFound(`File '${path}'`);
  }
  const content = await readFile(path, 'utf-8');
  return decodeDocument(path, content);
}

/**
 * Writes a document file, creating parent directories as needed.
 */
export async function writeDocumentFile(path: string, data: unknown): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, encodeDocument(path, data), 'utf-8');
}

/**
 * Loads a registry file. An empty file yields an empty registry.
 *
 * @throws \{RegistryError\} `not_found` for a missing file, or any parse
 *   failure from {@link ServerRegistry.fromDocument}
 * @public
 */
export async function loadRegistryFile(
  path: string,
  options?: ServerRegistryOptions,
): Promise<ServerRegistry> {
  const data = await readDocumentFile(path);
  if (data === null || data === undefined) {
    return ServerRegistry.empty(undefined, options);
  }
  return ServerRegistry.fromDocument(data, options);
}

/**
 * Like {@link loadRegistryFile}, but starts empty when the file does not exist.
 * @public
 */
export async function loadRegistryOrEmpty(
  path: string,
  options?: ServerRegistryOptions,
): Promise<ServerRegistry> {
  if (!existsSync(path)) {
    return ServerRegistry.empty(undefined, options);
  }
  return loadRegistryFile(path, options);
}

/**
 * Persists a registry as YAML or JSON by file extension.
 * @public
 */
export async function saveRegistryFile(path: string, registry: ServerRegistry): Promise<void> {
  await writeDocumentFile(path, registry.toDocument());
}
