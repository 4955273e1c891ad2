import { describe, it, expect } from 'vitest';
import { RegistryError, RegistryErrorCode } from '@mcp-catalog/core';
import { parseRegistry, parseServerEntry, safeParseServerEntry } from '../../parse.js';
import { httpsEntry, stdioEntry } from './fixtures.js';

describe('parseServerEntry', () => {
  it('maps a stdio entry to the canonical model', () => {
    const entry = parseServerEntry(stdioEntry());

    expect(entry.name).toBe('Weather Service');
    expect(entry.deployment).toBe('local');
    expect(entry.connectionConfig).toEqual({
      transport: 'stdio',
      command: 'uv',
      args: ['--directory', '/srv/weather', 'run', 'weather.py'],
      env: { WEATHER_API_KEY: 'test-key' },
      timeout: 30,
    });
    expect(entry.capabilities).toBeUndefined();
    expect(entry.security).toBeUndefined();
  });

  it('reads snake_case keys into camelCase fields', () => {
    const entry = parseServerEntry(
      stdioEntry({
        license: 'MIT',
        source_url: 'https://example.com/weather',
        config: { transport: 'stdio', command: 'node', working_dir: '/srv', timeout: 90 },
        compatibility: { claude_desktop: '>=0.10.0', mcpconf: '>=0.1.0' },
      }),
    );

    expect(entry.license).toBe('MIT');
    expect(entry.sourceUrl).toBe('https://example.com/weather');
    expect(entry.connectionConfig.workingDir).toBe('/srv');
    expect(entry.connectionConfig.timeout).toBe(90);
    expect(entry.compatibility).toEqual({ claudeDesktop: '>=0.10.0', mcpconf: '>=0.1.0' });
  });

  it('builds optional sections only when present', () => {
    const entry = parseServerEntry(
      stdioEntry({
        capabilities: { tools: ['get_weather'] },
        requirements: { platforms: ['darwin', 'linux'], network: false },
        security: { permissions: ['network'] },
      }),
    );

    expect(entry.capabilities).toEqual({ tools: ['get_weather'] });
    expect(entry.requirements).toEqual({ platforms: ['darwin', 'linux'], network: false });
    expect(entry.security).toEqual({
      requiresAuth: false,
      permissions: ['network'],
      sandbox: false,
    });
    expect(entry.compatibility).toBeUndefined();
  });

  it('treats null optional values as absent', () => {
    const entry = parseServerEntry(
      stdioEntry({
        license: null,
        capabilities: null,
        config: { transport: 'stdio', command: 'node', args: null, timeout: null },
      }),
    );

    expect(entry.license).toBeUndefined();
    expect(entry.capabilities).toBeUndefined();
    expect(entry.connectionConfig.args).toBeUndefined();
    expect(entry.connectionConfig.timeout).toBe(30);
  });

  it('accepts numeric versions', () => {
    expect(parseServerEntry(stdioEntry({ version: 2 })).version).toBe('2');
  });

  it('ignores unknown keys', () => {
    const entry = parseServerEntry(httpsEntry({ homepage: 'https://example.com' }));
    expect(entry).not.toHaveProperty('homepage');
  });

  it('throws invalid_entry when required fields are missing', () => {
    const raw = stdioEntry();
    delete raw.name;

    expect(() => parseServerEntry(raw)).toThrow(
      "Invalid server entry: name: Required field 'name' is missing",
    );
  });

  it('throws invalid_entry when an optional field has the wrong shape', () => {
    let caught: unknown;
    try {
      parseServerEntry(stdioEntry({ config: { transport: 'stdio', command: 'node', args: 'x' } }));
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(RegistryError);
    expect(caught).toMatchObject({ code: RegistryErrorCode.INVALID_ENTRY });
    if (caught instanceof RegistryError) {
      expect(Object.keys(caught.details ?? {})).toEqual(['config.args']);
    }
  });
});

describe('safeParseServerEntry', () => {
  it('returns validation errors instead of throwing', () => {
    const result = safeParseServerEntry(httpsEntry({ config: { transport: 'http' } }));

    expect(result).toEqual({
      success: false,
      errors: { 'config.url': 'URL is required for HTTP transport' },
    });
  });

  it('returns the entry on success', () => {
    const result = safeParseServerEntry(httpsEntry());

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.entry.connectionConfig.url).toBe('https://mcp.example.com/sse');
    }
  });
});

describe('parseRegistry', () => {
  it('parses servers and copies categories verbatim', () => {
    const registry = parseRegistry({
      version: '1.0',
      servers: { weather: stdioEntry(), tracker: httpsEntry() },
      categories: { data: ['weather', 'ghost'], work: ['tracker'] },
    });

    expect(registry.version).toBe('1.0');
    expect(Object.keys(registry.servers)).toEqual(['weather', 'tracker']);
    expect(registry.categories).toEqual({ data: ['weather', 'ghost'], work: ['tracker'] });
  });

  it('keeps servers and categories keyed __proto__', () => {
    const raw = JSON.parse(
      `{"version":"1.0","servers":{"__proto__":${JSON.stringify(stdioEntry())}},` +
        '"categories":{"__proto__":["__proto__"]}}',
    );

    const registry = parseRegistry(raw);

    expect(Object.keys(registry.servers)).toEqual(['__proto__']);
    expect(Object.getPrototypeOf(registry.servers)).toBe(Object.prototype);
    expect(Object.keys(registry.categories ?? {})).toEqual(['__proto__']);
  });

  it('leaves categories unset when the document has none', () => {
    const registry = parseRegistry({ version: '1.0', servers: {} });
    expect(registry.categories).toBeUndefined();
  });

  it('fails on a missing version before looking at servers', () => {
    expect(() => parseRegistry({ servers: 'not even a mapping' })).toThrow(
      'Registry version is required',
    );

    expect(() => parseRegistry({})).toThrow(
      expect.objectContaining({ code: RegistryErrorCode.MISSING_FIELD }),
    );
  });

  it('fails on a missing servers section', () => {
    expect(() => parseRegistry({ version: '1.0' })).toThrow('Servers section is required');
  });

  it('treats an empty servers section as no servers', () => {
    expect(parseRegistry({ version: '1.0', servers: null }).servers).toEqual({});
  });

  it('rejects documents and server sections that are not mappings', () => {
    expect(() => parseRegistry(['version'])).toThrow('Registry document must be a mapping');
    expect(() => parseRegistry({ version: '1.0', servers: ['weather'] })).toThrow(
      'Servers section must be a mapping',
    );
  });

  it('names the offending server and joins all its errors', () => {
    expect(() =>
      parseRegistry({
        version: '1.0',
        servers: {
          weather: stdioEntry(),
          broken: { name: 'Broken', deployment: 'cloud', config: { transport: 'https' } },
        },
      }),
    ).toThrow(
      "Validation errors for server 'broken': description: Required field 'description' is missing, " +
        "version: Required field 'version' is missing, deployment: Invalid deployment type: cloud, " +
        'config.url: URL is required for HTTP transport',
    );
  });
});
