import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  runCategories,
  runConvert,
  runImport,
  runList,
  runSearch,
  runShow,
  runValidate,
} from '../../commands/index.js';
import { TABLE_HEADER, TABLE_RULE } from '../../commands/format.js';
import { IMPORTED_DESCRIPTION } from '../../converters/index.js';
import { loadRegistryFile, readDocumentFile, writeDocumentFile } from '../../registry-store.js';
import { makeContext, sampleDocument } from '../test-utils.js';

const FILES_ROW = 'files                hybrid   stdio      Browse project files';
const TRACKER_ROW = 'tracker              remote   https      Hosted issue tracker';
const WEATHER_ROW = 'weather              local    stdio      Local weather data provider';

describe('commands', () => {
  let dir: string;
  let registryPath: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'mcp-catalog-cli-'));
    registryPath = join(dir, 'mcp-registry.yaml');
    await writeDocumentFile(registryPath, sampleDocument());
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe('list', () => {
    it('prints a table of every server', async () => {
      const { ctx, captured } = makeContext(registryPath);

      expect(await runList(ctx, {})).toBe(0);
      expect(TABLE_HEADER).toBe('NAME                 DEPLOY   TRANSPORT  DESCRIPTION');
      expect(captured.out).toEqual([TABLE_HEADER, TABLE_RULE, FILES_ROW, TRACKER_ROW, WEATHER_ROW]);
    });

    it('applies deployment and category filters', async () => {
      const { ctx, captured } = makeContext(registryPath);

      await runList(ctx, { category: 'productivity', deployment: 'remote' });
      expect(captured.out).toEqual([TABLE_HEADER, TABLE_RULE, TRACKER_ROW]);
    });

    it('reports an empty result', async () => {
      const { ctx, captured } = makeContext(registryPath);

      expect(await runList(ctx, { deployment: 'hybrid', category: 'data' })).toBe(0);
      expect(captured.out).toEqual(['No servers found.']);
    });

    it('prints details with env values masked', async () => {
      const { ctx, captured } = makeContext(registryPath);

      await runList(ctx, { category: 'data', detailed: true });
      expect(captured.out).toEqual([
        [
          'Server: weather',
          'Name: Weather Service',
          'Description: Local weather data provider',
          'Version: 1.2.3',
          'Deployment: local',
          'Transport: stdio',
          '',
          'Configuration:',
          '  Command: uv',
          '  Args: run weather.py',
          '  Environment:',
          '    WEATHER_API_KEY: ***',
          '',
          'Capabilities:',
          '  Tools: get_weather, get_forecast',
          '  Resources: weather://current',
        ].join('\n'),
      ]);
    });
  });

  describe('show', () => {
    it('prints one server', async () => {
      const { ctx, captured } = makeContext(registryPath);

      expect(await runShow(ctx, 'tracker')).toBe(0);
      expect(captured.out).toEqual([
        [
          'Server: tracker',
          'Name: Issue Tracker',
          'Description: Hosted issue tracker',
          'Version: 2.0.0',
          'Deployment: remote',
          'Transport: https',
          '',
          'Configuration:',
          '  URL: https://mcp.example.com/sse',
          '',
          'Capabilities:',
          '  Prompts: triage_issue',
        ].join('\n'),
      ]);
    });

    it('fails for an unknown server', async () => {
      const { ctx, captured } = makeContext(registryPath);

      expect(await runShow(ctx, 'nope')).toBe(1);
      expect(captured.err).toEqual(["Server 'nope' not found."]);
      expect(captured.out).toEqual([]);
    });
  });

  describe('search', () => {
    it('prints matches with a count', async () => {
      const { ctx, captured } = makeContext(registryPath);

      expect(await runSearch(ctx, 'forecast')).toBe(0);
      expect(captured.out).toEqual(['Found 1 servers:', TABLE_HEADER, TABLE_RULE, WEATHER_ROW]);
    });

    it('reports no matches', async () => {
      const { ctx, captured } = makeContext(registryPath);

      await runSearch(ctx, 'zzz');
      expect(captured.out).toEqual(["No servers found matching 'zzz'."]);
    });
  });

  describe('convert', () => {
    it('prints hosts lines', async () => {
      const { ctx, captured } = makeContext(registryPath);

      expect(await runConvert(ctx, 'tracker', 'hosts', {})).toBe(0);
      expect(captured.out).toEqual([
        'tracker remote https https://mcp.example.com/sse auth=bearer',
      ]);
    });

    it('prints structured formats as JSON', async () => {
      const { ctx, captured } = makeContext(registryPath);

      await runConvert(ctx, 'weather', 'claude', {});
      expect(captured.out).toEqual([
        JSON.stringify(
          {
            mcpServers: {
              weather: {
                command: 'uv',
                args: ['run', 'weather.py'],
                env: { WEATHER_API_KEY: 'test-key' },
              },
            },
          },
          null,
          2,
        ),
      ]);
    });

    it('writes to an output file', async () => {
      const { ctx, captured } = makeContext(registryPath);
      const output = join(dir, 'out', 'manifest.json');

      expect(await runConvert(ctx, 'weather', 'dxt', { output })).toBe(0);
      expect(captured.out).toEqual([`Configuration written to ${output}`]);
      expect(await readDocumentFile(output)).toMatchObject({
        dxt_version: '1.0',
        name: 'weather',
        display_name: 'Weather Service',
        server: { type: 'python', mcp_config: { command: 'uv' } },
      });
    });

    it('reports unsupported transports', async () => {
      const { ctx, captured } = makeContext(registryPath);

      expect(await runConvert(ctx, 'weather', 'github', {})).toBe(1);
      expect(captured.err).toEqual([
        'Error: GitHub MCP format only supports HTTP transport, got stdio',
      ]);
    });

    it('reports unknown servers', async () => {
      const { ctx, captured } = makeContext(registryPath);

      expect(await runConvert(ctx, 'nope', 'claude', {})).toBe(1);
      expect(captured.err).toEqual(["Error: Server 'nope' not found"]);
    });
  });

  describe('validate', () => {
    it('validates the whole registry', async () => {
      const { ctx, captured } = makeContext(registryPath);

      expect(await runValidate(ctx)).toBe(0);
      expect(captured.out).toEqual(['All servers are valid.']);
    });

    it('validates one server', async () => {
      const { ctx, captured } = makeContext(registryPath);

      expect(await runValidate(ctx, 'files')).toBe(0);
      expect(captured.out).toEqual(["Server 'files' is valid."]);
    });

    it('fails for an unknown server', async () => {
      const { ctx, captured } = makeContext(registryPath);

      expect(await runValidate(ctx, 'nope')).toBe(1);
      expect(captured.err).toEqual(["Server 'nope' not found."]);
    });
  });

  describe('categories', () => {
    it('prints each category with its members', async () => {
      const { ctx, captured } = makeContext(registryPath);

      await runCategories(ctx);
      expect(captured.out).toEqual([
        'productivity: tracker, files',
        'data: weather, missing-server',
      ]);
    });

    it('reports a registry without categories', async () => {
      const { ctx, captured } = makeContext(join(dir, 'absent.yaml'));

      await runCategories(ctx);
      expect(captured.out).toEqual(['No categories defined.']);
    });
  });

  describe('import', () => {
    let configPath: string;

    beforeEach(async () => {
      configPath = join(dir, 'claude_desktop_config.json');
      await writeDocumentFile(configPath, {
        mcpServers: {
          weather: { command: 'python', args: ['weather.py'] },
          broken: { disabled: true },
        },
      });
    });

    it('fails for a missing configuration file', async () => {
      const { ctx, captured } = makeContext(registryPath);
      const missing = join(dir, 'missing.json');

      expect(await runImport(ctx, missing, {})).toBe(1);
      expect(captured.err).toEqual([`Configuration file not found: ${missing}`]);
    });

    it('imports without saving by default', async () => {
      const { ctx, captured } = makeContext(registryPath);

      expect(await runImport(ctx, configPath, {})).toBe(0);
      expect(captured.err).toEqual([
        "Skipped 'broken': config.transport: Transport type is required in config",
      ]);
      expect(captured.out).toEqual(['Imported 1 servers (not saved, use --save to persist).']);

      const stored = await loadRegistryFile(registryPath, { logger: ctx.logger });
      expect(stored.getServer('weather')?.description).toBe('Local weather data provider');
    });

    it('saves the registry with --save', async () => {
      const { ctx, captured } = makeContext(registryPath);

      await runImport(ctx, configPath, { save: true });
      expect(captured.out).toEqual(['Imported 1 servers and saved to registry.']);

      const stored = await loadRegistryFile(registryPath, { logger: ctx.logger });
      expect(stored.size).toBe(3);
      expect(stored.getServer('weather')?.description).toBe(IMPORTED_DESCRIPTION);
      expect(stored.getServer('weather')?.connectionConfig.command).toBe('python');
    });

    it('creates the registry when saving into a new file', async () => {
      const newRegistry = join(dir, 'fresh', 'registry.json');
      const { ctx } = makeContext(newRegistry);

      await runImport(ctx, configPath, { save: true });

      expect(await readDocumentFile(newRegistry)).toEqual({
        version: '1.0',
        servers: {
          weather: {
            name: 'Weather',
            description: IMPORTED_DESCRIPTION,
            version: '1.0.0',
            deployment: 'local',
            config: { transport: 'stdio', command: 'python', args: ['weather.py'] },
          },
        },
      });
    });
  });
});
