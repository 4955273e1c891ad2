import type { RawServerEntry } from '@mcp-catalog/models';

export function stdioEntry(overrides: RawServerEntry = {}): RawServerEntry {
  return {
    name: 'Weather Service',
    description: 'Local weather data provider',
    version: '1.2.3',
    deployment: 'local',
    config: {
      transport: 'stdio',
      command: 'uv',
      args: ['--directory', '/srv/weather', 'run', 'weather.py'],
      env: { WEATHER_API_KEY: 'test-key' },
    },
    ...overrides,
  };
}

export function httpsEntry(overrides: RawServerEntry = {}): RawServerEntry {
  return {
    name: 'Issue Tracker',
    description: 'Hosted issue tracker',
    version: '2.0.0',
    deployment: 'remote',
    config: {
      transport: 'https',
      url: 'https://mcp.example.com/sse',
      headers: { Authorization: 'Bearer test-token' },
    },
    ...overrides,
  };
}
