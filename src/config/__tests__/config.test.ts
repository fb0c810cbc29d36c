import os from 'os';
import path from 'path';
import { buildConfig, DEFAULT_AVIATIONSTACK_BASE_URL, DEFAULT_OPENSKY_BASE_URL } from '..';
import { ConfigError } from '../../utils/errors';

describe('buildConfig', () => {
  it('applies defaults for an empty environment', () => {
    const config = buildConfig({ HOME: '/home/tester' });

    expect(config.env).toBe('development');
    expect(config.external.opensky).toEqual({ baseUrl: DEFAULT_OPENSKY_BASE_URL, user: undefined, pass: undefined });
    expect(config.external.aviationstack).toEqual({ baseUrl: DEFAULT_AVIATIONSTACK_BASE_URL, apiKey: undefined });
    expect(config.http.timeoutMs).toBe(10_000);
    expect(config.cache).toEqual({
      positionTtlSeconds: 10,
      scheduleTtlSeconds: 3600,
      scheduleFilePath: path.join('/home/tester', '.config', 'flight-watch', 'schedule_cache.json'),
    });
    expect(config.tracking).toEqual({ refreshIntervalSeconds: 30, fetchConcurrency: 4 });
    expect(config.history).toEqual({
      filePath: path.join('/home/tester', '.config', 'flight-watch', 'history.json'),
      maxEntries: 20,
    });
  });

  it('reads credentials and overrides', () => {
    const config = buildConfig({
      NODE_ENV: 'production',
      AVIATIONSTACK_API_KEY: ' test-key ',
      OPENSKY_USERNAME: 'test-user',
      OPENSKY_PASSWORD: 'test-secret',
      OPENSKY_BASE_URL: 'http://localhost:9000/api/',
      POSITION_CACHE_TTL_SECONDS: '15',
      FETCH_CONCURRENCY: '8',
    });

    expect(config.env).toBe('production');
    expect(config.external.aviationstack.apiKey).toBe('test-key');
    expect(config.external.opensky).toEqual({
      baseUrl: 'http://localhost:9000/api',
      user: 'test-user',
      pass: 'test-secret',
    });
    expect(config.cache.positionTtlSeconds).toBe(15);
    expect(config.tracking.fetchConcurrency).toBe(8);
  });

  it('clamps values below their floors and ignores garbage', () => {
    const config = buildConfig({
      HTTP_CLIENT_TIMEOUT_MS: '10',
      REFRESH_INTERVAL_SECONDS: '1',
      FETCH_CONCURRENCY: '0',
      SCHEDULE_CACHE_TTL_SECONDS: 'soon',
    });

    expect(config.http.timeoutMs).toBe(1000);
    expect(config.tracking.refreshIntervalSeconds).toBe(5);
    expect(config.tracking.fetchConcurrency).toBe(1);
    expect(config.cache.scheduleTtlSeconds).toBe(3600);
  });

  it('treats a blank api key as missing', () => {
    expect(buildConfig({ AVIATIONSTACK_API_KEY: '   ' }).external.aviationstack.apiKey).toBeUndefined();
  });

  it('requires both OpenSky credentials together', () => {
    expect(() => buildConfig({ OPENSKY_USERNAME: 'test-user' })).toThrow(ConfigError);
    expect(() => buildConfig({ OPENSKY_PASSWORD: 'test-secret' })).toThrow(
      'OPENSKY_PASSWORD is set but OPENSKY_USERNAME is missing',
    );
  });

  it('resolves the history file location', () => {
    expect(buildConfig({ XDG_CONFIG_HOME: '/xdg', HOME: '/home/tester' }).history.filePath)
      .toBe(path.join('/xdg', 'flight-watch', 'history.json'));
    expect(buildConfig({ HISTORY_FILE: 'none' }).history.filePath).toBeNull();
    expect(buildConfig({ HISTORY_FILE: 'tmp/history.json' }).history.filePath)
      .toBe(path.resolve('tmp/history.json'));
  });

  it('resolves the schedule cache file location', () => {
    expect(buildConfig({ XDG_CONFIG_HOME: '/xdg', HOME: '/home/tester' }).cache.scheduleFilePath)
      .toBe(path.join('/xdg', 'flight-watch', 'schedule_cache.json'));
    expect(buildConfig({ SCHEDULE_CACHE_FILE: 'none' }).cache.scheduleFilePath).toBeNull();
    expect(buildConfig({ SCHEDULE_CACHE_FILE: 'tmp/schedule.json' }).cache.scheduleFilePath)
      .toBe(path.resolve('tmp/schedule.json'));
  });

  it('falls back to the os home directory', () => {
    expect(buildConfig({}).history.filePath)
      .toBe(path.join(os.homedir(), '.config', 'flight-watch', 'history.json'));
  });
});
