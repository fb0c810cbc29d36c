import os from 'os';
import path from 'path';
import dotenv from 'dotenv';
import type { AppConfig } from '../types/config.types';
import { ConfigError } from '../utils/errors';

const APP_DIR = 'flight-watch';
const HISTORY_FILE = 'history.json';
const SCHEDULE_CACHE_FILE = 'schedule_cache.json';

export const DEFAULT_OPENSKY_BASE_URL = 'https://opensky-network.org/api';
export const DEFAULT_AVIATIONSTACK_BASE_URL = 'http://api.aviationstack.com/v1';

const parseNumber = (value: string | undefined, fallback: number): number => {
  if (!value) {
    return fallback;
  }
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
};

const nonEmpty = (value: string | undefined): string | undefined => {
  if (value === undefined) {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed === '' ? undefined : trimmed;
};

const resolveEnv = (value: string | undefined): AppConfig['env'] => {
  if (value === 'production' || value === 'test') {
    return value;
  }
  return 'development';
};

/**
 * Data files live under $XDG_CONFIG_HOME, falling back to ~/.config.
 * An explicit path overrides both; the value "none" keeps the data in memory.
 */
const resolveDataFile = (env: NodeJS.ProcessEnv, explicitPath: string | undefined, fileName: string): string | null => {
  const explicit = nonEmpty(explicitPath);
  if (explicit) {
    return explicit === 'none' ? null : path.resolve(explicit);
  }
  const xdg = nonEmpty(env.XDG_CONFIG_HOME);
  if (xdg) {
    return path.join(xdg, APP_DIR, fileName);
  }
  const home = nonEmpty(env.HOME) ?? os.homedir();
  return home ? path.join(home, '.config', APP_DIR, fileName) : null;
};

export function buildConfig(env: NodeJS.ProcessEnv): AppConfig {
  const openskyUser = nonEmpty(env.OPENSKY_USERNAME);
  const openskyPass = nonEmpty(env.OPENSKY_PASSWORD);

  if (openskyUser && !openskyPass) {
    throw new ConfigError('OPENSKY_USERNAME is set but OPENSKY_PASSWORD is missing', 'OPENSKY_PASSWORD');
  }
  if (openskyPass && !openskyUser) {
    throw new ConfigError('OPENSKY_PASSWORD is set but OPENSKY_USERNAME is missing', 'OPENSKY_USERNAME');
  }

  return {
    env: resolveEnv(env.NODE_ENV),
    external: {
      opensky: {
        baseUrl: (nonEmpty(env.OPENSKY_BASE_URL) ?? DEFAULT_OPENSKY_BASE_URL).replace(/\/$/, ''),
        user: openskyUser,
        pass: openskyPass,
      },
      aviationstack: {
        baseUrl: (nonEmpty(env.AVIATIONSTACK_BASE_URL) ?? DEFAULT_AVIATIONSTACK_BASE_URL).replace(/\/$/, ''),
        apiKey: nonEmpty(env.AVIATIONSTACK_API_KEY),
      },
    },
    http: {
      timeoutMs: Math.max(1000, parseNumber(env.HTTP_CLIENT_TIMEOUT_MS, 10000)),
    },
    cache: {
      positionTtlSeconds: Math.max(1, parseNumber(env.POSITION_CACHE_TTL_SECONDS, 10)),
      scheduleTtlSeconds: Math.max(1, parseNumber(env.SCHEDULE_CACHE_TTL_SECONDS, 3600)),
      scheduleFilePath: resolveDataFile(env, env.SCHEDULE_CACHE_FILE, SCHEDULE_CACHE_FILE),
    },
    tracking: {
      refreshIntervalSeconds: Math.max(5, parseNumber(env.REFRESH_INTERVAL_SECONDS, 30)),
      fetchConcurrency: Math.max(1, parseNumber(env.FETCH_CONCURRENCY, 4)),
    },
    history: {
      filePath: resolveDataFile(env, env.HISTORY_FILE, HISTORY_FILE),
      maxEntries: Math.max(1, parseNumber(env.HISTORY_MAX_ENTRIES, 20)),
    },
  };
}

/**
 * Loads .env (if present) into process.env and builds the configuration.
 */
export function loadConfig(): AppConfig {
  dotenv.config();
  return buildConfig(process.env);
}
