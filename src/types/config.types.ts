/**
 * Configuration type definitions
 */

export interface ExternalApiConfig {
  opensky: {
    baseUrl: string;
    user?: string;
    pass?: string;
  };
  aviationstack: {
    baseUrl: string;
    apiKey?: string;
  };
}

export interface HttpConfig {
  timeoutMs: number;
}

export interface CacheConfig {
  positionTtlSeconds: number;
  scheduleTtlSeconds: number;
  /** Schedule records survive restarts here; null keeps them in memory */
  scheduleFilePath: string | null;
}

export interface TrackingConfig {
  refreshIntervalSeconds: number;
  fetchConcurrency: number;
}

export interface HistoryConfig {
  filePath: string | null;
  maxEntries: number;
}

export interface AppConfig {
  env: 'development' | 'production' | 'test';
  external: ExternalApiConfig;
  http: HttpConfig;
  cache: CacheConfig;
  tracking: TrackingConfig;
  history: HistoryConfig;
}
