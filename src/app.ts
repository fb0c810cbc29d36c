import logger from './utils/logger';
import { createHttpClient } from './utils/httpClient';
import type { AppConfig } from './types/config.types';
import type { PositionRecord } from './types/flight.types';
import { OpenSkyClient } from './services/OpenSkyClient';
import { AviationStackClient, classifyAviationStackBody } from './services/AviationStackClient';
import { PositionFetcher } from './services/PositionFetcher';
import { ScheduleFetcher } from './services/ScheduleFetcher';
import { TtlCache } from './services/TtlCache';
import { PersistentTtlCache } from './services/PersistentTtlCache';
import { scheduleRecordSchema } from './schemas/scheduleCache.schemas';
import { HistoryStore } from './services/HistoryStore';
import { TrackingOrchestrator } from './services/TrackingOrchestrator';

export interface Tracker {
  orchestrator: TrackingOrchestrator;
  history: HistoryStore;
}

/**
 * Wires clients, caches, fetchers and the orchestrator from configuration.
 * Without an AviationStack key the tracker runs on positions only. Schedule
 * records are kept on disk between runs, since the provider's quota is monthly.
 */
export function createTracker(config: AppConfig): Tracker {
  const { opensky, aviationstack } = config.external;

  const openSkyClient = new OpenSkyClient({
    baseUrl: opensky.baseUrl,
    user: opensky.user,
    pass: opensky.pass,
    http: createHttpClient({ timeoutMs: config.http.timeoutMs, name: 'opensky' }),
  });
  if (!openSkyClient.hasCredentials()) {
    logger.info('OpenSky credentials not set, using anonymous quota');
  }

  const positionFetcher = new PositionFetcher(
    openSkyClient,
    new TtlCache<string, PositionRecord>({ ttlMs: config.cache.positionTtlSeconds * 1000, name: 'position' }),
  );

  let scheduleFetcher: ScheduleFetcher | null = null;
  if (aviationstack.apiKey) {
    const aviationStackClient = new AviationStackClient({
      baseUrl: aviationstack.baseUrl,
      http: createHttpClient({
        timeoutMs: config.http.timeoutMs,
        name: 'aviationstack',
        classifyBody: classifyAviationStackBody,
      }),
    });
    scheduleFetcher = new ScheduleFetcher(
      aviationStackClient,
      aviationstack.apiKey,
      PersistentTtlCache.load({
        ttlMs: config.cache.scheduleTtlSeconds * 1000,
        name: 'schedule',
        filePath: config.cache.scheduleFilePath,
        valueSchema: scheduleRecordSchema,
      }),
    );
  } else {
    logger.warn('AVIATIONSTACK_API_KEY not set, schedule data disabled');
  }

  const history = HistoryStore.load({
    filePath: config.history.filePath,
    maxEntries: config.history.maxEntries,
  });

  const orchestrator = new TrackingOrchestrator({
    positionFetcher,
    scheduleFetcher,
    history,
    refreshIntervalMs: config.tracking.refreshIntervalSeconds * 1000,
    concurrency: config.tracking.fetchConcurrency,
  });

  return { orchestrator, history };
}
