import { FetchError } from '../utils/errors';
import type { ScheduleRecord } from '../types/flight.types';
import { CachedFetcher } from './CachedFetcher';
import { TtlCache } from './TtlCache';
import type { AviationStackClient } from './AviationStackClient';

export const DEFAULT_SCHEDULE_TTL_MS = 60 * 60 * 1000;

export type ScheduleLookup = Pick<AviationStackClient, 'lookupSchedule'>;

/**
 * Schedule data keyed by IATA flight number. Requires an API key; the
 * composition root does not build this fetcher without one.
 */
export class ScheduleFetcher extends CachedFetcher<ScheduleRecord> {
  constructor(
    private readonly client: ScheduleLookup,
    private readonly apiKey: string,
    cache: TtlCache<string, ScheduleRecord> = new TtlCache({ ttlMs: DEFAULT_SCHEDULE_TTL_MS, name: 'schedule' }),
  ) {
    super('schedule', cache);
  }

  protected lookup(flightNumber: string): Promise<ScheduleRecord> {
    return this.client.lookupSchedule(flightNumber, this.apiKey);
  }

  protected validate(record: ScheduleRecord, flightNumber: string): FetchError | null {
    const hasContent = Object.values(record).some((value) => value !== null);
    return hasContent ? null : new FetchError('Unavailable', `Empty schedule payload for ${flightNumber}`);
  }
}
