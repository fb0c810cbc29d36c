import { FetchError } from '../utils/errors';
import type { PositionRecord } from '../types/flight.types';
import { CachedFetcher } from './CachedFetcher';
import { TtlCache } from './TtlCache';
import type { OpenSkyClient } from './OpenSkyClient';

export const DEFAULT_POSITION_TTL_MS = 10 * 1000;

export type PositionLookup = Pick<OpenSkyClient, 'lookupPosition'>;

/**
 * Live positions keyed by ICAO callsign.
 */
export class PositionFetcher extends CachedFetcher<PositionRecord> {
  constructor(
    private readonly client: PositionLookup,
    cache: TtlCache<string, PositionRecord> = new TtlCache({ ttlMs: DEFAULT_POSITION_TTL_MS, name: 'position' }),
  ) {
    super('position', cache);
  }

  protected lookup(icaoCallsign: string): Promise<PositionRecord> {
    return this.client.lookupPosition(icaoCallsign);
  }

  // An aircraft without coordinates is seen but not yet positioned
  protected validate(record: PositionRecord, icaoCallsign: string): FetchError | null {
    if (record.latitude === null || record.longitude === null) {
      return new FetchError('NotFound', `No coordinates reported for ${icaoCallsign}`);
    }
    return null;
  }
}
