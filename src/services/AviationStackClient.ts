import logger from '../utils/logger';
import { FetchError } from '../utils/errors';
import { classifyHttpError, type HttpGetter } from '../utils/httpClient';
import type { Airport, ScheduleRecord, ScheduleTimes } from '../types/flight.types';
import {
  aviationStackErrorSchema,
  aviationStackResponseSchema,
  type AviationStackAirportInfo,
  type AviationStackFlight,
} from '../schemas/aviationstack.schemas';

const RATE_LIMIT_CODES = new Set(['usage_limit_reached', 'rate_limit_reached']);
const CREDENTIAL_CODES = new Set(['missing_access_key', 'invalid_access_key', 'inactive_user']);

export interface AviationStackClientOptions {
  baseUrl: string;
  http: HttpGetter;
}

/**
 * Reads AviationStack's `{ error: { code } }` body. Quota codes are rate
 * limits, key problems are configuration errors.
 */
export function classifyAviationStackBody(body: unknown): FetchError | null {
  if (typeof body !== 'object' || body === null || !('error' in body)) {
    return null;
  }
  const parsed = aviationStackErrorSchema.safeParse(body.error);
  if (!parsed.success) {
    return null;
  }
  const { code, message } = parsed.data;
  if (RATE_LIMIT_CODES.has(code)) {
    return new FetchError('RateLimited', message || 'AviationStack quota exceeded');
  }
  if (CREDENTIAL_CODES.has(code)) {
    return new FetchError('ConfigError', message || 'AviationStack rejected the API key');
  }
  return new FetchError('Unavailable', message || `AviationStack error: ${code}`);
}

const text = (value: string | null | undefined): string | null => {
  if (typeof value !== 'string') return null;
  const trimmed = value.trim();
  return trimmed === '' ? null : trimmed;
};

const mapAirport = (info: AviationStackAirportInfo | null | undefined): Airport | null => {
  if (!info) return null;
  const airport: Airport = {
    iata: text(info.iata),
    icao: text(info.icao),
    name: text(info.airport),
  };
  return airport.iata || airport.icao || airport.name ? airport : null;
};

const mapTimes = (info: AviationStackAirportInfo | null | undefined): ScheduleTimes | null => {
  if (!info) return null;
  const times: ScheduleTimes = {
    scheduled: text(info.scheduled),
    estimated: text(info.estimated),
    actual: text(info.actual),
    delayMinutes: typeof info.delay === 'number' ? info.delay : null,
  };
  const hasAny = times.scheduled || times.estimated || times.actual || times.delayMinutes !== null;
  return hasAny ? times : null;
};

export function mapScheduleRecord(flight: AviationStackFlight): ScheduleRecord {
  const status = text(flight.flight_status);
  return {
    flightNumber: text(flight.flight?.iata),
    status: status ? status.toLowerCase() : null,
    airline: text(flight.airline?.name),
    aircraftType: text(flight.aircraft?.iata) ?? text(flight.aircraft?.icao),
    registration: text(flight.aircraft?.registration),
    origin: mapAirport(flight.departure),
    destination: mapAirport(flight.arrival),
    departure: mapTimes(flight.departure),
    arrival: mapTimes(flight.arrival),
  };
}

/**
 * Schedule lookups against AviationStack. The free tier allows about
 * 100 requests per month, so callers cache aggressively.
 */
export class AviationStackClient {
  private readonly baseUrl: string;

  private readonly http: HttpGetter;

  constructor(options: AviationStackClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/$/, '');
    this.http = options.http;
  }

  async lookupSchedule(flightNumber: string, apiKey: string): Promise<ScheduleRecord> {
    const flightIata = flightNumber.replace(/\s+/g, '').toUpperCase();

    let body: unknown;
    try {
      const response = await this.http.get(`${this.baseUrl}/flights`, {
        params: {
          access_key: apiKey,
          flight_iata: flightIata,
        },
      });
      body = response.data;
    } catch (error) {
      throw classifyHttpError(error, classifyAviationStackBody);
    }

    const bodyError = classifyAviationStackBody(body);
    if (bodyError) {
      throw bodyError;
    }

    const parsed = aviationStackResponseSchema.safeParse(body);
    if (!parsed.success) {
      logger.warn('Malformed AviationStack response', {
        flightNumber: flightIata,
        issues: parsed.error.issues.slice(0, 3).map((issue) => issue.message),
      });
      throw new FetchError('Unavailable', 'Malformed AviationStack response');
    }

    const first = parsed.data.data?.[0];
    if (!first) {
      throw new FetchError('NotFound', `No schedule for ${flightIata}`);
    }

    return mapScheduleRecord(first);
  }
}
