/**
 * Flight tracking domain types
 */

export type FlightStatus = 'Scheduled' | 'EnRoute' | 'Landed' | 'Unknown';

export interface Airport {
  iata: string | null;
  icao: string | null;
  name: string | null;
}

export interface ScheduleTimes {
  scheduled: string | null;
  estimated: string | null;
  actual: string | null;
  delayMinutes: number | null;
}

export interface Flight {
  flightNumber: string;
  icaoCallsign: string;
  status: FlightStatus;

  // Schedule (AviationStack)
  airline: string | null;
  aircraftType: string | null;
  registration: string | null;
  origin: Airport | null;
  destination: Airport | null;
  departure: ScheduleTimes | null;
  arrival: ScheduleTimes | null;
  scheduleStatus: string | null;
  hasSchedule: boolean;

  // Live position (OpenSky)
  icao24: string | null;
  latitude: number | null;
  longitude: number | null;
  altitudeFt: number | null;
  groundSpeedKts: number | null;
  headingDeg: number | null;
  verticalRateFpm: number | null;
  onGround: boolean | null;
  squawk: string | null;
  positionTime: number | null; // unix seconds reported by the provider
}

/**
 * Live position as parsed from an OpenSky state vector, already converted
 * to feet / knots / ft-per-minute.
 */
export interface PositionRecord {
  icao24: string | null;
  callsign: string | null;
  latitude: number | null;
  longitude: number | null;
  altitudeFt: number | null;
  groundSpeedKts: number | null;
  headingDeg: number | null;
  verticalRateFpm: number | null;
  onGround: boolean | null;
  squawk: string | null;
  positionTime: number | null;
}

export interface ScheduleRecord {
  flightNumber: string | null;
  status: string | null;
  airline: string | null;
  aircraftType: string | null;
  registration: string | null;
  origin: Airport | null;
  destination: Airport | null;
  departure: ScheduleTimes | null;
  arrival: ScheduleTimes | null;
}

export type ErrorKind = 'NotFound' | 'RateLimited' | 'Unavailable' | 'ConfigError';

export type FetchOutcome<R> =
  | { kind: 'fresh'; record: R }
  | { kind: 'cacheHit'; record: R }
  | { kind: 'failed'; error: ErrorKind; message: string };

export type SourceKind = 'position' | 'schedule';

export type SourceState =
  | 'pending'
  | 'fresh'
  | 'cached'
  | 'notFound'
  | 'rateLimited'
  | 'unavailable'
  | 'disabled';

export interface SourceIndicator {
  state: SourceState;
  lastSuccessAt: number | null; // ms
  lastError: string | null;
}

export interface TrackedFlight {
  trackingId: number;
  flight: Flight;
  position: SourceIndicator;
  schedule: SourceIndicator;
  stale: boolean;
}

export type OrchestratorPhase = 'Idle' | 'Refreshing';

export type RefreshTrigger = 'timer' | 'user';

export interface TrackingSnapshot {
  phase: OrchestratorPhase;
  flights: readonly Readonly<TrackedFlight>[];
  selectedIndex: number | null;
  scheduleEnabled: boolean;
  lastRefreshAt: number | null;
}

export interface RefreshSummary {
  trigger: RefreshTrigger;
  tasks: number;
  fresh: number;
  cacheHit: number;
  failed: number;
  discarded: number;
  durationMs: number;
}
