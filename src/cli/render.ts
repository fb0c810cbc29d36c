import type {
  Airport,
  ErrorKind,
  RefreshSummary,
  ScheduleTimes,
  SourceIndicator,
  SourceState,
  TrackedFlight,
  TrackingSnapshot,
} from '../types/flight.types';
import type { HistoryEntry } from '../services/HistoryStore';
import { routeLabel } from '../services/FlightRecordMerger';
import { userMessage } from '../utils/errors';

const MISSING = '-';

const FAILURE_KINDS: Partial<Record<SourceState, ErrorKind>> = {
  notFound: 'NotFound',
  rateLimited: 'RateLimited',
  unavailable: 'Unavailable',
  disabled: 'ConfigError',
};

export function describeSource(indicator: SourceIndicator): string {
  const kind = FAILURE_KINDS[indicator.state];
  if (kind) {
    return userMessage(kind);
  }
  switch (indicator.state) {
    case 'fresh':
      return 'live';
    case 'cached':
      return 'cached';
    default:
      return 'loading...';
  }
}

const formatAgo = (since: number | null, now: number): string => {
  if (since === null) {
    return 'never';
  }
  return `${Math.max(0, Math.round((now - since) / 1000))}s ago`;
};

const formatAirport = (airport: Airport | null): string => {
  if (!airport) {
    return MISSING;
  }
  const code = airport.iata ?? airport.icao;
  if (code && airport.name) {
    return `${code} (${airport.name})`;
  }
  return code ?? airport.name ?? MISSING;
};

const formatTimes = (times: ScheduleTimes | null): string => {
  if (!times) {
    return MISSING;
  }
  const parts: string[] = [];
  if (times.actual) {
    parts.push(`actual ${times.actual}`);
  } else if (times.estimated) {
    parts.push(`estimated ${times.estimated}`);
  } else if (times.scheduled) {
    parts.push(`scheduled ${times.scheduled}`);
  }
  if (times.delayMinutes !== null && times.delayMinutes > 0) {
    parts.push(`delayed ${times.delayMinutes} min`);
  }
  return parts.length > 0 ? parts.join(', ') : MISSING;
};

const formatPosition = (entry: TrackedFlight): string => {
  const { flight } = entry;
  if (flight.latitude === null || flight.longitude === null) {
    return MISSING;
  }
  const parts = [`${flight.latitude.toFixed(4)}, ${flight.longitude.toFixed(4)}`];
  if (flight.onGround) {
    parts.push('on ground');
  } else if (flight.altitudeFt !== null) {
    parts.push(`${Math.round(flight.altitudeFt)} ft`);
  }
  if (flight.groundSpeedKts !== null) {
    parts.push(`${Math.round(flight.groundSpeedKts)} kts`);
  }
  if (flight.headingDeg !== null) {
    parts.push(`heading ${Math.round(flight.headingDeg)}°`);
  }
  return parts.join('  ');
};

export function renderFlightLine(entry: TrackedFlight, index: number, selected: boolean): string {
  const { flight } = entry;
  const parts = [
    `${selected ? '>' : ' '} ${index + 1}. ${flight.flightNumber}`,
    flight.status,
    routeLabel(flight) ?? MISSING,
  ];
  if (entry.stale) {
    parts.push('[stale]');
  }
  return parts.join('  ');
}

export function renderFlightDetails(entry: TrackedFlight): string[] {
  const { flight } = entry;
  return [
    `    Callsign: ${flight.icaoCallsign}  Airline: ${flight.airline ?? MISSING}  Aircraft: ${flight.aircraftType ?? MISSING}  Registration: ${flight.registration ?? MISSING}`,
    `    Position: ${formatPosition(entry)}`,
    `    From: ${formatAirport(flight.origin)}  Departure: ${formatTimes(flight.departure)}`,
    `    To: ${formatAirport(flight.destination)}  Arrival: ${formatTimes(flight.arrival)}`,
    `    Position source: ${describeSource(entry.position)}  Schedule source: ${describeSource(entry.schedule)}`,
  ];
}

/**
 * Text view of the tracker: a status header, one line per flight and the
 * details of the selected flight.
 */
export function renderSnapshot(snapshot: TrackingSnapshot, now: number = Date.now()): string[] {
  const header = [
    `Flights: ${snapshot.flights.length}`,
    snapshot.phase === 'Refreshing' ? 'refreshing...' : `last refresh ${formatAgo(snapshot.lastRefreshAt, now)}`,
  ];
  if (!snapshot.scheduleEnabled) {
    header.push('schedule source off');
  }

  const lines = [header.join('  |  ')];
  if (snapshot.flights.length === 0) {
    lines.push('No flights tracked. Type "add <flight>" to start.');
    return lines;
  }

  snapshot.flights.forEach((entry, index) => {
    const selected = index === snapshot.selectedIndex;
    lines.push(renderFlightLine(entry, index, selected));
    if (selected) {
      lines.push(...renderFlightDetails(entry));
    }
  });
  return lines;
}

export function renderSummary(summary: RefreshSummary): string {
  return `Refreshed ${summary.tasks} lookups in ${summary.durationMs} ms: `
    + `${summary.fresh} fresh, ${summary.cacheHit} cached, ${summary.failed} failed`;
}

export function renderHistory(entries: readonly Readonly<HistoryEntry>[]): string[] {
  if (entries.length === 0) {
    return ['No recent flights.'];
  }
  return entries.map((entry, index) => (
    `  ${index + 1}. ${entry.flightNumber}${entry.route ? `  ${entry.route}` : ''}`
  ));
}
