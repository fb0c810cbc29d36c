/**
 * Field-level merging of provider records into a tracked flight.
 * Incoming nulls never erase known values; status is recomputed last.
 */
import type {
  Airport,
  Flight,
  FlightStatus,
  PositionRecord,
  ScheduleRecord,
  ScheduleTimes,
} from '../types/flight.types';
import { normalizeCallsign } from '../utils/callsign';

const pick = <T>(incoming: T | null, existing: T | null): T | null => (incoming !== null ? incoming : existing);

export function createFlight(flightNumber: string): Flight {
  return {
    flightNumber,
    icaoCallsign: normalizeCallsign(flightNumber),
    status: 'Unknown',
    airline: null,
    aircraftType: null,
    registration: null,
    origin: null,
    destination: null,
    departure: null,
    arrival: null,
    scheduleStatus: null,
    hasSchedule: false,
    icao24: null,
    latitude: null,
    longitude: null,
    altitudeFt: null,
    groundSpeedKts: null,
    headingDeg: null,
    verticalRateFpm: null,
    onGround: null,
    squawk: null,
    positionTime: null,
  };
}

/**
 * Precedence: landed (schedule) > live position > any schedule data > unknown.
 */
export function resolveStatus(flight: Flight): FlightStatus {
  if (flight.scheduleStatus === 'landed') {
    return 'Landed';
  }
  if (flight.latitude !== null && flight.longitude !== null) {
    return 'EnRoute';
  }
  if (flight.hasSchedule) {
    return 'Scheduled';
  }
  return 'Unknown';
}

const mergeAirport = (existing: Airport | null, incoming: Airport | null): Airport | null => {
  if (!incoming) return existing;
  return {
    iata: pick(incoming.iata, existing?.iata ?? null),
    icao: pick(incoming.icao, existing?.icao ?? null),
    name: pick(incoming.name, existing?.name ?? null),
  };
};

const mergeTimes = (existing: ScheduleTimes | null, incoming: ScheduleTimes | null): ScheduleTimes | null => {
  if (!incoming) return existing;
  return {
    scheduled: pick(incoming.scheduled, existing?.scheduled ?? null),
    estimated: pick(incoming.estimated, existing?.estimated ?? null),
    actual: pick(incoming.actual, existing?.actual ?? null),
    delayMinutes: pick(incoming.delayMinutes, existing?.delayMinutes ?? null),
  };
};

export function applyPosition(flight: Flight, record: PositionRecord): Flight {
  const merged: Flight = {
    ...flight,
    icao24: pick(record.icao24, flight.icao24),
    latitude: pick(record.latitude, flight.latitude),
    longitude: pick(record.longitude, flight.longitude),
    altitudeFt: pick(record.altitudeFt, flight.altitudeFt),
    groundSpeedKts: pick(record.groundSpeedKts, flight.groundSpeedKts),
    headingDeg: pick(record.headingDeg, flight.headingDeg),
    verticalRateFpm: pick(record.verticalRateFpm, flight.verticalRateFpm),
    onGround: pick(record.onGround, flight.onGround),
    squawk: pick(record.squawk, flight.squawk),
    positionTime: pick(record.positionTime, flight.positionTime),
  };
  return { ...merged, status: resolveStatus(merged) };
}

export function applySchedule(flight: Flight, record: ScheduleRecord): Flight {
  const merged: Flight = {
    ...flight,
    hasSchedule: true,
    scheduleStatus: pick(record.status, flight.scheduleStatus),
    airline: pick(record.airline, flight.airline),
    aircraftType: pick(record.aircraftType, flight.aircraftType),
    registration: pick(record.registration, flight.registration),
    origin: mergeAirport(flight.origin, record.origin),
    destination: mergeAirport(flight.destination, record.destination),
    departure: mergeTimes(flight.departure, record.departure),
    arrival: mergeTimes(flight.arrival, record.arrival),
  };
  return { ...merged, status: resolveStatus(merged) };
}

const airportCode = (airport: Airport | null): string => airport?.iata ?? airport?.icao ?? '???';

/**
 * "SFO→LHR" once both ends are known, otherwise null.
 */
export function routeLabel(flight: Flight): string | null {
  if (!flight.origin || !flight.destination) {
    return null;
  }
  return `${airportCode(flight.origin)}→${airportCode(flight.destination)}`;
}
