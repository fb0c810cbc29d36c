import type { PositionRecord } from '../types/flight.types';
import type { StateVector } from '../schemas/opensky.schemas';

export const STATE_INDEX = {
  ICAO24: 0,
  CALLSIGN: 1,
  ORIGIN_COUNTRY: 2,
  TIME_POSITION: 3,
  LAST_CONTACT: 4,
  LONGITUDE: 5,
  LATITUDE: 6,
  BARO_ALTITUDE: 7,
  ON_GROUND: 8,
  VELOCITY: 9,
  TRUE_TRACK: 10,
  VERTICAL_RATE: 11,
  SENSORS: 12,
  GEO_ALTITUDE: 13,
  SQUAWK: 14,
  SPI: 15,
  POSITION_SOURCE: 16,
} as const;

export const METERS_TO_FEET = 3.28084;
export const MPS_TO_KNOTS = 1.94384;
export const MPS_TO_FEET_PER_MINUTE = METERS_TO_FEET * 60;

const safeNumber = (value: unknown): number | null => (
  typeof value === 'number' && Number.isFinite(value) ? value : null
);
const safeString = (value: unknown): string | null => (
  typeof value === 'string' && value.trim() !== '' ? value.trim() : null
);
const safeBoolean = (value: unknown): boolean | null => (typeof value === 'boolean' ? value : null);

const scale = (value: number | null, factor: number): number | null => (value === null ? null : value * factor);

export function stateCallsign(state: StateVector): string | null {
  const callsign = safeString(state[STATE_INDEX.CALLSIGN]);
  return callsign ? callsign.toUpperCase() : null;
}

/**
 * Maps an OpenSky state vector onto a position record in feet / knots.
 * Barometric altitude is preferred, geometric altitude fills in when absent.
 */
export function mapStateVector(state: StateVector): PositionRecord {
  const baroAltitude = safeNumber(state[STATE_INDEX.BARO_ALTITUDE]);
  const altitudeMeters = baroAltitude ?? safeNumber(state[STATE_INDEX.GEO_ALTITUDE]);

  return {
    icao24: safeString(state[STATE_INDEX.ICAO24]),
    callsign: stateCallsign(state),
    latitude: safeNumber(state[STATE_INDEX.LATITUDE]),
    longitude: safeNumber(state[STATE_INDEX.LONGITUDE]),
    altitudeFt: scale(altitudeMeters, METERS_TO_FEET),
    groundSpeedKts: scale(safeNumber(state[STATE_INDEX.VELOCITY]), MPS_TO_KNOTS),
    headingDeg: safeNumber(state[STATE_INDEX.TRUE_TRACK]),
    verticalRateFpm: scale(safeNumber(state[STATE_INDEX.VERTICAL_RATE]), MPS_TO_FEET_PER_MINUTE),
    onGround: safeBoolean(state[STATE_INDEX.ON_GROUND]),
    squawk: safeString(state[STATE_INDEX.SQUAWK]),
    positionTime: safeNumber(state[STATE_INDEX.TIME_POSITION]) ?? safeNumber(state[STATE_INDEX.LAST_CONTACT]),
  };
}
