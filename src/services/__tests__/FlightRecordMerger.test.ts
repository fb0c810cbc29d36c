import {
  applyPosition,
  applySchedule,
  createFlight,
  resolveStatus,
  routeLabel,
} from '../FlightRecordMerger';
import type { PositionRecord, ScheduleRecord } from '../../types/flight.types';

const position = (overrides: Partial<PositionRecord> = {}): PositionRecord => ({
  icao24: 'abc123',
  callsign: 'UAL100',
  latitude: 37.62,
  longitude: -122.38,
  altitudeFt: 35_000,
  groundSpeedKts: 450,
  headingDeg: 270,
  verticalRateFpm: 0,
  onGround: false,
  squawk: '1200',
  positionTime: 1_700_000_000,
  ...overrides,
});

const schedule = (overrides: Partial<ScheduleRecord> = {}): ScheduleRecord => ({
  flightNumber: 'UA100',
  status: 'active',
  airline: 'United Airlines',
  aircraftType: 'B77W',
  registration: 'N123UA',
  origin: { iata: 'SFO', icao: 'KSFO', name: 'San Francisco International' },
  destination: { iata: 'LHR', icao: 'EGLL', name: 'Heathrow' },
  departure: {
    scheduled: '2024-03-01T10:00:00+00:00', estimated: null, actual: null, delayMinutes: null,
  },
  arrival: {
    scheduled: '2024-03-02T04:30:00+00:00', estimated: null, actual: null, delayMinutes: null,
  },
  ...overrides,
});

describe('FlightRecordMerger', () => {
  it('creates an unknown flight with its derived callsign', () => {
    const flight = createFlight('UA100');

    expect(flight.icaoCallsign).toBe('UAL100');
    expect(flight.status).toBe('Unknown');
    expect(flight.hasSchedule).toBe(false);
  });

  it('marks a positioned flight en route', () => {
    const flight = applyPosition(createFlight('UA100'), position());

    expect(flight.status).toBe('EnRoute');
    expect(flight.altitudeFt).toBe(35_000);
  });

  it('marks a flight with only schedule data as scheduled', () => {
    const flight = applySchedule(createFlight('UA100'), schedule({ status: 'scheduled' }));

    expect(flight.status).toBe('Scheduled');
    expect(flight.origin?.iata).toBe('SFO');
  });

  it('lets a landed schedule override a live position', () => {
    const positioned = applyPosition(createFlight('UA100'), position());
    const landed = applySchedule(positioned, schedule({ status: 'landed' }));

    expect(landed.status).toBe('Landed');
    expect(landed.latitude).toBe(37.62);
  });

  it('is idempotent', () => {
    const once = applySchedule(applyPosition(createFlight('UA100'), position()), schedule());
    const twice = applySchedule(applyPosition(once, position()), schedule());

    expect(twice).toEqual(once);
  });

  it('never erases known fields with missing ones', () => {
    const departed = applySchedule(createFlight('UA100'), schedule({
      departure: {
        scheduled: '2024-03-01T10:00:00+00:00',
        estimated: null,
        actual: '2024-03-01T10:12:00+00:00',
        delayMinutes: 12,
      },
    }));
    const sparse = applySchedule(departed, schedule({
      airline: null,
      origin: null,
      departure: {
        scheduled: null, estimated: '2024-03-01T10:10:00+00:00', actual: null, delayMinutes: null,
      },
    }));

    expect(sparse.airline).toBe('United Airlines');
    expect(sparse.origin?.name).toBe('San Francisco International');
    expect(sparse.departure).toEqual({
      scheduled: '2024-03-01T10:00:00+00:00',
      estimated: '2024-03-01T10:10:00+00:00',
      actual: '2024-03-01T10:12:00+00:00',
      delayMinutes: 12,
    });
  });

  it('keeps the last known coordinates when a position has none', () => {
    const positioned = applyPosition(createFlight('UA100'), position());
    const updated = applyPosition(positioned, position({ latitude: null, longitude: null, altitudeFt: 36_000 }));

    expect(updated.latitude).toBe(37.62);
    expect(updated.altitudeFt).toBe(36_000);
    expect(updated.status).toBe('EnRoute');
  });

  it('does not mutate its input', () => {
    const original = createFlight('UA100');
    applyPosition(original, position());

    expect(original.latitude).toBeNull();
    expect(resolveStatus(original)).toBe('Unknown');
  });

  it('labels a route once both ends are known', () => {
    expect(routeLabel(createFlight('UA100'))).toBeNull();
    expect(routeLabel(applySchedule(createFlight('UA100'), schedule()))).toBe('SFO→LHR');
    expect(routeLabel(applySchedule(createFlight('UA100'), schedule({
      destination: { iata: null, icao: 'EGLL', name: null },
    })))).toBe('SFO→EGLL');
  });
});
