import { mapStateVector, stateCallsign } from '../stateVector';

const buildState = (overrides: Record<number, unknown> = {}): unknown[] => {
  const state: unknown[] = [
    'a1b2c3', 'UAL100  ', 'United States', 1_700_000_000, 1_700_000_005,
    -122.38, 37.62, 10_000, false, 200, 270, -5, null, 10_200, '1200', false, 0,
  ];
  Object.entries(overrides).forEach(([index, value]) => {
    state[Number(index)] = value;
  });
  return state;
};

describe('stateVector', () => {
  it('trims and uppercases the broadcast callsign', () => {
    expect(stateCallsign(buildState({ 1: ' ual100 ' }))).toBe('UAL100');
    expect(stateCallsign(buildState({ 1: '   ' }))).toBeNull();
    expect(stateCallsign(buildState({ 1: null }))).toBeNull();
  });

  it('converts metric values to feet, knots and feet per minute', () => {
    const record = mapStateVector(buildState());

    expect(record.icao24).toBe('a1b2c3');
    expect(record.callsign).toBe('UAL100');
    expect(record.latitude).toBe(37.62);
    expect(record.longitude).toBe(-122.38);
    expect(record.altitudeFt).toBeCloseTo(32_808.4, 1);
    expect(record.groundSpeedKts).toBeCloseTo(388.768, 3);
    expect(record.verticalRateFpm).toBeCloseTo(-984.252, 3);
    expect(record.headingDeg).toBe(270);
    expect(record.onGround).toBe(false);
    expect(record.squawk).toBe('1200');
    expect(record.positionTime).toBe(1_700_000_000);
  });

  it('falls back to geometric altitude and last contact', () => {
    const record = mapStateVector(buildState({ 7: null, 3: null }));

    expect(record.altitudeFt).toBeCloseTo(33_464.568, 3);
    expect(record.positionTime).toBe(1_700_000_005);
  });

  it('maps missing or mistyped fields to null', () => {
    const record = mapStateVector(buildState({
      5: null, 6: 'north', 9: null, 8: 'no', 14: null,
    }));

    expect(record.latitude).toBeNull();
    expect(record.longitude).toBeNull();
    expect(record.groundSpeedKts).toBeNull();
    expect(record.onGround).toBeNull();
    expect(record.squawk).toBeNull();
  });
});
