import { IATA_TO_ICAO, normalizeCallsign, normalizeFlightNumber } from '../callsign';

describe('normalizeCallsign', () => {
  it.each([
    ['UA100', 'UAL100'],
    ['BA286', 'BAW286'],
    ['DL5', 'DAL5'],
    ['ua100', 'UAL100'],
    [' LH400 ', 'DLH400'],
    ['B6100', 'JBU100'],
    ['F91234', 'FFT1234'],
  ])('maps %s to %s', (input, expected) => {
    expect(normalizeCallsign(input)).toBe(expected);
  });

  it('passes through designators that are already ICAO callsigns', () => {
    expect(normalizeCallsign('UAL123')).toBe('UAL123');
  });

  it('passes through unknown prefixes', () => {
    expect(normalizeCallsign('ZZ1')).toBe('ZZ1');
    expect(normalizeCallsign('XY789')).toBe('XY789');
  });

  it('maps a bare airline designator', () => {
    expect(normalizeCallsign('UA')).toBe('UAL');
  });

  it('leaves inputs without a leading prefix unchanged', () => {
    expect(normalizeCallsign('123')).toBe('123');
    expect(normalizeCallsign('A1')).toBe('A1');
    expect(normalizeCallsign('')).toBe('');
  });

  it('only maps known two-letter designators to three-letter ICAO codes', () => {
    Object.entries(IATA_TO_ICAO).forEach(([iata, icao]) => {
      expect(iata).toHaveLength(2);
      expect(icao).toMatch(/^[A-Z]{3}$/);
    });
  });
});

describe('normalizeFlightNumber', () => {
  it('strips whitespace and uppercases', () => {
    expect(normalizeFlightNumber(' ua 100 ')).toBe('UA100');
  });

  it('returns null for blank input', () => {
    expect(normalizeFlightNumber('   ')).toBeNull();
    expect(normalizeFlightNumber('')).toBeNull();
  });
});
