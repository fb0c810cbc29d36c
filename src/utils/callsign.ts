/**
 * IATA airline designator → ICAO callsign prefix used in ADS-B broadcasts.
 */
export const IATA_TO_ICAO: Readonly<Record<string, string>> = {
  UA: 'UAL',
  AA: 'AAL',
  DL: 'DAL',
  BA: 'BAW',
  AF: 'AFR',
  LH: 'DLH',
  EK: 'UAE',
  QF: 'QFA',
  SQ: 'SIA',
  CX: 'CPA',
  JL: 'JAL',
  NH: 'ANA',
  KL: 'KLM',
  IB: 'IBE',
  WN: 'SWA',
  B6: 'JBU',
  AS: 'ASA',
  F9: 'FFT',
  NK: 'NKS',
  AC: 'ACA',
  VS: 'VIR',
  TK: 'THY',
  EY: 'ETD',
  QR: 'QTR',
  EI: 'EIN',
  AY: 'FIN',
  SK: 'SAS',
  TP: 'TAP',
  LX: 'SWR',
  OS: 'AUA',
};

const DIGITS_ONLY = /^\d+$/;

/**
 * Cleans a user-entered flight number: whitespace removed, uppercased.
 * Returns null when nothing is left.
 */
export function normalizeFlightNumber(input: string): string | null {
  const cleaned = input.replace(/\s+/g, '').toUpperCase();
  return cleaned === '' ? null : cleaned;
}

/**
 * Maps a flight designator such as "UA100" onto the callsign the position
 * provider reports ("UAL100"). Unknown prefixes pass through unchanged.
 */
export function normalizeCallsign(flightNumber: string): string {
  const designator = flightNumber.trim().toUpperCase();

  // Two-character designators may contain a digit (B6, F9)
  const twoCharPrefix = designator.slice(0, 2);
  const twoCharSuffix = designator.slice(2);
  if (IATA_TO_ICAO[twoCharPrefix] && (twoCharSuffix === '' || DIGITS_ONLY.test(twoCharSuffix))) {
    return `${IATA_TO_ICAO[twoCharPrefix]}${twoCharSuffix}`;
  }

  const firstDigit = designator.search(/\d/);
  const splitAt = firstDigit === -1 ? designator.length : firstDigit;
  if (splitAt === 0) {
    return designator;
  }

  const airline = designator.slice(0, splitAt);
  const number = designator.slice(splitAt);
  const icao = IATA_TO_ICAO[airline] ?? airline;
  return `${icao}${number}`;
}
