import { TrackingSet } from '../TrackingSet';
import { createFlight } from '../FlightRecordMerger';

const setWith = (...flightNumbers: string[]): TrackingSet => {
  const set = new TrackingSet();
  flightNumbers.forEach((flightNumber) => set.add(createFlight(flightNumber)));
  return set;
};

const selectedNumber = (set: TrackingSet): string | undefined => set.getSelected()?.flight.flightNumber;

describe('TrackingSet', () => {
  it('starts empty with no selection', () => {
    const set = new TrackingSet();

    expect(set.isEmpty()).toBe(true);
    expect(set.getSelectedIndex()).toBeNull();
    expect(set.getSelected()).toBeUndefined();
  });

  it('keeps insertion order and selects the newest flight', () => {
    const set = setWith('UA100', 'BA286', 'DL5');

    expect(set.list().map((entry) => entry.flight.flightNumber)).toEqual(['UA100', 'BA286', 'DL5']);
    expect(set.getSelectedIndex()).toBe(2);
  });

  it('rejects duplicate flight numbers', () => {
    const set = setWith('UA100');

    expect(set.add(createFlight('UA100'))).toBeNull();
    expect(set.size()).toBe(1);
  });

  it('assigns a new tracking id when a flight is re-added', () => {
    const set = setWith('UA100');
    const first = set.get('UA100')?.trackingId;
    set.remove('UA100');
    const second = set.add(createFlight('UA100'))?.trackingId;

    expect(first).toBe(1);
    expect(second).toBe(2);
  });

  it('starts both source indicators as pending', () => {
    const entry = setWith('UA100').get('UA100');

    expect(entry?.position).toEqual({ state: 'pending', lastSuccessAt: null, lastError: null });
    expect(entry?.schedule.state).toBe('pending');
    expect(entry?.stale).toBe(false);
  });

  it('wraps selection in both directions', () => {
    const set = setWith('UA100', 'BA286', 'DL5');

    set.selectNext();
    expect(selectedNumber(set)).toBe('UA100');
    set.selectPrevious();
    expect(selectedNumber(set)).toBe('DL5');
    set.selectPrevious();
    expect(selectedNumber(set)).toBe('BA286');
  });

  it('rejects out-of-range selection', () => {
    const set = setWith('UA100', 'BA286');

    expect(set.select(5)).toBe(false);
    expect(set.select(-1)).toBe(false);
    expect(set.select(0)).toBe(true);
    expect(selectedNumber(set)).toBe('UA100');
  });

  it('keeps the cursor on the same flight when an earlier one is removed', () => {
    const set = setWith('UA100', 'BA286', 'DL5');
    set.select(2);

    set.remove('UA100');

    expect(set.getSelectedIndex()).toBe(1);
    expect(selectedNumber(set)).toBe('DL5');
  });

  it('moves the cursor back when the last selected flight is removed', () => {
    const set = setWith('UA100', 'BA286', 'DL5');

    expect(set.removeSelected()?.flight.flightNumber).toBe('DL5');
    expect(selectedNumber(set)).toBe('BA286');
  });

  it('keeps the index when a middle selected flight is removed', () => {
    const set = setWith('UA100', 'BA286', 'DL5');
    set.select(1);

    set.removeSelected();

    expect(selectedNumber(set)).toBe('DL5');
  });

  it('clears the cursor when the set empties', () => {
    const set = setWith('UA100');

    set.remove('UA100');

    expect(set.getSelectedIndex()).toBeNull();
    expect(set.remove('UA100')).toBeUndefined();
  });

  it('updates by tracking id and reports missing entries', () => {
    const set = setWith('UA100');
    const trackingId = set.get('UA100')?.trackingId ?? -1;

    expect(set.update(trackingId, (entry) => ({ ...entry, stale: true }))).toBe(true);
    expect(set.get('UA100')?.stale).toBe(true);
    expect(set.update(999, (entry) => entry)).toBe(false);
  });
});
