import type { Flight, SourceIndicator, TrackedFlight } from '../types/flight.types';

const pendingIndicator = (): SourceIndicator => ({ state: 'pending', lastSuccessAt: null, lastError: null });

/**
 * Insertion-ordered tracked flights plus a selection cursor.
 * The cursor is a valid index, or null exactly when the set is empty.
 */
export class TrackingSet {
  private entries: TrackedFlight[] = [];

  private selected: number | null = null;

  private nextTrackingId = 1;

  size(): number {
    return this.entries.length;
  }

  isEmpty(): boolean {
    return this.entries.length === 0;
  }

  has(flightNumber: string): boolean {
    return this.entries.some((entry) => entry.flight.flightNumber === flightNumber);
  }

  get(flightNumber: string): TrackedFlight | undefined {
    return this.entries.find((entry) => entry.flight.flightNumber === flightNumber);
  }

  getByTrackingId(trackingId: number): TrackedFlight | undefined {
    return this.entries.find((entry) => entry.trackingId === trackingId);
  }

  list(): readonly TrackedFlight[] {
    return this.entries;
  }

  /**
   * Appends a flight and selects it. Returns null for a duplicate flight number.
   */
  add(flight: Flight): TrackedFlight | null {
    if (this.has(flight.flightNumber)) {
      return null;
    }
    const entry: TrackedFlight = {
      trackingId: this.nextTrackingId,
      flight,
      position: pendingIndicator(),
      schedule: pendingIndicator(),
      stale: false,
    };
    this.nextTrackingId += 1;
    this.entries.push(entry);
    this.selected = this.entries.length - 1;
    return entry;
  }

  remove(flightNumber: string): TrackedFlight | undefined {
    const index = this.entries.findIndex((entry) => entry.flight.flightNumber === flightNumber);
    if (index === -1) {
      return undefined;
    }
    const [removed] = this.entries.splice(index, 1);
    this.fixCursorAfterRemoval(index);
    return removed;
  }

  removeSelected(): TrackedFlight | undefined {
    const current = this.getSelected();
    return current ? this.remove(current.flight.flightNumber) : undefined;
  }

  /**
   * Replaces the entry with the given tracking id. Returns false when it is gone.
   */
  update(trackingId: number, updater: (entry: TrackedFlight) => TrackedFlight): boolean {
    const index = this.entries.findIndex((entry) => entry.trackingId === trackingId);
    if (index === -1) {
      return false;
    }
    this.entries[index] = updater(this.entries[index]);
    return true;
  }

  getSelectedIndex(): number | null {
    return this.selected;
  }

  getSelected(): TrackedFlight | undefined {
    return this.selected === null ? undefined : this.entries[this.selected];
  }

  select(index: number): boolean {
    if (!Number.isInteger(index) || index < 0 || index >= this.entries.length) {
      return false;
    }
    this.selected = index;
    return true;
  }

  selectNext(): void {
    if (this.entries.length === 0) {
      return;
    }
    this.selected = this.selected === null ? 0 : (this.selected + 1) % this.entries.length;
  }

  selectPrevious(): void {
    if (this.entries.length === 0) {
      return;
    }
    if (this.selected === null || this.selected === 0) {
      this.selected = this.entries.length - 1;
    } else {
      this.selected -= 1;
    }
  }

  private fixCursorAfterRemoval(removedIndex: number): void {
    if (this.entries.length === 0) {
      this.selected = null;
      return;
    }
    if (this.selected === null) {
      return;
    }
    if (removedIndex < this.selected || this.selected >= this.entries.length) {
      this.selected -= 1;
    }
  }
}
