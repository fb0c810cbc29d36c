import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import logger from '../utils/logger';
import { errorMessage } from '../utils/errors';

export const DEFAULT_MAX_HISTORY = 20;

const historyEntrySchema = z.object({
  flightNumber: z.string().min(1),
  route: z.string().nullish(),
});

const historyFileSchema = z.object({
  entries: z.array(historyEntrySchema),
});

export interface HistoryEntry {
  flightNumber: string;
  /** Route for display, e.g. "SFO→LHR" */
  route: string | null;
}

export interface HistoryStoreOptions {
  /** JSON file to persist to; null keeps history in memory only */
  filePath: string | null;
  maxEntries?: number;
}

/**
 * Recently tracked flight numbers, most recent first, without duplicates.
 */
export class HistoryStore {
  private readonly filePath: string | null;

  private readonly maxEntries: number;

  private entries: HistoryEntry[] = [];

  constructor({ filePath, maxEntries = DEFAULT_MAX_HISTORY }: HistoryStoreOptions) {
    this.filePath = filePath;
    this.maxEntries = Math.max(1, maxEntries);
  }

  /**
   * Builds a store from its file. Missing or unreadable files give an empty history.
   */
  static load(options: HistoryStoreOptions): HistoryStore {
    const store = new HistoryStore(options);
    if (!options.filePath || !fs.existsSync(options.filePath)) {
      return store;
    }

    try {
      const raw: unknown = JSON.parse(fs.readFileSync(options.filePath, 'utf8'));
      const parsed = historyFileSchema.safeParse(raw);
      if (!parsed.success) {
        logger.warn('Ignoring malformed history file', { filePath: options.filePath });
        return store;
      }
      store.entries = parsed.data.entries
        .map((entry) => ({ flightNumber: entry.flightNumber, route: entry.route ?? null }))
        .slice(0, store.maxEntries);
    } catch (error) {
      logger.warn('Failed to read history file', { filePath: options.filePath, error: errorMessage(error) });
    }
    return store;
  }

  record(flightNumber: string, route: string | null = null): void {
    this.entries = [
      { flightNumber, route },
      ...this.entries.filter((entry) => entry.flightNumber !== flightNumber),
    ].slice(0, this.maxEntries);
    this.save();
  }

  /**
   * Keeps the entry in place and fills in its route once it is known.
   */
  updateRoute(flightNumber: string, route: string): void {
    const entry = this.entries.find((candidate) => candidate.flightNumber === flightNumber);
    if (!entry || entry.route === route) {
      return;
    }
    entry.route = route;
    this.save();
  }

  recent(): string[] {
    return this.entries.map((entry) => entry.flightNumber);
  }

  list(): readonly Readonly<HistoryEntry>[] {
    return this.entries.map((entry) => ({ ...entry }));
  }

  matching(prefix: string): HistoryEntry[] {
    const wanted = prefix.trim().toUpperCase();
    return this.entries
      .filter((entry) => entry.flightNumber.startsWith(wanted))
      .map((entry) => ({ ...entry }));
  }

  size(): number {
    return this.entries.length;
  }

  isEmpty(): boolean {
    return this.entries.length === 0;
  }

  private save(): void {
    if (!this.filePath) {
      return;
    }
    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      fs.writeFileSync(this.filePath, JSON.stringify({ entries: this.entries }, null, 2));
    } catch (error) {
      logger.warn('Failed to write history file', { filePath: this.filePath, error: errorMessage(error) });
    }
  }
}
