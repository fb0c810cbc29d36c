import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import logger from '../utils/logger';
import { errorMessage } from '../utils/errors';
import { TtlCache, type TtlCacheOptions } from './TtlCache';

const snapshotSchema = z.object({
  entries: z.array(z.object({
    key: z.string().min(1),
    insertedAt: z.number().int().nonnegative(),
    value: z.unknown(),
  })),
});

export interface PersistentTtlCacheOptions<V> extends TtlCacheOptions {
  /** JSON snapshot to load from and write to; null keeps entries in memory only */
  filePath: string | null;
  /** Checks each stored value on load */
  valueSchema: z.ZodType<V>;
}

/**
 * TtlCache mirrored to a JSON file so entries survive a restart. Entries
 * keep their wall-clock insertion time, so an entry loaded from disk
 * expires when it would have without the restart.
 */
export class PersistentTtlCache<V> extends TtlCache<string, V> {
  private readonly filePath: string | null;

  constructor(options: TtlCacheOptions & { filePath: string | null }) {
    super(options);
    this.filePath = options.filePath;
  }

  /**
   * Builds a cache from its snapshot. A missing or malformed file gives an
   * empty cache; expired and malformed entries are skipped.
   */
  static load<V>({ valueSchema, ...options }: PersistentTtlCacheOptions<V>): PersistentTtlCache<V> {
    const cache = new PersistentTtlCache<V>(options);
    const { filePath } = options;
    if (!filePath || !fs.existsSync(filePath)) {
      return cache;
    }

    try {
      const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf8'));
      const parsed = snapshotSchema.safeParse(raw);
      if (!parsed.success) {
        logger.warn('Ignoring malformed cache file', { cache: cache.name, filePath });
        return cache;
      }

      const now = Date.now();
      let restored = 0;
      parsed.data.entries.forEach((entry) => {
        const age = now - entry.insertedAt;
        const value = valueSchema.safeParse(entry.value);
        if (age < 0 || age >= cache.getTtlMs() || !value.success) {
          return;
        }
        cache.restore(entry.key, value.data, entry.insertedAt);
        restored += 1;
      });
      logger.debug('Loaded cache file', {
        cache: cache.name,
        filePath,
        restored,
        skipped: parsed.data.entries.length - restored,
      });
    } catch (error) {
      logger.warn('Failed to read cache file', { cache: cache.name, filePath, error: errorMessage(error) });
    }
    return cache;
  }

  set(key: string, value: V): void {
    super.set(key, value);
    this.save();
  }

  delete(key: string): boolean {
    const removed = super.delete(key);
    if (removed) {
      this.save();
    }
    return removed;
  }

  clear(): void {
    super.clear();
    this.save();
  }

  private save(): void {
    if (!this.filePath) {
      return;
    }
    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      fs.writeFileSync(this.filePath, JSON.stringify({ entries: this.liveEntries() }, null, 2));
    } catch (error) {
      logger.warn('Failed to write cache file', { cache: this.name, filePath: this.filePath, error: errorMessage(error) });
    }
  }
}
