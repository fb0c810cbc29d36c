import logger from '../utils/logger';
import { FetchError } from '../utils/errors';
import { classifyHttpError } from '../utils/httpClient';
import type { FetchOutcome, SourceKind } from '../types/flight.types';
import { TtlCache } from './TtlCache';
import { RateLimitGate, type RateLimitStatus } from './RateLimitGate';

/**
 * Cache-first lookup shared by both sources:
 * cache hit → in-flight lookup → enabled check → rate-limit gate → upstream → validate → cache.
 * Failures are returned as outcomes and never cached.
 *
 * A credential failure (`ConfigError`) disables the source for the rest of
 * the session; cached records are still served.
 */
export abstract class CachedFetcher<R> {
  protected readonly cache: TtlCache<string, R>;

  protected readonly gate: RateLimitGate;

  private readonly inFlight = new Map<string, Promise<FetchOutcome<R>>>();

  private disabledReason: string | null = null;

  constructor(
    readonly source: SourceKind,
    cache: TtlCache<string, R>,
  ) {
    this.cache = cache;
    this.gate = new RateLimitGate(source, Math.ceil(cache.getTtlMs() / 1000));
  }

  protected abstract lookup(key: string): Promise<R>;

  /**
   * Rejects records that parsed but carry nothing usable.
   */
  protected abstract validate(record: R, key: string): FetchError | null;

  isEnabled(): boolean {
    return this.disabledReason === null;
  }

  getDisabledReason(): string | null {
    return this.disabledReason;
  }

  getRateLimitStatus(): RateLimitStatus {
    return this.gate.getStatus();
  }

  async fetch(key: string): Promise<FetchOutcome<R>> {
    const cached = this.cache.get(key);
    if (cached !== undefined) {
      return { kind: 'cacheHit', record: cached };
    }

    // Callers asking for a key that is already being fetched share that lookup
    const pending = this.inFlight.get(key);
    if (pending) {
      return pending;
    }

    const request = this.fetchUpstream(key).finally(() => {
      this.inFlight.delete(key);
    });
    this.inFlight.set(key, request);
    return request;
  }

  private async fetchUpstream(key: string): Promise<FetchOutcome<R>> {
    if (!this.isEnabled()) {
      return { kind: 'failed', error: 'ConfigError', message: `${this.source} source disabled` };
    }

    if (this.gate.isRateLimited()) {
      return {
        kind: 'failed',
        error: 'RateLimited',
        message: `${this.source} requests suppressed for ${this.gate.getSecondsUntilRetry() ?? 0}s`,
      };
    }

    try {
      const record = await this.lookup(key);
      const invalid = this.validate(record, key);
      if (invalid) {
        throw invalid;
      }
      this.cache.set(key, record);
      return { kind: 'fresh', record };
    } catch (error) {
      const failure = classifyHttpError(error);
      if (failure.kind === 'RateLimited') {
        this.gate.recordRateLimit(failure.retryAfterSeconds);
      }
      if (failure.kind === 'ConfigError') {
        this.disable(failure.message);
      }

      const meta = {
        source: this.source,
        key,
        kind: failure.kind,
        error: failure.message,
      };
      if (failure.kind === 'NotFound') {
        logger.debug('Fetch found no record', meta);
      } else {
        logger.warn('Fetch failed', meta);
      }
      return { kind: 'failed', error: failure.kind, message: failure.message };
    }
  }

  // A rejected credential stays rejected: stop asking for the rest of the session
  private disable(reason: string): void {
    if (this.disabledReason !== null) {
      return;
    }
    this.disabledReason = reason;
    logger.error(`${this.source} source disabled for this session`, { reason });
  }
}
