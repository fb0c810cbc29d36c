import logger from '../utils/logger';

export interface RateLimitStatus {
  isRateLimited: boolean;
  blockedUntil: string | null;
  secondsUntilRetry: number | null;
}

/**
 * Suppression window for one upstream source after it signalled a rate
 * limit. While closed, fetchers answer RateLimited without calling out.
 */
export class RateLimitGate {
  private blockedUntil: number | null = null; // ms

  constructor(
    private readonly source: string,
    private readonly defaultBackoffSeconds: number,
  ) {}

  isRateLimited(): boolean {
    if (this.blockedUntil === null) return false;

    if (Date.now() < this.blockedUntil) {
      return true;
    }

    this.blockedUntil = null;
    logger.info('Rate limit window elapsed, resuming requests', { source: this.source });
    return false;
  }

  getSecondsUntilRetry(): number | null {
    if (this.blockedUntil === null) return null;

    const now = Date.now();
    if (now >= this.blockedUntil) return 0;

    return Math.ceil((this.blockedUntil - now) / 1000);
  }

  /**
   * Close the gate, using the provider's retry-after when it sent one.
   */
  recordRateLimit(retryAfterSeconds: number | null = null): void {
    const backoffSeconds = retryAfterSeconds && retryAfterSeconds > 0
      ? retryAfterSeconds
      : this.defaultBackoffSeconds;

    this.blockedUntil = Date.now() + (backoffSeconds * 1000);
    logger.warn('Upstream rate limit hit, suppressing requests', {
      source: this.source,
      backoffSeconds,
      retryAt: new Date(this.blockedUntil).toISOString(),
    });
  }

  getStatus(): RateLimitStatus {
    const isRateLimited = this.isRateLimited();
    return {
      isRateLimited,
      blockedUntil: this.blockedUntil !== null ? new Date(this.blockedUntil).toISOString() : null,
      secondsUntilRetry: this.getSecondsUntilRetry(),
    };
  }

  reset(): void {
    this.blockedUntil = null;
  }
}
