import logger from '../utils/logger';
import { errorMessage } from '../utils/errors';
import { normalizeFlightNumber } from '../utils/callsign';
import { TaskPool } from '../utils/taskPool';
import type {
  ErrorKind,
  FetchOutcome,
  OrchestratorPhase,
  PositionRecord,
  RefreshSummary,
  RefreshTrigger,
  ScheduleRecord,
  SourceIndicator,
  SourceKind,
  SourceState,
  TrackedFlight,
  TrackingSnapshot,
} from '../types/flight.types';
import { applyPosition, applySchedule, createFlight, routeLabel } from './FlightRecordMerger';
import { TrackingSet } from './TrackingSet';
import type { HistoryStore } from './HistoryStore';

export const DEFAULT_REFRESH_INTERVAL_MS = 30 * 1000;
export const DEFAULT_FETCH_CONCURRENCY = 4;

export interface SourceFetcher<R> {
  fetch(key: string): Promise<FetchOutcome<R>>;
  isEnabled(): boolean;
}

export type TrackingHistory = Pick<HistoryStore, 'record' | 'updateRoute'>;

export interface TrackingOrchestratorOptions {
  positionFetcher: SourceFetcher<PositionRecord>;
  /** null runs the tracker in position-only mode */
  scheduleFetcher: SourceFetcher<ScheduleRecord> | null;
  history?: TrackingHistory | null;
  refreshIntervalMs?: number;
  concurrency?: number;
  trackingSet?: TrackingSet;
}

export type AddFlightResult =
  | { ok: true; flight: Readonly<TrackedFlight>; initialFetch: Promise<void> }
  | { ok: false; reason: 'empty' | 'duplicate'; flightNumber: string | null };

export type SnapshotListener = (snapshot: TrackingSnapshot) => void;

interface FetchJob {
  trackingId: number;
  flightNumber: string;
  source: SourceKind;
  key: string;
}

type JobOutcome =
  | { source: 'position'; outcome: FetchOutcome<PositionRecord> }
  | { source: 'schedule'; outcome: FetchOutcome<ScheduleRecord> };

type ApplyResult = 'applied' | 'discarded';

interface JobResult {
  outcome: FetchOutcome<PositionRecord | ScheduleRecord>;
  applied: ApplyResult;
}

const FAILURE_STATES: Record<ErrorKind, SourceState> = {
  NotFound: 'notFound',
  RateLimited: 'rateLimited',
  Unavailable: 'unavailable',
  ConfigError: 'disabled',
};

const isFailureState = (state: SourceState): boolean => (
  state === 'notFound' || state === 'rateLimited' || state === 'unavailable' || state === 'disabled'
);

const disabledIndicator = (previous: SourceIndicator): SourceIndicator => ({
  ...previous,
  state: 'disabled',
  lastError: previous.lastError ?? 'Schedule source disabled',
});

/**
 * Drives refresh cycles over the tracked flights.
 *
 * A cycle fans out one position fetch and one schedule fetch per flight
 * through a bounded pool and applies each outcome the moment it settles,
 * so the snapshot reflects new data without waiting for the slowest
 * upstream. Only this class mutates the TrackingSet.
 *
 * A flight added mid-cycle is fetched out of band right away and joins
 * regular cycles from the next one. Outcomes for a removed flight are
 * dropped by tracking id.
 */
export class TrackingOrchestrator {
  private readonly positionFetcher: SourceFetcher<PositionRecord>;

  private readonly scheduleFetcher: SourceFetcher<ScheduleRecord> | null;

  private readonly history: TrackingHistory | null;

  private readonly refreshIntervalMs: number;

  private readonly pool: TaskPool;

  private readonly trackingSet: TrackingSet;

  private readonly listeners = new Set<SnapshotListener>();

  private phase: OrchestratorPhase = 'Idle';

  private currentCycle: Promise<RefreshSummary> | null = null;

  private refreshTimer: NodeJS.Timeout | null = null;

  private closed = false;

  private lastRefreshAt: number | null = null;

  constructor(options: TrackingOrchestratorOptions) {
    this.positionFetcher = options.positionFetcher;
    this.scheduleFetcher = options.scheduleFetcher;
    this.history = options.history ?? null;
    this.refreshIntervalMs = options.refreshIntervalMs ?? DEFAULT_REFRESH_INTERVAL_MS;
    this.pool = new TaskPool(options.concurrency ?? DEFAULT_FETCH_CONCURRENCY);
    this.trackingSet = options.trackingSet ?? new TrackingSet();
  }

  start(): void {
    this.closed = false;
    if (this.refreshTimer) {
      return;
    }
    this.refreshTimer = setInterval(() => {
      this.refresh('timer').catch((error: unknown) => {
        logger.error('Scheduled refresh failed', { error: errorMessage(error) });
      });
    }, this.refreshIntervalMs);
    this.refreshTimer.unref?.();
    logger.info('Tracking orchestrator started', {
      refreshIntervalMs: this.refreshIntervalMs,
      concurrency: this.pool.getConcurrency(),
      scheduleEnabled: this.isScheduleEnabled(),
    });
  }

  /**
   * Stops the timer and stops applying outcomes. In-flight fetches are
   * left to finish on their own; nothing waits for them.
   */
  stop(): void {
    if (this.refreshTimer) {
      clearInterval(this.refreshTimer);
      this.refreshTimer = null;
    }
    this.closed = true;
    logger.info('Tracking orchestrator stopped');
  }

  isScheduleEnabled(): boolean {
    return this.scheduleFetcher !== null && this.scheduleFetcher.isEnabled();
  }

  getPhase(): OrchestratorPhase {
    return this.phase;
  }

  subscribe(listener: SnapshotListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  snapshot(): TrackingSnapshot {
    return {
      phase: this.phase,
      flights: structuredClone(this.trackingSet.list()),
      selectedIndex: this.trackingSet.getSelectedIndex(),
      scheduleEnabled: this.isScheduleEnabled(),
      lastRefreshAt: this.lastRefreshAt,
    };
  }

  addFlight(input: string): AddFlightResult {
    const flightNumber = normalizeFlightNumber(input);
    if (!flightNumber) {
      return { ok: false, reason: 'empty', flightNumber: null };
    }

    const entry = this.trackingSet.add(createFlight(flightNumber));
    if (!entry) {
      logger.debug('Flight already tracked', { flightNumber });
      return { ok: false, reason: 'duplicate', flightNumber };
    }

    if (!this.isScheduleEnabled()) {
      this.trackingSet.update(entry.trackingId, (current) => ({
        ...current,
        schedule: disabledIndicator(current.schedule),
      }));
    }

    this.history?.record(flightNumber);
    logger.info('Tracking flight', { flightNumber, icaoCallsign: entry.flight.icaoCallsign });
    this.notify();

    const initialFetch = this.runJobs(this.jobsFor([entry])).then(() => undefined);
    const added = this.trackingSet.getByTrackingId(entry.trackingId) ?? entry;
    return { ok: true, flight: structuredClone(added), initialFetch };
  }

  /**
   * Returns the removed flight number, or null when it was not tracked.
   */
  removeFlight(input: string): string | null {
    const flightNumber = normalizeFlightNumber(input);
    if (!flightNumber || !this.trackingSet.remove(flightNumber)) {
      return null;
    }
    logger.info('Stopped tracking flight', { flightNumber });
    this.notify();
    return flightNumber;
  }

  removeSelected(): string | null {
    const removed = this.trackingSet.removeSelected();
    if (!removed) {
      return null;
    }
    this.notify();
    return removed.flight.flightNumber;
  }

  selectNext(): void {
    this.trackingSet.selectNext();
    this.notify();
  }

  selectPrevious(): void {
    this.trackingSet.selectPrevious();
    this.notify();
  }

  select(index: number): boolean {
    const selected = this.trackingSet.select(index);
    if (selected) {
      this.notify();
    }
    return selected;
  }

  /**
   * Runs a refresh cycle. While one is running, callers share its result
   * instead of starting another.
   */
  refresh(trigger: RefreshTrigger = 'user'): Promise<RefreshSummary> {
    if (this.currentCycle) {
      return this.currentCycle;
    }
    this.currentCycle = this.runCycle(trigger).finally(() => {
      this.currentCycle = null;
    });
    return this.currentCycle;
  }

  private async runCycle(trigger: RefreshTrigger): Promise<RefreshSummary> {
    const startedAt = Date.now();
    this.phase = 'Refreshing';
    this.lastRefreshAt = startedAt;

    if (!this.isScheduleEnabled()) {
      this.markScheduleDisabled();
    }

    const jobs = this.jobsFor(this.trackingSet.list());
    this.notify();

    const summary: RefreshSummary = {
      trigger,
      tasks: jobs.length,
      fresh: 0,
      cacheHit: 0,
      failed: 0,
      discarded: 0,
      durationMs: 0,
    };

    const results = await this.runJobs(jobs);
    results.forEach(({ outcome, applied }) => {
      if (applied === 'discarded') {
        summary.discarded += 1;
      } else if (outcome.kind === 'fresh') {
        summary.fresh += 1;
      } else if (outcome.kind === 'cacheHit') {
        summary.cacheHit += 1;
      } else {
        summary.failed += 1;
      }
    });

    summary.durationMs = Date.now() - startedAt;
    this.phase = 'Idle';
    this.notify();

    if (jobs.length > 0) {
      logger.info('Refresh cycle completed', { ...summary });
    }
    return summary;
  }

  private jobsFor(entries: readonly TrackedFlight[]): FetchJob[] {
    const scheduleEnabled = this.isScheduleEnabled();
    const jobs: FetchJob[] = [];
    entries.forEach((entry) => {
      const { trackingId, flight } = entry;
      jobs.push({
        trackingId,
        flightNumber: flight.flightNumber,
        source: 'position',
        key: flight.icaoCallsign,
      });
      if (scheduleEnabled) {
        jobs.push({
          trackingId,
          flightNumber: flight.flightNumber,
          source: 'schedule',
          key: flight.flightNumber,
        });
      }
    });
    return jobs;
  }

  private runJobs(jobs: FetchJob[]): Promise<JobResult[]> {
    return Promise.all(jobs.map((job) => this.pool
      .run(() => this.fetchJob(job))
      .then((result) => ({ outcome: result.outcome, applied: this.applyOutcome(job, result) }))));
  }

  private async fetchJob(job: FetchJob): Promise<JobOutcome> {
    try {
      if (job.source === 'position') {
        return { source: 'position', outcome: await this.positionFetcher.fetch(job.key) };
      }
      if (!this.scheduleFetcher) {
        return {
          source: 'schedule',
          outcome: { kind: 'failed', error: 'ConfigError', message: 'Schedule source not configured' },
        };
      }
      return { source: 'schedule', outcome: await this.scheduleFetcher.fetch(job.key) };
    } catch (error) {
      // Fetchers report failures as outcomes; a throw here must still not stop the cycle
      logger.error('Fetcher threw unexpectedly', {
        source: job.source,
        flightNumber: job.flightNumber,
        error: errorMessage(error),
      });
      return {
        source: job.source,
        outcome: { kind: 'failed', error: 'Unavailable', message: errorMessage(error) },
      };
    }
  }

  private applyOutcome(job: FetchJob, result: JobOutcome): ApplyResult {
    if (this.closed) {
      return 'discarded';
    }

    const now = Date.now();
    const applied = this.trackingSet.update(job.trackingId, (entry) => {
      const next: TrackedFlight = { ...entry };
      const { outcome } = result;
      const previous = entry[result.source];

      if (outcome.kind === 'failed') {
        next[result.source] = {
          state: FAILURE_STATES[outcome.error],
          lastSuccessAt: previous.lastSuccessAt,
          lastError: outcome.message,
        };
      } else {
        next[result.source] = {
          state: outcome.kind === 'fresh' ? 'fresh' : 'cached',
          lastSuccessAt: now,
          lastError: null,
        };
      }

      if (result.source === 'position' && result.outcome.kind !== 'failed') {
        next.flight = applyPosition(entry.flight, result.outcome.record);
      } else if (result.source === 'schedule' && result.outcome.kind !== 'failed') {
        next.flight = applySchedule(entry.flight, result.outcome.record);
      }

      next.stale = isFailureState(next.position.state)
        && isFailureState(next.schedule.state)
        && (next.position.lastSuccessAt !== null || next.schedule.lastSuccessAt !== null);
      return next;
    });

    if (!applied) {
      logger.debug('Discarding outcome for untracked flight', {
        flightNumber: job.flightNumber,
        source: job.source,
      });
      return 'discarded';
    }

    if (result.source === 'schedule' && result.outcome.kind !== 'failed') {
      const updated = this.trackingSet.getByTrackingId(job.trackingId);
      const route = updated ? routeLabel(updated.flight) : null;
      if (route) {
        this.history?.updateRoute(job.flightNumber, route);
      }
    }
    this.notify();
    return 'applied';
  }

  private markScheduleDisabled(): void {
    this.trackingSet.list().forEach((entry) => {
      if (entry.schedule.state !== 'disabled') {
        this.trackingSet.update(entry.trackingId, (current) => ({
          ...current,
          schedule: disabledIndicator(current.schedule),
        }));
      }
    });
  }

  private notify(): void {
    if (this.closed || this.listeners.size === 0) {
      return;
    }
    const snapshot = this.snapshot();
    this.listeners.forEach((listener) => {
      try {
        listener(snapshot);
      } catch (error) {
        logger.error('Snapshot listener failed', { error: errorMessage(error) });
      }
    });
  }
}
