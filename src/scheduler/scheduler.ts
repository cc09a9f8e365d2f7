/**
 * News Reader — Refresh Scheduler
 *
 * Drives the ingestion pipeline on a fixed interval:
 * 1. Fetch every eligible source concurrently (bounded, per-source timeout)
 * 2. Normalize each source's raw items
 * 3. Reconcile the whole batch against one store snapshot
 * 4. Apply inserts and updates, then evict by retention
 * 5. Flush changes to persistence, when configured
 *
 * One source's failure never cancels or delays another, and a cycle
 * never rejects.
 */

import pLimit from 'p-limit';
import { nanoid } from 'nanoid';
import { normalizeBatch, reconcile, type SourceAdapter } from '../feeds';
import type { ArticleStore, FlushResult } from '../cache/store';
import { SourceHealthTracker } from './source-health';
import { FetchError, errorMessage, type FetchErrorKind } from '../lib/errors';
import { logger } from '../lib/logger';
import type { NormalizedArticle, SourceHealthSnapshot } from '../types';

// ============================================================
// TYPES
// ============================================================

export interface SchedulerOptions {
  /** Delay between the end of one cycle and the start of the next */
  intervalMs: number;
  /** Maximum sources fetched at once */
  concurrency: number;
  sourceTimeoutMs: number;
  /** Articles not seen for this long are evicted */
  retentionMs: number;
  /** Consecutive failures before a source is degraded */
  failureThreshold: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
  maxSummaryLength: number;
  /** Source ids in priority order (default: adapter order) */
  sourcePriority?: string[];
  /** Enables near-duplicate merging at this title similarity */
  nearDuplicateThreshold?: number;
}

export const DEFAULT_SCHEDULER_OPTIONS: SchedulerOptions = {
  intervalMs: 5 * 60 * 1000,
  concurrency: 4,
  sourceTimeoutMs: 10_000,
  retentionMs: 48 * 60 * 60 * 1000,
  failureThreshold: 3,
  backoffBaseMs: 60_000,
  backoffMaxMs: 60 * 60 * 1000,
  maxSummaryLength: 500,
};

export type SourceCycleStatus = 'ok' | 'failed' | 'skipped';

export interface SourceCycleStats {
  sourceId: string;
  status: SourceCycleStatus;
  fetched: number;
  normalized: number;
  inserted: number;
  updated: number;
  duplicates: number;
  /** Malformed entries skipped by the adapter plus items dropped by the normalizer */
  skippedMalformed: number;
  /** 1 when the fetch failed as a whole */
  hardFailed: number;
  errorKind?: FetchErrorKind;
  error?: string;
  durationMs: number;
}

export interface CycleTotals {
  fetched: number;
  normalized: number;
  inserted: number;
  updated: number;
  duplicates: number;
  skippedMalformed: number;
  failedSources: number;
  skippedSources: number;
}

export interface CycleReport {
  cycleId: string;
  startedAt: string;
  completedAt: string;
  durationMs: number;
  sources: SourceCycleStats[];
  totals: CycleTotals;
  evicted: number;
  storeSize: number;
  persisted?: FlushResult;
  persistenceError?: string;
  /** Set only when applying the batch itself failed */
  error?: string;
}

export interface SchedulerDeps {
  adapters: SourceAdapter[];
  store: ArticleStore;
  options?: Partial<SchedulerOptions>;
  /** Clock, injectable for tests */
  now?: () => Date;
  onCycleComplete?: (report: CycleReport) => void;
}

interface SourceOutcome {
  stats: SourceCycleStats;
  articles: NormalizedArticle[];
}

function emptyStats(sourceId: string, status: SourceCycleStatus): SourceCycleStats {
  return {
    sourceId,
    status,
    fetched: 0,
    normalized: 0,
    inserted: 0,
    updated: 0,
    duplicates: 0,
    skippedMalformed: 0,
    hardFailed: 0,
    durationMs: 0,
  };
}

function sumTotals(sources: SourceCycleStats[]): CycleTotals {
  const totals: CycleTotals = {
    fetched: 0,
    normalized: 0,
    inserted: 0,
    updated: 0,
    duplicates: 0,
    skippedMalformed: 0,
    failedSources: 0,
    skippedSources: 0,
  };

  for (const s of sources) {
    totals.fetched += s.fetched;
    totals.normalized += s.normalized;
    totals.inserted += s.inserted;
    totals.updated += s.updated;
    totals.duplicates += s.duplicates;
    totals.skippedMalformed += s.skippedMalformed;
    if (s.status === 'failed') totals.failedSources++;
    if (s.status === 'skipped') totals.skippedSources++;
  }

  return totals;
}

// ============================================================
// SCHEDULER
// ============================================================

export class Scheduler {
  private readonly adapters: SourceAdapter[];
  private readonly store: ArticleStore;
  private readonly options: SchedulerOptions;
  private readonly sourcePriority: string[];
  private readonly now: () => Date;
  private readonly onCycleComplete?: (report: CycleReport) => void;
  private readonly health: SourceHealthTracker;
  private readonly logger = logger.child({ component: 'scheduler' });

  private running = false;
  private timer: NodeJS.Timeout | undefined;
  private loop: Promise<void> | undefined;
  private inFlight: Promise<CycleReport> | undefined;
  private lastReport: CycleReport | undefined;

  constructor(deps: SchedulerDeps) {
    this.adapters = [...deps.adapters];
    this.store = deps.store;
    this.options = { ...DEFAULT_SCHEDULER_OPTIONS, ...deps.options };
    this.sourcePriority = this.options.sourcePriority ?? this.adapters.map(a => a.id);
    this.now = deps.now ?? (() => new Date());
    this.onCycleComplete = deps.onCycleComplete;

    this.health = new SourceHealthTracker({
      failureThreshold: this.options.failureThreshold,
      backoffBaseMs: this.options.backoffBaseMs,
      backoffMaxMs: this.options.backoffMaxMs,
    });
    for (const adapter of this.adapters) {
      this.health.register(adapter.id);
    }
  }

  get isRunning(): boolean {
    return this.running;
  }

  /**
   * Run a cycle now, then one every `intervalMs` after each completes.
   */
  start(): void {
    if (this.running) return;
    this.running = true;

    this.logger.info('Scheduler started', {
      sources: this.adapters.length,
      intervalMs: this.options.intervalMs,
    });

    this.loop = this.tick();
  }

  /**
   * Cancel the next tick and wait for the in-flight cycle to finish.
   */
  async stop(): Promise<void> {
    const wasRunning = this.running;
    this.running = false;

    clearTimeout(this.timer);
    this.timer = undefined;

    await this.loop;
    this.loop = undefined;
    // A manual runCycle may still be in flight
    await this.inFlight;

    if (wasRunning) this.logger.info('Scheduler stopped');
  }

  /**
   * Run one cycle. Joins the in-flight cycle if there is one.
   */
  runCycle(): Promise<CycleReport> {
    if (!this.inFlight) {
      this.inFlight = this.executeCycle().finally(() => {
        this.inFlight = undefined;
      });
    }
    return this.inFlight;
  }

  getSourceHealth(): SourceHealthSnapshot[] {
    return this.health.snapshot();
  }

  getLastReport(): CycleReport | undefined {
    return this.lastReport;
  }

  reset(): void {
    this.health.reset();
    this.lastReport = undefined;
  }

  private async tick(): Promise<void> {
    await this.runCycle();
    if (!this.running) return;

    this.timer = setTimeout(() => {
      this.loop = this.tick();
    }, this.options.intervalMs);
  }

  // ============================================================
  // CYCLE
  // ============================================================

  private async executeCycle(): Promise<CycleReport> {
    const cycleId = nanoid(10);
    const started = this.now();
    const log = this.logger.child({ cycleId });

    const eligible: SourceAdapter[] = [];
    const skipped: SourceCycleStats[] = [];
    for (const adapter of this.adapters) {
      if (this.health.isEligible(adapter.id, started)) {
        eligible.push(adapter);
      } else {
        skipped.push(emptyStats(adapter.id, 'skipped'));
      }
    }

    log.debug('Cycle started', { eligible: eligible.length, skipped: skipped.length });

    // Phase 1: Fetch and normalize, isolated per source
    const limit = pLimit(Math.max(1, this.options.concurrency));
    const outcomes = await Promise.all(
      eligible.map(adapter => limit(() => this.fetchSource(adapter, started)))
    );

    const statsById = new Map<string, SourceCycleStats>();
    for (const outcome of outcomes) statsById.set(outcome.stats.sourceId, outcome.stats);
    for (const stats of skipped) statsById.set(stats.sourceId, stats);

    const report: CycleReport = {
      cycleId,
      startedAt: started.toISOString(),
      completedAt: started.toISOString(),
      durationMs: 0,
      sources: this.adapters.flatMap(a => statsById.get(a.id) ?? []),
      totals: sumTotals([]),
      evicted: 0,
      storeSize: this.store.size(),
    };

    // Phase 2: Reconcile and apply in one synchronous step
    try {
      const appliedAt = this.now();
      const batch = outcomes.flatMap(o => o.articles);
      const result = reconcile(batch, this.store.snapshot(), {
        now: appliedAt,
        sourcePriority: this.sourcePriority,
        nearDuplicateThreshold: this.options.nearDuplicateThreshold,
      });

      for (const decision of result.toInsert) {
        this.store.upsert(decision.article);
        const stats = statsById.get(decision.primarySourceId);
        if (stats) stats.inserted++;
      }
      for (const decision of result.toUpdate) {
        this.store.upsert(decision.article);
        const stats = statsById.get(decision.primarySourceId);
        if (stats) stats.updated++;
      }
      for (const skippedItem of result.toSkip) {
        const stats = statsById.get(skippedItem.item.sourceId);
        if (stats) stats.duplicates++;
      }

      const cutoff = new Date(appliedAt.getTime() - this.options.retentionMs);
      report.evicted = this.store.evictOlderThan(cutoff).length;
    } catch (error) {
      report.error = errorMessage(error);
      log.error('Cycle apply failed', { error: report.error });
    }

    // Phase 3: Persist
    if (this.store.persistent) {
      try {
        report.persisted = await this.store.flush();
      } catch (error) {
        report.persistenceError = errorMessage(error);
        log.error('Persistence flush failed', {
          error: report.persistenceError,
          pending: this.store.pendingChanges(),
        });
      }
    }

    const completed = this.now();
    report.completedAt = completed.toISOString();
    report.durationMs = completed.getTime() - started.getTime();
    report.totals = sumTotals(report.sources);
    report.storeSize = this.store.size();

    log.info('Cycle completed', {
      sources: report.sources.length,
      failed: report.totals.failedSources,
      skipped: report.totals.skippedSources,
      fetched: report.totals.fetched,
      inserted: report.totals.inserted,
      updated: report.totals.updated,
      duplicates: report.totals.duplicates,
      malformed: report.totals.skippedMalformed,
      evicted: report.evicted,
      storeSize: report.storeSize,
      durationMs: report.durationMs,
    });

    this.lastReport = report;
    this.notify(report);

    return report;
  }

  private async fetchSource(adapter: SourceAdapter, cycleStart: Date): Promise<SourceOutcome> {
    const stats = emptyStats(adapter.id, 'ok');
    const startTime = Date.now();

    try {
      const fetched = await adapter.fetch(this.options.sourceTimeoutMs);
      const normalized = normalizeBatch(fetched.items, {
        now: cycleStart,
        maxSummaryLength: this.options.maxSummaryLength,
        baseUrl: adapter.endpoint,
      });

      stats.fetched = fetched.items.length;
      stats.normalized = normalized.articles.length;
      stats.skippedMalformed = fetched.softErrors + normalized.dropped;
      stats.durationMs = Date.now() - startTime;

      this.health.recordSuccess(adapter.id, this.now());
      return { stats, articles: normalized.articles };
    } catch (error) {
      const failure =
        error instanceof FetchError
          ? error
          : new FetchError('unreachable', adapter.id, errorMessage(error), { cause: error });

      stats.status = 'failed';
      stats.hardFailed = 1;
      stats.errorKind = failure.kind;
      stats.error = failure.message;
      stats.durationMs = Date.now() - startTime;

      this.health.recordFailure(adapter.id, failure, this.now());
      return { stats, articles: [] };
    }
  }

  private notify(report: CycleReport): void {
    if (!this.onCycleComplete) return;
    try {
      this.onCycleComplete(report);
    } catch (error) {
      this.logger.error('Cycle listener failed', { cycleId: report.cycleId, error: errorMessage(error) });
    }
  }
}
