/**
 * News Reader — Source Health
 *
 * Consecutive-failure circuit per source. A source that keeps failing
 * is degraded and skipped until its next probe time; the backoff
 * doubles with every failed probe up to a ceiling.
 */

import type { SourceHealthSnapshot, SourceHealthStatus } from '../types';
import { logger } from '../lib/logger';

export interface SourceHealthOptions {
  failureThreshold: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
}

interface SourceState {
  consecutiveFailures: number;
  lastSuccessAt?: number;
  lastFailureAt?: number;
  lastError?: string;
  nextProbeAt?: number;
}

const log = logger.child({ component: 'source-health' });

function iso(ms: number | undefined): string | undefined {
  return ms === undefined ? undefined : new Date(ms).toISOString();
}

export class SourceHealthTracker {
  private readonly states = new Map<string, SourceState>();

  constructor(private readonly options: SourceHealthOptions) {}

  /**
   * Track a source so it shows up in snapshots before its first fetch.
   */
  register(sourceId: string): void {
    if (!this.states.has(sourceId)) {
      this.states.set(sourceId, { consecutiveFailures: 0 });
    }
  }

  status(sourceId: string): SourceHealthStatus {
    const failures = this.states.get(sourceId)?.consecutiveFailures ?? 0;
    if (failures === 0) return 'healthy';
    return failures < this.options.failureThreshold ? 'failing' : 'degraded';
  }

  /**
   * Whether the source should be fetched in a cycle starting at `now`.
   * Degraded sources are eligible again once their probe is due.
   */
  isEligible(sourceId: string, now: Date): boolean {
    const state = this.states.get(sourceId);
    if (!state || state.nextProbeAt === undefined) return true;
    return now.getTime() >= state.nextProbeAt;
  }

  /**
   * Delay before the next probe after `failures` consecutive failures.
   */
  backoffDelay(failures: number): number {
    const { failureThreshold, backoffBaseMs, backoffMaxMs } = this.options;
    const exponent = Math.max(0, failures - failureThreshold);
    return Math.min(backoffMaxMs, backoffBaseMs * 2 ** exponent);
  }

  recordSuccess(sourceId: string, at: Date): void {
    const state = this.states.get(sourceId);
    if (state && state.consecutiveFailures >= this.options.failureThreshold) {
      log.info('Source recovered', { source: sourceId, failures: state.consecutiveFailures });
    }

    this.states.set(sourceId, {
      consecutiveFailures: 0,
      lastSuccessAt: at.getTime(),
      lastFailureAt: state?.lastFailureAt,
      lastError: state?.lastError,
    });
  }

  recordFailure(sourceId: string, error: Error, at: Date): void {
    const previous = this.states.get(sourceId);
    const failures = (previous?.consecutiveFailures ?? 0) + 1;
    const degraded = failures >= this.options.failureThreshold;

    const state: SourceState = {
      consecutiveFailures: failures,
      lastSuccessAt: previous?.lastSuccessAt,
      lastFailureAt: at.getTime(),
      lastError: error.message,
      nextProbeAt: degraded ? at.getTime() + this.backoffDelay(failures) : undefined,
    };
    this.states.set(sourceId, state);

    if (degraded) {
      log.error('Source degraded', {
        source: sourceId,
        failures,
        nextProbeAt: iso(state.nextProbeAt),
        error: error.message,
      });
    }
  }

  snapshot(): SourceHealthSnapshot[] {
    return [...this.states.entries()].map(([sourceId, state]) => ({
      sourceId,
      status: this.status(sourceId),
      consecutiveFailures: state.consecutiveFailures,
      lastSuccessAt: iso(state.lastSuccessAt),
      lastFailureAt: iso(state.lastFailureAt),
      lastError: state.lastError,
      nextProbeAt: iso(state.nextProbeAt),
    }));
  }

  /**
   * Clear all counters. Registered sources stay registered.
   */
  reset(): void {
    for (const sourceId of this.states.keys()) {
      this.states.set(sourceId, { consecutiveFailures: 0 });
    }
  }
}
