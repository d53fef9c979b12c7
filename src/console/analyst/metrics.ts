/**
 * Query Metrics
 *
 * Per-process counters for submitted queries, reported by analyst_status
 * and the CLI status command. Reset on restart.
 */

import type { ExchangeStatus, QueryErrorCategory } from '../../common/types.js';

export interface AnalystMetrics {
  totalQueries: number;
  successfulQueries: number;
  failedQueries: number;
  failuresByCategory: Record<QueryErrorCategory, number>;
  /** Retries actually performed, by the category that triggered them */
  retriesByCategory: Record<QueryErrorCategory, number>;
  upstreamCalls: number;
  totalDurationMs: number;
  avgDurationMs: number;
  minDurationMs: number;
  maxDurationMs: number;
  lastQueryAt: string | null;
}

function zeroByCategory(): Record<QueryErrorCategory, number> {
  return {
    DataUnavailable: 0,
    RateLimited: 0,
    Timeout: 0,
    ContextTooLarge: 0,
    MalformedOutput: 0,
    UpstreamUnavailable: 0,
  };
}

function createEmptyMetrics(): AnalystMetrics {
  return {
    totalQueries: 0,
    successfulQueries: 0,
    failedQueries: 0,
    failuresByCategory: zeroByCategory(),
    retriesByCategory: zeroByCategory(),
    upstreamCalls: 0,
    totalDurationMs: 0,
    avgDurationMs: 0,
    minDurationMs: Infinity,
    maxDurationMs: 0,
    lastQueryAt: null,
  };
}

let metrics: AnalystMetrics = createEmptyMetrics();

/**
 * Record the terminal outcome of one query
 */
export function recordQueryOutcome(
  status: ExchangeStatus,
  category: QueryErrorCategory | null,
  attempts: number,
  durationMs: number
): void {
  metrics.totalQueries++;
  metrics.upstreamCalls += attempts;
  if (status === 'success') {
    metrics.successfulQueries++;
  } else {
    metrics.failedQueries++;
    if (category !== null) {
      metrics.failuresByCategory[category]++;
    }
  }

  metrics.totalDurationMs += durationMs;
  metrics.avgDurationMs = Math.round(metrics.totalDurationMs / metrics.totalQueries);
  metrics.minDurationMs = Math.min(metrics.minDurationMs, durationMs);
  metrics.maxDurationMs = Math.max(metrics.maxDurationMs, durationMs);
  metrics.lastQueryAt = new Date().toISOString();
}

export function recordRetry(category: QueryErrorCategory): void {
  metrics.retriesByCategory[category]++;
}

/**
 * Snapshot of the current metrics
 */
export function getAnalystMetrics(): AnalystMetrics {
  return {
    ...metrics,
    failuresByCategory: { ...metrics.failuresByCategory },
    retriesByCategory: { ...metrics.retriesByCategory },
    minDurationMs: metrics.minDurationMs === Infinity ? 0 : metrics.minDurationMs,
  };
}

export function resetAnalystMetrics(): void {
  metrics = createEmptyMetrics();
}
