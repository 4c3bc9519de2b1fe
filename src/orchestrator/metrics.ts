/**
 * Run metrics for provider attempts
 *
 * In-memory counters of attempt outcomes, overall and per provider. Metrics are
 * per-process and are logged by the CLI at the end of a run.
 */

import type { AttemptStatus, AttemptSummary } from '../types.js';

export interface AttemptCounts {
  total: number;
  success: number;
  providerFailed: number;
  deadlineExceeded: number;
  iterationLimit: number;
  failed: number;
  totalIterations: number;
  totalDurationMs: number;
}

export interface ComputedMetrics extends AttemptCounts {
  successRate: number; // success / total (0-1)
  avgIterationsPerAttempt: number;
  avgDurationMs: number;
  byProvider: Record<string, AttemptCounts>;
}

const STATUS_FIELD: Record<AttemptStatus, keyof AttemptCounts> = {
  success: 'success',
  provider_failed: 'providerFailed',
  deadline_exceeded: 'deadlineExceeded',
  iteration_limit: 'iterationLimit',
  failed: 'failed',
};

function emptyCounts(): AttemptCounts {
  return {
    total: 0,
    success: 0,
    providerFailed: 0,
    deadlineExceeded: 0,
    iterationLimit: 0,
    failed: 0,
    totalIterations: 0,
    totalDurationMs: 0,
  };
}

function addAttempt(counts: AttemptCounts, attempt: AttemptSummary): void {
  counts.total++;
  counts[STATUS_FIELD[attempt.status]]++;
  counts.totalIterations += attempt.iterations;
  counts.totalDurationMs += attempt.durationMs;
}

export class MetricsCollector {
  private overall: AttemptCounts = emptyCounts();
  private providers = new Map<string, AttemptCounts>();

  recordAttempt(attempt: AttemptSummary): void {
    addAttempt(this.overall, attempt);
    let counts = this.providers.get(attempt.provider);
    if (!counts) {
      counts = emptyCounts();
      this.providers.set(attempt.provider, counts);
    }
    addAttempt(counts, attempt);
  }

  /**
   * All computed values are 0 when nothing has been recorded.
   */
  getMetrics(): ComputedMetrics {
    const { total } = this.overall;
    const byProvider: Record<string, AttemptCounts> = {};
    for (const [name, counts] of this.providers) {
      byProvider[name] = { ...counts };
    }

    return {
      ...this.overall,
      successRate: total > 0 ? this.overall.success / total : 0,
      avgIterationsPerAttempt: total > 0 ? this.overall.totalIterations / total : 0,
      avgDurationMs: total > 0 ? this.overall.totalDurationMs / total : 0,
      byProvider,
    };
  }

  reset(): void {
    this.overall = emptyCounts();
    this.providers.clear();
  }
}
