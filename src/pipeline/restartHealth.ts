import type { IngestorState, PipelineHealth } from '../types.js';

export type RestartSeverityLevel = 'none' | 'warning' | 'critical';

export type RestartStats = {
  watchdogRestarts: number;
  watchdogBackoffMs: number;
};

export type RestartSeverityThresholds = Record<Exclude<RestartSeverityLevel, 'none'>, RestartStats>;

export type RestartSeverityEvaluation = {
  severity: RestartSeverityLevel;
  triggeredBy: 'watchdog-restarts' | 'watchdog-backoff' | null;
  threshold: number | null;
  actual: number;
};

export const DEFAULT_RESTART_SEVERITY_THRESHOLDS: RestartSeverityThresholds = {
  warning: { watchdogRestarts: 3, watchdogBackoffMs: 60_000 },
  critical: { watchdogRestarts: 6, watchdogBackoffMs: 180_000 }
};

const LEVELS = ['critical', 'warning'] as const;

/**
 * Grades a camera's watchdog restart history. Restart count is checked
 * before accumulated backoff at each level.
 */
export function evaluateRestartSeverity(
  stats: RestartStats,
  thresholds: RestartSeverityThresholds = DEFAULT_RESTART_SEVERITY_THRESHOLDS
): RestartSeverityEvaluation {
  for (const level of LEVELS) {
    const limit = thresholds[level];
    if (stats.watchdogRestarts >= limit.watchdogRestarts) {
      return {
        severity: level,
        triggeredBy: 'watchdog-restarts',
        threshold: limit.watchdogRestarts,
        actual: stats.watchdogRestarts
      };
    }
    if (stats.watchdogBackoffMs >= limit.watchdogBackoffMs) {
      return {
        severity: level,
        triggeredBy: 'watchdog-backoff',
        threshold: limit.watchdogBackoffMs,
        actual: stats.watchdogBackoffMs
      };
    }
  }

  return { severity: 'none', triggeredBy: null, threshold: null, actual: stats.watchdogBackoffMs };
}

export function describeRestartSeverity(evaluation: RestartSeverityEvaluation): string | null {
  if (evaluation.severity === 'none' || evaluation.threshold === null) {
    return null;
  }
  if (evaluation.triggeredBy === 'watchdog-restarts') {
    return `watchdog restarts ${evaluation.actual} >= ${evaluation.threshold}`;
  }
  return `watchdog backoff ${evaluation.actual}ms >= ${evaluation.threshold}ms`;
}

export type PipelineHealthInput = {
  storageFailed: boolean;
  ingestorState: IngestorState;
  restarts: RestartSeverityEvaluation;
};

export type PipelineHealthReport = {
  health: PipelineHealth;
  reason: string | null;
};

/** failed beats degraded; an unavailable stream or restart warning degrades. */
export function derivePipelineHealth(input: PipelineHealthInput): PipelineHealthReport {
  if (input.storageFailed) {
    return { health: 'failed', reason: 'recording storage failed' };
  }
  if (input.ingestorState === 'unavailable') {
    return { health: 'degraded', reason: 'stream unavailable' };
  }
  const restartReason = describeRestartSeverity(input.restarts);
  if (restartReason) {
    return { health: 'degraded', reason: restartReason };
  }
  return { health: 'ok', reason: null };
}
