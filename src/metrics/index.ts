import { performance } from 'node:perf_hooks';
import pino from 'pino';
import { evaluateRestartSeverity, type RestartSeverityLevel } from '../pipeline/restartHealth.js';
import type { EventOrigin } from '../types.js';

type CounterMap = Record<string, number>;

type LatencyStats = {
  count: number;
  totalMs: number;
  minMs: number;
  maxMs: number;
  averageMs: number;
};

export type RestartMeta = {
  attempt?: number;
  delayMs?: number;
  errorCode?: string | number | null;
  exitCode?: number | null;
  signal?: NodeJS.Signals | null;
  at?: number;
};

type RestartRecord = {
  reason: string;
  attempt: number | null;
  delayMs: number | null;
  errorCode: string | number | null;
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  at: string;
};

type CameraState = {
  packets: number;
  bytes: number;
  lastPacketAt: number | null;
  drops: Map<string, number>;
  rejectedPackets: number;
  restarts: number;
  restartsByReason: Map<string, number>;
  watchdogRestarts: number;
  watchdogBackoffMs: number;
  totalRestartDelayMs: number;
  lastRestart: RestartRecord | null;
  transportFallbacks: number;
  lastTransport: string | null;
  bufferEvictions: number;
  bufferDegradedEpisodes: number;
  segments: number;
  segmentBytes: number;
  lastSegmentAt: number | null;
  sessions: { opened: number; extended: number; closed: number };
  storageFailures: number;
};

export type CameraMetricsSnapshot = {
  packets: number;
  bytes: number;
  lastPacketAt: string | null;
  drops: CounterMap;
  rejectedPackets: number;
  restarts: number;
  restartsByReason: CounterMap;
  watchdogRestarts: number;
  watchdogBackoffMs: number;
  totalRestartDelayMs: number;
  lastRestart: RestartRecord | null;
  transportFallbacks: number;
  lastTransport: string | null;
  buffer: { evictions: number; degradedEpisodes: number };
  segments: { finalized: number; bytes: number; lastFinalizedAt: string | null };
  eventSessions: { opened: number; extended: number; closed: number };
  storageFailures: number;
  health: { severity: RestartSeverityLevel };
};

export type RetentionRunContext = {
  removed: number;
  kept: number;
  freedBytes: number;
  dryRun: boolean;
};

export type MetricsSnapshot = {
  createdAt: string;
  logs: {
    byLevel: CounterMap;
    currentLevel: string;
    levelChanges: CounterMap;
    lastErrorAt: string | null;
    lastErrorMessage: string | null;
  };
  pipelines: {
    restarts: number;
    byReason: CounterMap;
    lastRestartAt: string | null;
    byCamera: Record<string, CameraMetricsSnapshot>;
  };
  events: {
    dispatched: number;
    duplicates: number;
    rejected: number;
    byType: CounterMap;
    byOrigin: CounterMap;
    lastDispatchedAt: string | null;
  };
  retention: {
    runs: number;
    lastRunAt: string | null;
    removed: number;
    kept: number;
    freedBytes: number;
    warnings: number;
  };
  latencies: Record<string, LatencyStats>;
};

export type PrometheusOptions = {
  prefix?: string;
  labels?: Record<string, string>;
};

export type DispatchOutcome = 'dispatched' | 'duplicate' | 'rejected';

function createCameraState(): CameraState {
  return {
    packets: 0,
    bytes: 0,
    lastPacketAt: null,
    drops: new Map(),
    rejectedPackets: 0,
    restarts: 0,
    restartsByReason: new Map(),
    watchdogRestarts: 0,
    watchdogBackoffMs: 0,
    totalRestartDelayMs: 0,
    lastRestart: null,
    transportFallbacks: 0,
    lastTransport: null,
    bufferEvictions: 0,
    bufferDegradedEpisodes: 0,
    segments: 0,
    segmentBytes: 0,
    lastSegmentAt: null,
    sessions: { opened: 0, extended: 0, closed: 0 },
    storageFailures: 0
  };
}

const WATCHDOG_REASONS = new Set(['watchdog-timeout', 'stream-idle', 'start-timeout']);

class MetricsRegistry {
  private readonly logLevelCounters = new Map<string, number>();
  private readonly logLevelChangeCounters = new Map<string, number>();
  private currentLogLevel = 'info';
  private lastErrorAt: number | null = null;
  private lastErrorMessage: string | null = null;
  private readonly cameras = new Map<string, CameraState>();
  private readonly restartReasons = new Map<string, number>();
  private totalRestarts = 0;
  private lastRestartAt: number | null = null;
  private dispatched = 0;
  private duplicates = 0;
  private rejected = 0;
  private readonly eventsByType = new Map<string, number>();
  private readonly eventsByOrigin = new Map<string, number>();
  private lastDispatchedAt: number | null = null;
  private retentionRuns = 0;
  private lastRetentionRunAt: number | null = null;
  private retentionTotals = { removed: 0, kept: 0, freedBytes: 0, warnings: 0 };
  private readonly latencyStats = new Map<string, { count: number; totalMs: number; minMs: number; maxMs: number }>();
  private readonly resetListeners = new Set<() => void>();

  reset() {
    this.logLevelCounters.clear();
    this.logLevelChangeCounters.clear();
    this.currentLogLevel = 'info';
    this.lastErrorAt = null;
    this.lastErrorMessage = null;
    this.cameras.clear();
    this.restartReasons.clear();
    this.totalRestarts = 0;
    this.lastRestartAt = null;
    this.dispatched = 0;
    this.duplicates = 0;
    this.rejected = 0;
    this.eventsByType.clear();
    this.eventsByOrigin.clear();
    this.lastDispatchedAt = null;
    this.retentionRuns = 0;
    this.lastRetentionRunAt = null;
    this.retentionTotals = { removed: 0, kept: 0, freedBytes: 0, warnings: 0 };
    this.latencyStats.clear();
    for (const listener of this.resetListeners) {
      listener();
    }
  }

  onReset(listener: () => void) {
    this.resetListeners.add(listener);
    return () => {
      this.resetListeners.delete(listener);
    };
  }

  incrementLogLevel(level: string, context?: { message?: string }) {
    const normalized = level.toLowerCase();
    this.logLevelCounters.set(normalized, (this.logLevelCounters.get(normalized) ?? 0) + 1);
    if (normalized === 'error' || normalized === 'fatal') {
      this.lastErrorAt = Date.now();
      if (context?.message) {
        this.lastErrorMessage = context.message;
      }
    }
  }

  recordLogLevelChange(level: string, previous?: string | null) {
    const normalized = level.toLowerCase();
    const previousNormalized = typeof previous === 'string' ? previous.toLowerCase() : null;
    this.currentLogLevel = normalized;
    if (!previousNormalized || previousNormalized === normalized) {
      return;
    }
    this.logLevelChangeCounters.set(
      normalized,
      (this.logLevelChangeCounters.get(normalized) ?? 0) + 1
    );
  }

  recordPacket(cameraId: string, bytes: number, at = Date.now()) {
    const state = this.ensureCamera(cameraId);
    state.packets += 1;
    state.bytes += bytes;
    state.lastPacketAt = at;
  }

  recordDroppedPackets(cameraId: string, consumer: string, count = 1) {
    if (count <= 0) {
      return;
    }
    const state = this.ensureCamera(cameraId);
    state.drops.set(consumer, (state.drops.get(consumer) ?? 0) + count);
  }

  recordRejectedPacket(cameraId: string) {
    this.ensureCamera(cameraId).rejectedPackets += 1;
  }

  recordPipelineRestart(cameraId: string, reason: string, meta: RestartMeta = {}) {
    const state = this.ensureCamera(cameraId);
    const at = meta.at ?? Date.now();
    this.totalRestarts += 1;
    this.lastRestartAt = at;
    this.restartReasons.set(reason, (this.restartReasons.get(reason) ?? 0) + 1);
    state.restarts += 1;
    state.restartsByReason.set(reason, (state.restartsByReason.get(reason) ?? 0) + 1);
    const delayMs = typeof meta.delayMs === 'number' && Number.isFinite(meta.delayMs) ? meta.delayMs : null;
    if (delayMs !== null) {
      state.totalRestartDelayMs += delayMs;
    }
    if (WATCHDOG_REASONS.has(reason)) {
      state.watchdogRestarts += 1;
      state.watchdogBackoffMs += delayMs ?? 0;
    }
    state.lastRestart = {
      reason,
      attempt: meta.attempt ?? null,
      delayMs,
      errorCode: meta.errorCode ?? null,
      exitCode: meta.exitCode ?? null,
      signal: meta.signal ?? null,
      at: new Date(at).toISOString()
    };
  }

  recordTransportFallback(cameraId: string, to: string) {
    const state = this.ensureCamera(cameraId);
    state.transportFallbacks += 1;
    state.lastTransport = to;
  }

  recordBufferEviction(cameraId: string, count: number, startedEpisode: boolean) {
    const state = this.ensureCamera(cameraId);
    state.bufferEvictions += count;
    if (startedEpisode) {
      state.bufferDegradedEpisodes += 1;
    }
  }

  recordSegmentFinalized(cameraId: string, bytes: number, at = Date.now()) {
    const state = this.ensureCamera(cameraId);
    state.segments += 1;
    state.segmentBytes += bytes;
    state.lastSegmentAt = at;
  }

  recordEventSession(cameraId: string, transition: 'opened' | 'extended' | 'closed') {
    this.ensureCamera(cameraId).sessions[transition] += 1;
  }

  recordStorageFailure(cameraId: string) {
    this.ensureCamera(cameraId).storageFailures += 1;
  }

  recordDispatch(outcome: DispatchOutcome, event?: { eventType: string; origin: EventOrigin }) {
    if (outcome === 'rejected') {
      this.rejected += 1;
      return;
    }
    if (outcome === 'duplicate') {
      this.duplicates += 1;
      return;
    }
    this.dispatched += 1;
    this.lastDispatchedAt = Date.now();
    if (event) {
      this.eventsByType.set(event.eventType, (this.eventsByType.get(event.eventType) ?? 0) + 1);
      this.eventsByOrigin.set(event.origin, (this.eventsByOrigin.get(event.origin) ?? 0) + 1);
    }
  }

  recordRetentionRun(context: RetentionRunContext) {
    this.retentionRuns += 1;
    this.lastRetentionRunAt = Date.now();
    if (context.dryRun) {
      return;
    }
    this.retentionTotals = {
      ...this.retentionTotals,
      removed: this.retentionTotals.removed + context.removed,
      kept: this.retentionTotals.kept + context.kept,
      freedBytes: this.retentionTotals.freedBytes + context.freedBytes
    };
  }

  recordRetentionWarning() {
    this.retentionTotals.warnings += 1;
  }

  resetCamera(cameraId: string) {
    this.cameras.delete(cameraId);
  }

  observeLatency(metric: string, durationMs: number) {
    const current = this.latencyStats.get(metric) ?? {
      count: 0,
      totalMs: 0,
      minMs: Number.POSITIVE_INFINITY,
      maxMs: 0
    };
    this.latencyStats.set(metric, {
      count: current.count + 1,
      totalMs: current.totalMs + durationMs,
      minMs: Math.min(current.minMs, durationMs),
      maxMs: Math.max(current.maxMs, durationMs)
    });
  }

  async time<T>(metric: string, fn: () => Promise<T> | T): Promise<T> {
    const start = performance.now();
    try {
      return await fn();
    } finally {
      this.observeLatency(metric, performance.now() - start);
    }
  }

  getCameraHealth(cameraId: string) {
    const state = this.cameras.get(cameraId);
    return evaluateRestartSeverity({
      watchdogRestarts: state?.watchdogRestarts ?? 0,
      watchdogBackoffMs: state?.watchdogBackoffMs ?? 0
    });
  }

  snapshot(): MetricsSnapshot {
    const byCamera: Record<string, CameraMetricsSnapshot> = {};
    for (const [cameraId, state] of sortedEntries(this.cameras)) {
      byCamera[cameraId] = snapshotCamera(state);
    }

    const latencies: Record<string, LatencyStats> = {};
    for (const [metric, stats] of sortedEntries(this.latencyStats)) {
      latencies[metric] = {
        ...stats,
        averageMs: stats.count > 0 ? stats.totalMs / stats.count : 0
      };
    }

    return {
      createdAt: new Date().toISOString(),
      logs: {
        byLevel: mapLogLevelCounters(this.logLevelCounters),
        currentLevel: this.currentLogLevel,
        levelChanges: mapFrom(this.logLevelChangeCounters),
        lastErrorAt: toIso(this.lastErrorAt),
        lastErrorMessage: this.lastErrorMessage
      },
      pipelines: {
        restarts: this.totalRestarts,
        byReason: mapFrom(this.restartReasons),
        lastRestartAt: toIso(this.lastRestartAt),
        byCamera
      },
      events: {
        dispatched: this.dispatched,
        duplicates: this.duplicates,
        rejected: this.rejected,
        byType: mapFrom(this.eventsByType),
        byOrigin: mapFrom(this.eventsByOrigin),
        lastDispatchedAt: toIso(this.lastDispatchedAt)
      },
      retention: {
        runs: this.retentionRuns,
        lastRunAt: toIso(this.lastRetentionRunAt),
        ...this.retentionTotals
      },
      latencies
    };
  }

  exportForPrometheus(options: PrometheusOptions = {}): string {
    const prefix = sanitizePrometheusMetricName(options.prefix ?? 'camera_recorder');
    const baseLabels = options.labels ?? {};
    const lines: string[] = [];

    const counter = (name: string, help: string, samples: Array<{ labels: Record<string, string>; value: number }>) => {
      if (samples.length === 0) {
        return;
      }
      const metricName = sanitizePrometheusMetricName(`${prefix}_${name}`);
      lines.push(`# HELP ${metricName} ${escapePrometheusHelp(help)}`);
      lines.push(`# TYPE ${metricName} counter`);
      for (const sample of samples) {
        const labels = formatPrometheusLabels({ ...baseLabels, ...sample.labels });
        lines.push(`${metricName}${labels} ${formatPrometheusValue(sample.value)}`);
      }
    };

    counter(
      'log_messages_total',
      'Log messages by level',
      Array.from(this.logLevelCounters.entries()).map(([level, value]) => ({ labels: { level }, value }))
    );

    const cameras = sortedEntries(this.cameras);
    counter(
      'packets_total',
      'Packets ingested per camera',
      cameras.map(([camera, state]) => ({ labels: { camera }, value: state.packets }))
    );
    counter(
      'packets_dropped_total',
      'Packets dropped at a consumer boundary',
      cameras.flatMap(([camera, state]) =>
        sortedEntries(state.drops).map(([consumer, value]) => ({ labels: { camera, consumer }, value }))
      )
    );
    counter(
      'ingestor_restarts_total',
      'Ingestor restarts by reason',
      cameras.flatMap(([camera, state]) =>
        sortedEntries(state.restartsByReason).map(([reason, value]) => ({ labels: { camera, reason }, value }))
      )
    );
    counter(
      'segments_finalized_total',
      'Continuous segments finalized',
      cameras.map(([camera, state]) => ({ labels: { camera }, value: state.segments }))
    );
    counter(
      'event_sessions_total',
      'Event recording session transitions',
      cameras.flatMap(([camera, state]) =>
        (['opened', 'extended', 'closed'] as const).map(transition => ({
          labels: { camera, transition },
          value: state.sessions[transition]
        }))
      )
    );
    counter('events_total', 'Events received by outcome', [
      { labels: { outcome: 'dispatched' }, value: this.dispatched },
      { labels: { outcome: 'duplicate' }, value: this.duplicates },
      { labels: { outcome: 'rejected' }, value: this.rejected }
    ]);

    return lines.length > 0 ? `${lines.join('\n')}\n` : '';
  }

  private ensureCamera(cameraId: string) {
    let state = this.cameras.get(cameraId);
    if (!state) {
      state = createCameraState();
      this.cameras.set(cameraId, state);
    }
    return state;
  }
}

function snapshotCamera(state: CameraState): CameraMetricsSnapshot {
  const health = evaluateRestartSeverity({
    watchdogRestarts: state.watchdogRestarts,
    watchdogBackoffMs: state.watchdogBackoffMs
  });
  return {
    packets: state.packets,
    bytes: state.bytes,
    lastPacketAt: toIso(state.lastPacketAt),
    drops: mapFrom(state.drops),
    rejectedPackets: state.rejectedPackets,
    restarts: state.restarts,
    restartsByReason: mapFrom(state.restartsByReason),
    watchdogRestarts: state.watchdogRestarts,
    watchdogBackoffMs: state.watchdogBackoffMs,
    totalRestartDelayMs: state.totalRestartDelayMs,
    lastRestart: state.lastRestart ? { ...state.lastRestart } : null,
    transportFallbacks: state.transportFallbacks,
    lastTransport: state.lastTransport,
    buffer: { evictions: state.bufferEvictions, degradedEpisodes: state.bufferDegradedEpisodes },
    segments: {
      finalized: state.segments,
      bytes: state.segmentBytes,
      lastFinalizedAt: toIso(state.lastSegmentAt)
    },
    eventSessions: { ...state.sessions },
    storageFailures: state.storageFailures,
    health: { severity: health.severity }
  };
}

function sortedEntries<T>(source: Map<string, T>): Array<[string, T]> {
  return Array.from(source.entries()).sort(([a], [b]) => a.localeCompare(b));
}

function mapFrom(source: Map<string, number>): CounterMap {
  return Object.fromEntries(sortedEntries(source));
}

function mapLogLevelCounters(source: Map<string, number>): CounterMap {
  const ordered = Array.from(source.entries()).sort(([a], [b]) => {
    const aValue = pino.levels.values[a] ?? Number.MAX_SAFE_INTEGER;
    const bValue = pino.levels.values[b] ?? Number.MAX_SAFE_INTEGER;
    return aValue === bValue ? a.localeCompare(b) : aValue - bValue;
  });
  return Object.fromEntries(ordered);
}

function toIso(value: number | null) {
  return value === null ? null : new Date(value).toISOString();
}

function sanitizePrometheusMetricName(name: string): string {
  const sanitized = name.replace(/[^A-Za-z0-9_]/g, '_');
  const collapsed = sanitized.replace(/_{2,}/g, '_').replace(/^_+|_+$/g, '');
  const lower = collapsed.toLowerCase();
  if (!lower) {
    return 'camera_recorder_metric';
  }
  if (/^[0-9]/.test(lower)) {
    return `camera_recorder_${lower}`;
  }
  return lower;
}

function sanitizePrometheusLabelName(name: string): string {
  const sanitized = name.replace(/[^A-Za-z0-9_]/g, '_');
  const collapsed = sanitized.replace(/_{2,}/g, '_').replace(/^_+|_+$/g, '');
  const lower = collapsed.toLowerCase();
  if (!lower) {
    return 'label';
  }
  return /^[0-9]/.test(lower) ? `_${lower}` : lower;
}

function escapePrometheusLabelValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/\n/g, '\\n').replace(/"/g, '\\"');
}

function escapePrometheusHelp(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/\n/g, ' ');
}

function formatPrometheusLabels(labels: Record<string, string>): string {
  const entries = Object.entries(labels);
  if (entries.length === 0) {
    return '';
  }
  const normalized = entries.map(([key, value]) => [sanitizePrometheusLabelName(key), value] as const);
  normalized.sort(([a], [b]) => a.localeCompare(b));
  const rendered = normalized.map(([key, value]) => `${key}="${escapePrometheusLabelValue(value)}"`);
  return `{${rendered.join(',')}}`;
}

function formatPrometheusValue(value: number): string {
  if (!Number.isFinite(value) || value === 0) {
    return '0';
  }
  if (Number.isInteger(value)) {
    return value.toString();
  }
  const fixed = value.toFixed(6).replace(/0+$/, '').replace(/\.$/, '');
  return fixed.length > 0 ? fixed : '0';
}

const defaultRegistry = new MetricsRegistry();

export { MetricsRegistry };
export default defaultRegistry;
