import { describe, expect, it } from 'vitest';
import { MetricsRegistry } from '../src/metrics/index.js';
import { derivePipelineHealth, describeRestartSeverity, evaluateRestartSeverity } from '../src/pipeline/restartHealth.js';

describe('MetricsCounters', () => {
  it('MetricsPerCameraCounters', () => {
    const registry = new MetricsRegistry();

    registry.recordPacket('cam-1', 100, 0);
    registry.recordPacket('cam-1', 50, 1000);
    registry.recordDroppedPackets('cam-1', 'segment-writer', 2);
    registry.recordDroppedPackets('cam-1', 'segment-writer', 0);
    registry.recordBufferEviction('cam-1', 3, true);
    registry.recordBufferEviction('cam-1', 1, false);
    registry.recordSegmentFinalized('cam-1', 150, 2000);
    registry.recordEventSession('cam-1', 'opened');
    registry.recordEventSession('cam-1', 'extended');

    const camera = registry.snapshot().pipelines.byCamera['cam-1'];
    expect(camera).toMatchObject({
      packets: 2,
      bytes: 150,
      lastPacketAt: '1970-01-01T00:00:01.000Z',
      drops: { 'segment-writer': 2 },
      buffer: { evictions: 4, degradedEpisodes: 1 },
      segments: { finalized: 1, bytes: 150, lastFinalizedAt: '1970-01-01T00:00:02.000Z' },
      eventSessions: { opened: 1, extended: 1, closed: 0 },
      health: { severity: 'none' }
    });
  });

  it('MetricsRestartsByReason', () => {
    const registry = new MetricsRegistry();

    registry.recordPipelineRestart('cam-1', 'watchdog-timeout', { delayMs: 1000, attempt: 1, at: 0 });
    registry.recordPipelineRestart('cam-1', 'process-exit', { delayMs: 2000, attempt: 2, exitCode: 1, at: 5000 });
    registry.recordTransportFallback('cam-1', 'udp');

    const snapshot = registry.snapshot();
    expect(snapshot.pipelines.restarts).toBe(2);
    expect(snapshot.pipelines.byReason).toEqual({ 'process-exit': 1, 'watchdog-timeout': 1 });
    expect(snapshot.pipelines.lastRestartAt).toBe('1970-01-01T00:00:05.000Z');
    expect(snapshot.pipelines.byCamera['cam-1']).toMatchObject({
      watchdogRestarts: 1,
      watchdogBackoffMs: 1000,
      totalRestartDelayMs: 3000,
      transportFallbacks: 1,
      lastTransport: 'udp',
      lastRestart: {
        reason: 'process-exit',
        attempt: 2,
        delayMs: 2000,
        errorCode: null,
        exitCode: 1,
        signal: null,
        at: '1970-01-01T00:00:05.000Z'
      }
    });
  });

  it('MetricsDispatchOutcomes', () => {
    const registry = new MetricsRegistry();

    registry.recordDispatch('dispatched', { eventType: 'motion', origin: 'manual' });
    registry.recordDispatch('dispatched', { eventType: 'alarm', origin: 'monitor' });
    registry.recordDispatch('duplicate');
    registry.recordDispatch('rejected');

    expect(registry.snapshot().events).toMatchObject({
      dispatched: 2,
      duplicates: 1,
      rejected: 1,
      byType: { alarm: 1, motion: 1 },
      byOrigin: { manual: 1, monitor: 1 }
    });
  });

  it('MetricsRetentionIgnoresDryRunTotals', () => {
    const registry = new MetricsRegistry();

    registry.recordRetentionRun({ removed: 2, kept: 1, freedBytes: 10, dryRun: false });
    registry.recordRetentionRun({ removed: 5, kept: 0, freedBytes: 99, dryRun: true });
    registry.recordRetentionWarning();

    expect(registry.snapshot().retention).toMatchObject({ runs: 2, removed: 2, kept: 1, freedBytes: 10, warnings: 1 });
  });

  it('MetricsLatencyTimer', async () => {
    const registry = new MetricsRegistry();

    await registry.time('recorder.startup.ms', async () => {
      await new Promise(resolve => setTimeout(resolve, 5));
    });
    await expect(
      registry.time('recorder.startup.ms', () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    const stats = registry.snapshot().latencies['recorder.startup.ms'];
    expect(stats?.count).toBe(2);
    expect(stats?.maxMs).toBeGreaterThan(0);
  });

  it('MetricsResetNotifiesListeners', () => {
    const registry = new MetricsRegistry();
    let resets = 0;
    const detach = registry.onReset(() => {
      resets += 1;
    });

    registry.recordPacket('cam-1', 10);
    registry.reset();
    detach();
    registry.reset();

    expect(resets).toBe(1);
    expect(registry.snapshot().pipelines.byCamera).toEqual({});
  });
});

describe('MetricsPrometheusExport', () => {
  it('PrometheusCountersWithLabels', () => {
    const registry = new MetricsRegistry();
    registry.recordPacket('cam-1', 100);
    registry.recordDroppedPackets('cam-1', 'event-recorder', 3);

    const output = registry.exportForPrometheus({ prefix: 'recorder', labels: { site: 'lab' } });
    const lines = output.trimEnd().split('\n');

    expect(lines.slice(0, 6)).toEqual([
      '# HELP recorder_packets_total Packets ingested per camera',
      '# TYPE recorder_packets_total counter',
      'recorder_packets_total{camera="cam-1",site="lab"} 1',
      '# HELP recorder_packets_dropped_total Packets dropped at a consumer boundary',
      '# TYPE recorder_packets_dropped_total counter',
      'recorder_packets_dropped_total{camera="cam-1",consumer="event-recorder",site="lab"} 3'
    ]);
    expect(lines.slice(-3)).toEqual([
      'recorder_events_total{outcome="dispatched",site="lab"} 0',
      'recorder_events_total{outcome="duplicate",site="lab"} 0',
      'recorder_events_total{outcome="rejected",site="lab"} 0'
    ]);
  });
});

describe('RestartHealth', () => {
  it('RestartSeverityThresholds', () => {
    expect(evaluateRestartSeverity({ watchdogRestarts: 2, watchdogBackoffMs: 0 }).severity).toBe('none');

    const warning = evaluateRestartSeverity({ watchdogRestarts: 3, watchdogBackoffMs: 0 });
    expect(warning.severity).toBe('warning');
    expect(describeRestartSeverity(warning)).toBe('watchdog restarts 3 >= 3');

    const critical = evaluateRestartSeverity({ watchdogRestarts: 1, watchdogBackoffMs: 200_000 });
    expect(critical.severity).toBe('critical');
    expect(describeRestartSeverity(critical)).toBe('watchdog backoff 200000ms >= 180000ms');
  });

  it('PipelineHealthPrecedence', () => {
    const warning = evaluateRestartSeverity({ watchdogRestarts: 3, watchdogBackoffMs: 0 });
    const none = evaluateRestartSeverity({ watchdogRestarts: 0, watchdogBackoffMs: 0 });

    expect(derivePipelineHealth({ storageFailed: true, ingestorState: 'unavailable', restarts: warning })).toEqual({
      health: 'failed',
      reason: 'recording storage failed'
    });
    expect(derivePipelineHealth({ storageFailed: false, ingestorState: 'unavailable', restarts: warning })).toEqual({
      health: 'degraded',
      reason: 'stream unavailable'
    });
    expect(derivePipelineHealth({ storageFailed: false, ingestorState: 'connected', restarts: warning })).toEqual({
      health: 'degraded',
      reason: 'watchdog restarts 3 >= 3'
    });
    expect(derivePipelineHealth({ storageFailed: false, ingestorState: 'connected', restarts: none })).toEqual({
      health: 'ok',
      reason: null
    });
  });
});
