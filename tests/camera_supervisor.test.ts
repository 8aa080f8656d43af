import type { FfmpegCommand } from 'fluent-ffmpeg';
import fs from 'node:fs/promises';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { RecordingConfig } from '../src/config/index.js';
import { CameraConflictError, CameraNotFoundError, ConfigurationError } from '../src/errors.js';
import metrics from '../src/metrics/index.js';
import type { AnyFinalizedRecording } from '../src/pipeline/cameraPipeline.js';
import { CameraSupervisor } from '../src/pipeline/supervisor.js';
import type { CommandFactoryOptions } from '../src/video/ingestor.js';
import { FakeCommand, flushIo, jpegFrame, waitFor } from './helpers/fakeCommand.js';
import { listFiles, makeTempDir, removeDir } from './helpers/fs.js';

const T = 1_700_000_040;
const quietLogger = { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };

describe('CameraSupervisor', () => {
  let baseDir: string;
  let now: number;
  let commands: Map<string, FakeCommand[]>;
  let stored: AnyFinalizedRecording[];
  let catalog: { addMonitor: ReturnType<typeof vi.fn>; deleteMonitor: ReturnType<typeof vi.fn> };
  let supervisor: CameraSupervisor;

  function latestCommand(input: string): FakeCommand {
    const list = commands.get(input) ?? [];
    const command = list[list.length - 1];
    if (!command) {
      throw new Error(`No command started for ${input}`);
    }
    return command;
  }

  function activeFrames(cameraId: string) {
    return supervisor.getPipeline(cameraId)?.writer.getActiveFrameCount() ?? 0;
  }

  async function pushFrame(input: string, at: number, marker = 1) {
    now = at;
    latestCommand(input).pushFrame(jpegFrame(marker));
    await flushIo();
    await flushIo();
  }

  beforeEach(async () => {
    metrics.reset();
    vi.clearAllMocks();
    baseDir = await makeTempDir();
    now = T;
    commands = new Map();
    stored = [];
    catalog = { addMonitor: vi.fn(async () => true), deleteMonitor: vi.fn(async () => true) };

    const recording: RecordingConfig = {
      baseDir,
      segmentDurationSec: 60,
      preEventBufferSec: 60,
      postEventDurationSec: 60,
      bufferMaxPackets: 5400,
      bufferMaxBytes: 1024 * 1024,
      consumerQueueSize: 64
    };

    supervisor = new CameraSupervisor({
      recording,
      ffmpeg: {
        startTimeoutMs: 60_000,
        watchdogTimeoutMs: 60_000,
        idleTimeoutMs: 60_000,
        restartDelayMs: 5,
        restartMaxDelayMs: 5,
        restartJitterFactor: 0,
        forceKillTimeoutMs: 5
      },
      catalog,
      storeRecording: recordingInfo => stored.push(recordingInfo),
      commandFactory: (options: CommandFactoryOptions) => {
        const command = new FakeCommand();
        command.exitOnTerm = true;
        const list = commands.get(options.input) ?? [];
        list.push(command);
        commands.set(options.input, list);
        return command as unknown as FfmpegCommand;
      },
      clock: () => now,
      logger: quietLogger
    });
  });

  afterEach(async () => {
    await supervisor.stop();
    await removeDir(baseDir);
  });

  it('SupervisorAddDoesNotWaitForConnection', async () => {
    const status = await supervisor.addCamera({ id: 'cam-1', name: 'Front', input: 'rtsp://10.0.0.1/live' });

    expect(status).toMatchObject({
      camera_id: 'cam-1',
      name: 'Front',
      connected: false,
      state: 'connecting',
      event_session_open: false,
      registered: true,
      health: 'ok',
      transport: 'tcp'
    });
    expect(catalog.addMonitor).toHaveBeenCalledWith('cam-1', {
      name: 'Front',
      input: 'rtsp://10.0.0.1/live',
      rtspTransport: 'tcp'
    });

    await pushFrame('rtsp://10.0.0.1/live', T);
    expect(supervisor.cameraStatus('cam-1').connected).toBe(true);
  });

  it('SupervisorRejectsDuplicatesAndInvalidConfigs', async () => {
    await supervisor.addCamera({ id: 'cam-1', input: '/dev/video0' });

    await expect(supervisor.addCamera({ id: 'cam-1', input: '/dev/video1' })).rejects.toBeInstanceOf(
      CameraConflictError
    );
    await expect(supervisor.addCamera({ id: 'bad id', input: '/dev/video1' })).rejects.toBeInstanceOf(
      ConfigurationError
    );
    await expect(supervisor.removeCamera('cam-9')).rejects.toBeInstanceOf(CameraNotFoundError);
    await expect(
      supervisor.trigger({ cameraId: 'cam-9', eventType: 'motion', timestamp: T, metadata: {}, origin: 'manual' })
    ).rejects.toBeInstanceOf(CameraNotFoundError);

    expect(supervisor.status()).toMatchObject({ running: true, cameras: 1, camera_ids: ['cam-1'] });
  });

  it('SupervisorRemoveFinalizesSegmentAndEventSession', async () => {
    const input = '/dev/video0';
    await supervisor.addCamera({ id: 'cam-1', input, framesPerSecond: 10 });
    for (const offset of [0, 1, 2]) {
      await pushFrame(input, T + offset, offset + 1);
    }
    await waitFor(() => activeFrames('cam-1') === 3);

    const result = await supervisor.trigger({
      cameraId: 'cam-1',
      eventType: 'motion',
      timestamp: T + 2,
      metadata: {},
      origin: 'manual'
    });
    expect(result).toEqual({ status: 'opened', cameraId: 'cam-1', triggerAt: T + 2, deadline: T + 62 });
    expect(supervisor.cameraStatus('cam-1')).toMatchObject({
      event_session_open: true,
      event_session_deadline: T + 62,
      active_segment_start: T
    });

    await pushFrame(input, T + 3, 4);
    await supervisor.removeCamera('cam-1');

    const byType = Object.fromEntries(stored.map(item => [item.metadata.type, item.metadata]));
    expect(byType.continuous).toMatchObject({ start: T, frame_count: 4, bytes: 32 });
    expect(byType.event).toMatchObject({
      trigger_timestamp: T + 2,
      pre_event_start: T,
      post_event_end: T + 3,
      frame_count: 4
    });
    expect(latestCommand(input).killedSignals).toEqual(['SIGTERM']);
    expect(catalog.deleteMonitor).toHaveBeenCalledWith('cam-1');
    expect(supervisor.hasCamera('cam-1')).toBe(false);

    const hourDir = path.join(baseDir, 'cam-1', '2023-11-14', '22');
    expect(await listFiles(hourDir)).toEqual([
      'event_22-14-02_motion.json',
      'event_22-14-02_motion.mjpeg',
      'segment_22-14-00.json',
      'segment_22-14-00.mjpeg'
    ]);
  });

  it('SupervisorPausesSegmentWhileUnavailable', async () => {
    const input = '/dev/video0';
    await supervisor.addCamera({ id: 'cam-1', input });
    await pushFrame(input, T);
    await pushFrame(input, T + 1);
    await waitFor(() => activeFrames('cam-1') === 2);

    latestCommand(input).emitClose(1);
    expect(supervisor.cameraStatus('cam-1')).toMatchObject({ health: 'degraded', state: 'unavailable' });
    await waitFor(() => stored.length === 1);
    expect(stored[0]?.metadata).toMatchObject({ type: 'continuous', start: T, frame_count: 2 });

    await waitFor(() => (commands.get(input) ?? []).length === 2);
    await pushFrame(input, T + 10);
    await waitFor(() => activeFrames('cam-1') === 1);
    expect(supervisor.cameraStatus('cam-1')).toMatchObject({
      health: 'ok',
      connected: true,
      active_segment_start: T + 10
    });
  });

  it('SupervisorUnreachableCameraDoesNotDelayOthers', async () => {
    const offline = 'rtsp://10.0.0.9/offline';
    await supervisor.addCamera({ id: 'cam-1', input: offline, ffmpeg: { startTimeoutMs: 20 } });
    await waitFor(() => (commands.get(offline) ?? []).length >= 4);

    const started = Date.now();
    const added = await supervisor.addCamera({ id: 'cam-2', input: '/dev/video1' });
    expect(added).toMatchObject({ camera_id: 'cam-2', state: 'connecting', health: 'ok' });

    await pushFrame('/dev/video1', T);
    await waitFor(() => activeFrames('cam-2') === 1);
    const result = await supervisor.trigger({
      cameraId: 'cam-2',
      eventType: 'motion',
      timestamp: T,
      metadata: {},
      origin: 'manual'
    });
    expect(Date.now() - started).toBeLessThan(1000);
    expect(result).toEqual({ status: 'opened', cameraId: 'cam-2', triggerAt: T, deadline: T + 60 });

    const status = supervisor.status();
    expect(status.camera_ids).toEqual(['cam-1', 'cam-2']);
    expect(status.details['cam-1']).toMatchObject({ connected: false, health: 'degraded' });
    expect(status.details['cam-1']?.restarts).toBeGreaterThanOrEqual(3);
    expect(status.details['cam-2']).toMatchObject({
      connected: true,
      health: 'ok',
      active_segment_start: T,
      event_session_open: true
    });
  });

  it('SupervisorIsolatesStorageFailures', async () => {
    await fs.writeFile(path.join(baseDir, 'cam-1'), 'not a directory');

    await supervisor.addCamera({ id: 'cam-1', input: '/dev/video0' });
    await supervisor.addCamera({ id: 'cam-2', input: '/dev/video1' });

    expect(commands.has('/dev/video0')).toBe(false);
    await pushFrame('/dev/video1', T);
    await waitFor(() => activeFrames('cam-2') === 1);

    const status = supervisor.status();
    expect(status.details['cam-1']?.health).toBe('failed');
    expect(status.details['cam-2']).toMatchObject({ health: 'ok', connected: true, active_segment_start: T });
    expect(metrics.snapshot().pipelines.byCamera['cam-1']?.storageFailures).toBe(1);
  });
});
