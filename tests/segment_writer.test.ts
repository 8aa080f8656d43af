import fs from 'node:fs/promises';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { StorageFatalError } from '../src/errors.js';
import metrics from '../src/metrics/index.js';
import { PacketFanout } from '../src/pipeline/fanout.js';
import { SegmentWriter, nextSegmentBoundary } from '../src/recording/segmentWriter.js';
import type { FinalizedRecording, Packet, SegmentMetadata } from '../src/types.js';
import { listFiles, makeTempDir, readJson, removeDir, waitForIo } from './helpers/fs.js';

// 2023-11-14T22:14:00Z
const T = 1_700_000_040;
const HOUR_DIR = ['cam-1', '2023-11-14', '22'];

const quietLogger = { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };

function packet(timestamp: number, marker = timestamp % 256): Packet {
  const data = Buffer.from([0xff, 0xd8, marker, 0xff, 0xd9]);
  return Object.freeze({ cameraId: 'cam-1', timestamp, data, byteLength: data.length });
}

describe('SegmentWriter', () => {
  let baseDir: string;
  let fanout: PacketFanout;
  let segments: FinalizedRecording<SegmentMetadata>[];

  function createWriter(options: { clock?: () => number; segmentDurationSec?: number } = {}) {
    const writer = new SegmentWriter({
      cameraId: 'cam-1',
      baseDir,
      fanout,
      framesPerSecond: 1,
      segmentDurationSec: options.segmentDurationSec ?? 60,
      clock: options.clock ?? (() => T),
      logger: quietLogger
    });
    writer.on('segment', (segment: FinalizedRecording<SegmentMetadata>) => segments.push(segment));
    return writer;
  }

  beforeEach(async () => {
    metrics.reset();
    vi.clearAllMocks();
    baseDir = await makeTempDir();
    fanout = new PacketFanout({ cameraId: 'cam-1', logger: quietLogger });
    segments = [];
  });

  afterEach(async () => {
    vi.useRealTimers();
    await removeDir(baseDir);
  });

  it('SegmentBoundaryAlignment aligns boundaries to multiples of the duration', () => {
    expect(nextSegmentBoundary(T, 60)).toBe(T + 60);
    expect(nextSegmentBoundary(T + 59.9, 60)).toBe(T + 60);
    expect(nextSegmentBoundary(T + 61, 60)).toBe(T + 120);
  });

  it('SegmentRotation splits packets at the minute boundary without overlap', async () => {
    const writer = createWriter();
    await writer.start();

    for (const offset of [0, 10, 20, 30, 40, 50, 60, 70]) {
      fanout.publish(packet(T + offset));
    }
    await writer.stop();

    expect(segments.map(segment => segment.metadata)).toEqual([
      {
        camera_id: 'cam-1',
        type: 'continuous',
        start: T,
        end: T + 51,
        duration: 51,
        frame_count: 6,
        bytes: 30,
        file: 'segment_22-14-00.mjpeg'
      },
      {
        camera_id: 'cam-1',
        type: 'continuous',
        start: T + 60,
        end: T + 71,
        duration: 11,
        frame_count: 2,
        bytes: 10,
        file: 'segment_22-15-00.mjpeg'
      }
    ]);
    const [first, second] = segments;
    expect(first && second ? second.metadata.start >= first.metadata.end : false).toBe(true);

    const hourDir = path.join(baseDir, ...HOUR_DIR);
    expect(await listFiles(hourDir)).toEqual([
      'segment_22-14-00.json',
      'segment_22-14-00.mjpeg',
      'segment_22-15-00.json',
      'segment_22-15-00.mjpeg'
    ]);
    expect(await readJson(path.join(hourDir, 'segment_22-15-00.json'))).toEqual(second?.metadata);
    const media = await fs.readFile(path.join(hourDir, 'segment_22-15-00.mjpeg'));
    expect(media.equals(Buffer.concat([packet(T + 60).data, packet(T + 70).data]))).toBe(true);
    expect(metrics.snapshot().pipelines.byCamera['cam-1']?.segments.finalized).toBe(2);
    expect(writer.getState()).toBe('stopped');
  });

  it('SegmentCrashSafety keeps the open segment under a partial name until finalized', async () => {
    const writer = createWriter();
    await writer.start();
    const hourDir = path.join(baseDir, ...HOUR_DIR);

    fanout.publish(packet(T + 1));
    await waitForIo(() => writer.getActiveSegmentStart() === T + 1);

    expect(await listFiles(hourDir)).toEqual(['segment_22-14-01.mjpeg.partial']);

    await writer.stop();
    expect(await listFiles(hourDir)).toEqual(['segment_22-14-01.json', 'segment_22-14-01.mjpeg']);
  });

  it('SegmentBoundaryTimer finalizes a segment when no packet crosses the boundary', async () => {
    vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout'] });
    const writer = createWriter({ clock: () => T + 5 });
    await writer.start();

    fanout.publish(packet(T + 5));
    await waitForIo(() => writer.getActiveSegmentStart() === T + 5);

    await vi.advanceTimersByTimeAsync(56_000);
    await waitForIo(() => segments.length === 1);

    expect(segments[0]?.metadata).toMatchObject({ start: T + 5, end: T + 6, frame_count: 1 });
    expect(writer.getActiveSegmentStart()).toBeNull();

    await writer.stop();
    expect(segments).toHaveLength(1);
  });

  it('SegmentPause finalizes the open segment and resumes on the next packet', async () => {
    const writer = createWriter();
    await writer.start();

    fanout.publish(packet(T + 1));
    await waitForIo(() => writer.getActiveSegmentStart() === T + 1);
    await writer.pause();

    expect(writer.getState()).toBe('paused');
    expect(segments.map(segment => segment.metadata.frame_count)).toEqual([1]);

    fanout.publish(packet(T + 3));
    await waitForIo(() => writer.getActiveSegmentStart() === T + 3);
    await writer.stop();

    expect(segments.map(segment => segment.metadata.file)).toEqual([
      'segment_22-14-01.mjpeg',
      'segment_22-14-03.mjpeg'
    ]);
  });

  it('SegmentPauseWritesQueuedBacklogBeforeFinalizing', async () => {
    const writer = createWriter();
    await writer.start();

    for (const offset of [1, 2, 3, 4, 5]) {
      fanout.publish(packet(T + offset));
    }
    await writer.pause();

    expect(writer.getState()).toBe('paused');
    expect(writer.getActiveSegmentStart()).toBeNull();
    expect(segments.map(segment => segment.metadata)).toEqual([
      expect.objectContaining({ start: T + 1, end: T + 6, frame_count: 5, file: 'segment_22-14-01.mjpeg' })
    ]);

    await writer.stop();
    expect(segments).toHaveLength(1);
  });

  it('SegmentOrphanRecovery removes partial files and completes published media on start', async () => {
    const hourDir = path.join(baseDir, ...HOUR_DIR);
    await fs.mkdir(hourDir, { recursive: true });
    await fs.writeFile(path.join(hourDir, 'segment_22-10-00.mjpeg.partial'), 'partial');
    await fs.writeFile(path.join(hourDir, 'segment_22-11-00.mjpeg'), 'media');
    await fs.writeFile(path.join(hourDir, 'segment_22-11-00.json.tmp'), '{"type":"continuous"}');
    await fs.writeFile(path.join(hourDir, 'segment_22-12-00.json.tmp'), '{"type":"continuous"}');

    const writer = createWriter();
    await writer.start();

    expect(await listFiles(hourDir)).toEqual(['segment_22-11-00.json', 'segment_22-11-00.mjpeg']);
    await writer.stop();
  });

  it('SegmentStorageFailure marks the writer failed and emits fatal', async () => {
    await fs.mkdir(path.join(baseDir, 'cam-1'), { recursive: true });
    await fs.writeFile(path.join(baseDir, 'cam-1', '2023-11-14'), 'not a directory');

    const writer = createWriter();
    const fatals: StorageFatalError[] = [];
    writer.on('fatal', (error: StorageFatalError) => fatals.push(error));
    await writer.start();

    fanout.publish(packet(T));
    await waitForIo(() => fatals.length === 1);

    expect(writer.isFailed()).toBe(true);
    expect(fatals[0]?.code).toBe('STORAGE_FAILURE');
    expect(metrics.snapshot().pipelines.byCamera['cam-1']?.storageFailures).toBe(1);

    await writer.stop();
    expect(writer.getState()).toBe('failed');
    expect(segments).toHaveLength(0);
  });
});
