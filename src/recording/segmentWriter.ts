import { EventEmitter } from 'node:events';
import path from 'node:path';
import { StorageFatalError } from '../errors.js';
import loggerModule, { type ComponentLogger } from '../logger.js';
import metrics from '../metrics/index.js';
import type { PacketFanout, PacketSubscription } from '../pipeline/fanout.js';
import { systemClock, type Clock, type FinalizedRecording, type Packet, type SegmentMetadata } from '../types.js';
import {
  PartialRecording,
  formatTimeOfDay,
  recordingDirectory,
  recoverOrphans,
  roundSeconds
} from './storage.js';

const DEFAULT_SEGMENT_DURATION_SEC = 60;
const DEFAULT_QUEUE_CAPACITY = 256;
const ROTATION_GRACE_MS = 1000;

export type SegmentWriterOptions = {
  cameraId: string;
  baseDir: string;
  fanout: PacketFanout;
  framesPerSecond: number;
  segmentDurationSec?: number;
  queueCapacity?: number;
  clock?: Clock;
  logger?: ComponentLogger;
};

export type SegmentWriterState = 'idle' | 'recording' | 'paused' | 'failed' | 'stopped';

type ActiveSegment = {
  recording: PartialRecording;
  start: number;
  boundary: number;
  lastTimestamp: number;
  frameCount: number;
};

/** Start of the next rotation boundary after `timestamp`, aligned to the epoch. */
export function nextSegmentBoundary(timestamp: number, durationSec: number): number {
  return (Math.floor(timestamp / durationSec) + 1) * durationSec;
}

/**
 * Writes every packet of one camera into fixed-length files aligned to
 * wall-clock boundaries. Runs off its own fan-out subscription so a slow
 * disk only ever drops packets for this writer.
 */
export class SegmentWriter extends EventEmitter {
  private subscription: PacketSubscription | null = null;
  private loop: Promise<void> | null = null;
  private chain: Promise<void> = Promise.resolve();
  private active: ActiveSegment | null = null;
  private rotationTimer: NodeJS.Timeout | null = null;
  private lastFinalizedEnd = Number.NEGATIVE_INFINITY;
  private state: SegmentWriterState = 'idle';
  private finalizedCount = 0;
  private readonly durationSec: number;
  private readonly frameIntervalSec: number;
  private readonly clock: Clock;
  private readonly logger: ComponentLogger;

  constructor(private readonly options: SegmentWriterOptions) {
    super();
    this.durationSec = options.segmentDurationSec ?? DEFAULT_SEGMENT_DURATION_SEC;
    if (!(this.durationSec > 0)) {
      throw new RangeError('segmentDurationSec must be greater than 0');
    }
    this.frameIntervalSec = 1 / Math.max(1, options.framesPerSecond);
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? loggerModule;
  }

  get cameraId() {
    return this.options.cameraId;
  }

  getState(): SegmentWriterState {
    return this.state;
  }

  isFailed() {
    return this.state === 'failed';
  }

  getActiveSegmentStart(): number | null {
    return this.active?.start ?? null;
  }

  getActiveFrameCount() {
    return this.active?.frameCount ?? 0;
  }

  getFinalizedCount() {
    return this.finalizedCount;
  }

  async start(): Promise<void> {
    if (this.loop) {
      return;
    }

    const cameraDir = path.join(this.options.baseDir, this.options.cameraId);
    try {
      const recovered = await recoverOrphans(cameraDir);
      if (recovered.removed.length > 0 || recovered.completed.length > 0) {
        this.logger.warn(
          { camera: this.options.cameraId, removed: recovered.removed, completed: recovered.completed },
          'Cleaned up interrupted recordings'
        );
      }
    } catch (error) {
      this.fail(error, cameraDir);
      return;
    }

    this.state = 'idle';
    const subscription = this.options.fanout.subscribe('segment-writer', {
      capacity: this.options.queueCapacity ?? DEFAULT_QUEUE_CAPACITY
    });
    this.subscription = subscription;
    this.loop = this.consume(subscription);
  }

  /**
   * Writes the packets queued before the outage, then finalizes the open
   * segment; the next packet opens a new one.
   */
  async pause(): Promise<void> {
    await this.subscription?.whenIdle();
    await this.enqueue(async () => {
      if (this.state === 'failed' || this.state === 'stopped') {
        return;
      }
      await this.finalizeActive('paused');
      this.state = 'paused';
    });
  }

  async stop(): Promise<void> {
    const subscription = this.subscription;
    this.subscription = null;
    subscription?.close();
    if (this.loop) {
      await this.loop;
      this.loop = null;
    }
    this.clearRotationTimer();
    await this.enqueue(async () => {
      await this.finalizeActive('stopped');
      if (this.state !== 'failed') {
        this.state = 'stopped';
      }
    });
  }

  private async consume(subscription: PacketSubscription) {
    for await (const packet of subscription) {
      await this.enqueue(() => this.handlePacket(packet));
      if (this.state === 'failed') {
        subscription.close({ discard: true });
        break;
      }
    }
  }

  private enqueue(operation: () => Promise<void>): Promise<void> {
    const next = this.chain.then(operation);
    this.chain = next.catch(error => {
      this.logger.error({ err: error, camera: this.options.cameraId }, 'Segment writer operation failed');
    });
    return this.chain;
  }

  private async handlePacket(packet: Packet) {
    if (this.state === 'failed' || this.state === 'stopped') {
      return;
    }

    if (this.active && packet.timestamp >= this.active.boundary) {
      await this.finalizeActive('rotation');
    }

    if (packet.timestamp < this.lastFinalizedEnd) {
      this.logger.debug(
        { camera: this.options.cameraId, timestamp: packet.timestamp, segmentEnd: this.lastFinalizedEnd },
        'Dropped packet older than the last finalized segment'
      );
      return;
    }

    if (this.active && packet.timestamp < this.active.lastTimestamp) {
      return;
    }

    const active = this.active ?? (await this.openSegment(packet.timestamp));
    if (!active) {
      return;
    }

    try {
      await active.recording.write(packet.data);
    } catch (error) {
      this.fail(error, active.recording.partialPath);
      return;
    }
    active.lastTimestamp = packet.timestamp;
    active.frameCount += 1;
  }

  private async openSegment(timestamp: number): Promise<ActiveSegment | null> {
    const directory = recordingDirectory(this.options.baseDir, this.options.cameraId, timestamp);
    let recording: PartialRecording;
    try {
      recording = await PartialRecording.open(directory, `segment_${formatTimeOfDay(timestamp)}`);
    } catch (error) {
      this.fail(error, directory);
      return null;
    }

    const active: ActiveSegment = {
      recording,
      start: timestamp,
      boundary: nextSegmentBoundary(timestamp, this.durationSec),
      lastTimestamp: timestamp,
      frameCount: 0
    };
    this.active = active;
    this.state = 'recording';
    this.scheduleRotation(active);
    this.logger.debug(
      { camera: this.options.cameraId, file: recording.fileName, start: timestamp, boundary: active.boundary },
      'Opened segment'
    );
    return active;
  }

  private scheduleRotation(active: ActiveSegment) {
    this.clearRotationTimer();
    const delayMs = Math.max(0, (active.boundary - this.clock()) * 1000) + ROTATION_GRACE_MS;
    this.rotationTimer = setTimeout(() => {
      this.rotationTimer = null;
      void this.enqueue(async () => {
        if (this.active === active) {
          await this.finalizeActive('boundary');
        }
      });
    }, delayMs);
    this.rotationTimer.unref?.();
  }

  private clearRotationTimer() {
    if (this.rotationTimer) {
      clearTimeout(this.rotationTimer);
      this.rotationTimer = null;
    }
  }

  private async finalizeActive(reason: string) {
    const active = this.active;
    if (!active) {
      return;
    }
    this.active = null;
    this.clearRotationTimer();

    if (active.frameCount === 0) {
      await active.recording.discard().catch(error => {
        this.logger.warn({ err: error, camera: this.options.cameraId }, 'Failed to discard empty segment');
      });
      return;
    }

    const start = roundSeconds(active.start);
    const end = roundSeconds(Math.min(active.boundary, active.lastTimestamp + this.frameIntervalSec));
    const metadata: SegmentMetadata = {
      camera_id: this.options.cameraId,
      type: 'continuous',
      start,
      end,
      duration: roundSeconds(end - start),
      frame_count: active.frameCount,
      bytes: active.recording.bytes,
      file: active.recording.fileName
    };

    let paths: { filePath: string; metadataPath: string };
    try {
      paths = await active.recording.finalize(metadata);
    } catch (error) {
      this.fail(error, active.recording.partialPath);
      return;
    }

    this.lastFinalizedEnd = end;
    this.finalizedCount += 1;
    metrics.recordSegmentFinalized(this.options.cameraId, metadata.bytes);
    this.logger.info(
      {
        camera: this.options.cameraId,
        file: metadata.file,
        start,
        end,
        frames: metadata.frame_count,
        reason
      },
      'Segment finalized'
    );
    const finalized: FinalizedRecording<SegmentMetadata> = {
      cameraId: this.options.cameraId,
      filePath: paths.filePath,
      metadataPath: paths.metadataPath,
      metadata
    };
    this.emit('segment', finalized);
  }

  private fail(error: unknown, location: string) {
    if (this.state === 'failed') {
      return;
    }
    this.state = 'failed';
    this.clearRotationTimer();
    const active = this.active;
    this.active = null;
    if (active) {
      void active.recording.close().catch(closeError => {
        this.logger.debug({ err: closeError, camera: this.options.cameraId }, 'Failed to close segment file');
      });
    }
    metrics.recordStorageFailure(this.options.cameraId);
    const fatal = new StorageFatalError(this.options.cameraId, location, error);
    this.logger.error({ err: error, camera: this.options.cameraId, path: location }, fatal.message);
    this.emit('fatal', fatal);
  }
}
