import type ffmpeg from 'fluent-ffmpeg';
import { EventEmitter } from 'node:events';
import type { CameraConfig, FfmpegConfig, RecordingConfig } from '../config/index.js';
import type { StorageFatalError } from '../errors.js';
import loggerModule, { type ComponentLogger } from '../logger.js';
import metrics from '../metrics/index.js';
import { EventRecorder, type EventSessionStatus, type TriggerResult } from '../recording/eventRecorder.js';
import { RollingBuffer, type RollingBufferStats } from '../recording/ringBuffer.js';
import { SegmentWriter, type SegmentWriterState } from '../recording/segmentWriter.js';
import type {
  Clock,
  EventRecordingMetadata,
  FinalizedRecording,
  IngestorState,
  PipelineHealth,
  RecorderEvent,
  SegmentMetadata
} from '../types.js';
import { FrameIngestor, type CommandFactoryOptions, type StatusEvent } from '../video/ingestor.js';
import { PacketFanout } from './fanout.js';
import { derivePipelineHealth } from './restartHealth.js';

const DEFAULT_FRAMES_PER_SECOND = 15;

export type CameraPipelineOptions = {
  camera: CameraConfig;
  recording: RecordingConfig;
  ffmpeg?: FfmpegConfig;
  commandFactory?: (options: CommandFactoryOptions) => ffmpeg.FfmpegCommand;
  random?: () => number;
  clock?: Clock;
  logger?: ComponentLogger;
};

export type PipelineStatus = {
  connected: boolean;
  state: IngestorState;
  writer: SegmentWriterState;
  active_segment_start: number | null;
  event_session: EventSessionStatus;
  health: PipelineHealth;
  health_reason: string | null;
  restarts: number;
  dropped_packets: Record<string, number>;
  buffer: RollingBufferStats;
  transport: string | null;
};

export type AnyFinalizedRecording =
  | FinalizedRecording<SegmentMetadata>
  | FinalizedRecording<EventRecordingMetadata>;

/**
 * One camera's recording pipeline: ingestor, fan-out, rolling buffer,
 * segment writer and event recorder. Errors from any part are caught here
 * and reported with the camera id.
 */
export class CameraPipeline extends EventEmitter {
  readonly cameraId: string;
  readonly fanout: PacketFanout;
  readonly buffer: RollingBuffer;
  readonly ingestor: FrameIngestor;
  readonly writer: SegmentWriter;
  readonly recorder: EventRecorder;
  private storageFailed = false;
  private started = false;
  private stopped = false;
  private readonly logger: ComponentLogger;

  constructor(private readonly options: CameraPipelineOptions) {
    super();
    const { camera, recording } = options;
    this.cameraId = camera.id;
    this.logger = options.logger ?? loggerModule;
    const framesPerSecond = camera.framesPerSecond ?? DEFAULT_FRAMES_PER_SECOND;
    const ffmpegOptions = { ...(options.ffmpeg ?? {}), ...(camera.ffmpeg ?? {}) };

    this.fanout = new PacketFanout({
      cameraId: camera.id,
      defaultCapacity: recording.consumerQueueSize,
      logger: this.logger
    });
    this.buffer = new RollingBuffer({
      cameraId: camera.id,
      windowSec: recording.preEventBufferSec,
      maxPackets: recording.bufferMaxPackets,
      maxBytes: recording.bufferMaxBytes,
      logger: this.logger
    });
    this.fanout.tap('rolling-buffer', packet => this.buffer.push(packet));

    this.ingestor = new FrameIngestor({
      cameraId: camera.id,
      input: camera.input,
      framesPerSecond,
      ffmpegPath: ffmpegOptions.path,
      inputArgs: camera.ffmpeg?.inputArgs,
      rtspTransport: camera.ffmpeg?.rtspTransport,
      rtspTransportSequence: camera.ffmpeg?.transportFallbacks,
      startTimeoutMs: ffmpegOptions.startTimeoutMs,
      watchdogTimeoutMs: ffmpegOptions.watchdogTimeoutMs,
      idleTimeoutMs: ffmpegOptions.idleTimeoutMs,
      restartDelayMs: ffmpegOptions.restartDelayMs,
      restartMaxDelayMs: ffmpegOptions.restartMaxDelayMs,
      restartJitterFactor: ffmpegOptions.restartJitterFactor,
      forceKillTimeoutMs: ffmpegOptions.forceKillTimeoutMs,
      commandFactory: options.commandFactory,
      random: options.random,
      clock: options.clock,
      fanout: this.fanout,
      logger: this.logger
    });
    this.writer = new SegmentWriter({
      cameraId: camera.id,
      baseDir: recording.baseDir,
      fanout: this.fanout,
      framesPerSecond,
      segmentDurationSec: recording.segmentDurationSec,
      queueCapacity: recording.consumerQueueSize,
      clock: options.clock,
      logger: this.logger
    });
    this.recorder = new EventRecorder({
      cameraId: camera.id,
      baseDir: recording.baseDir,
      fanout: this.fanout,
      buffer: this.buffer,
      postEventDurationSec: recording.postEventDurationSec,
      queueCapacity: recording.consumerQueueSize,
      clock: options.clock,
      logger: this.logger
    });

    this.ingestor.on('status', (event: StatusEvent) => this.handleStatus(event));
    this.ingestor.on('error', (error: Error) => {
      this.logger.warn({ err: error, camera: this.cameraId }, 'Frame ingestor error');
    });
    this.writer.on('segment', (recordingInfo: FinalizedRecording<SegmentMetadata>) => {
      this.emit('recording', recordingInfo);
    });
    this.recorder.on('recording', (recordingInfo: FinalizedRecording<EventRecordingMetadata>) => {
      this.emit('recording', recordingInfo);
    });
    this.writer.on('fatal', (error: StorageFatalError) => this.handleFatal(error));
    this.recorder.on('fatal', (error: StorageFatalError) => this.handleFatal(error));
  }

  get camera(): CameraConfig {
    return this.options.camera;
  }

  isFailed() {
    return this.storageFailed;
  }

  /** Starts recording without waiting for the camera to connect. */
  async start(): Promise<void> {
    if (this.started) {
      return;
    }
    this.started = true;
    await this.writer.start();
    if (this.storageFailed) {
      return;
    }
    this.ingestor.start();
  }

  trigger(event: RecorderEvent): Promise<TriggerResult> {
    return this.recorder.trigger(event);
  }

  /** Stops ingest, finalizes the open segment and closes any event session. */
  async stop(): Promise<void> {
    if (this.stopped) {
      return;
    }
    this.stopped = true;
    await this.ingestor.stop();
    const results = await Promise.allSettled([this.writer.stop(), this.recorder.stop()]);
    for (const result of results) {
      if (result.status === 'rejected') {
        this.logger.error({ err: result.reason, camera: this.cameraId }, 'Failed to finalize recordings on stop');
      }
    }
    this.fanout.close();
  }

  status(): PipelineStatus {
    const restarts = metrics.getCameraHealth(this.cameraId);
    const state = this.ingestor.getState();
    const report = derivePipelineHealth({ storageFailed: this.storageFailed, ingestorState: state, restarts });
    return {
      connected: this.ingestor.isConnected(),
      state,
      writer: this.writer.getState(),
      active_segment_start: this.writer.getActiveSegmentStart(),
      event_session: this.recorder.getStatus(),
      health: report.health,
      health_reason: report.reason,
      restarts: this.ingestor.getRestartCount(),
      dropped_packets: this.fanout.droppedByConsumer(),
      buffer: this.buffer.stats(),
      transport: this.ingestor.getCurrentRtspTransport()
    };
  }

  private handleStatus(event: StatusEvent) {
    this.logger.info(
      { camera: this.cameraId, state: event.state, previous: event.previous, reason: event.reason },
      'Camera stream state changed'
    );
    if (event.state === 'unavailable' && !this.stopped) {
      this.writer.pause().catch(error => {
        this.logger.error({ err: error, camera: this.cameraId }, 'Failed to pause segment writer');
      });
    }
    this.emit('status', event);
  }

  private handleFatal(error: StorageFatalError) {
    if (this.storageFailed) {
      return;
    }
    this.storageFailed = true;
    this.logger.error({ err: error, camera: this.cameraId }, 'Camera pipeline halted after storage failure');
    this.emit('fatal', error);
    this.ingestor.stop().catch(stopError => {
      this.logger.error({ err: stopError, camera: this.cameraId }, 'Failed to stop ingestor after storage failure');
    });
  }
}
