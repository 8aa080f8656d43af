import type ffmpeg from 'fluent-ffmpeg';
import type { CatalogClient } from '../catalog/client.js';
import {
  validateCameraConfig,
  type CameraConfig,
  type FfmpegConfig,
  type RecordingConfig
} from '../config/index.js';
import { storeRecording } from '../db.js';
import { CameraConflictError, CameraNotFoundError, RecorderError } from '../errors.js';
import loggerModule, { type ComponentLogger } from '../logger.js';
import type { TriggerResult } from '../recording/eventRecorder.js';
import type { RollingBufferStats } from '../recording/ringBuffer.js';
import type { Clock, IngestorState, PipelineHealth, RecorderEvent } from '../types.js';
import { normalizeCameraId, redactInput } from '../utils/camera.js';
import type { CommandFactoryOptions } from '../video/ingestor.js';
import { CameraPipeline, type AnyFinalizedRecording } from './cameraPipeline.js';

export type SupervisorOptions = {
  recording: RecordingConfig;
  ffmpeg?: FfmpegConfig;
  catalog?: Pick<CatalogClient, 'addMonitor' | 'deleteMonitor'> | null;
  storeRecording?: (recording: AnyFinalizedRecording) => void;
  commandFactory?: (options: CommandFactoryOptions) => ffmpeg.FfmpegCommand;
  random?: () => number;
  clock?: Clock;
  logger?: ComponentLogger;
};

export type CameraStatus = {
  camera_id: string;
  name: string;
  input: string;
  connected: boolean;
  state: IngestorState;
  active_segment_start: number | null;
  event_session_open: boolean;
  event_session_deadline: number | null;
  registered: boolean | null;
  health: PipelineHealth;
  health_reason: string | null;
  restarts: number;
  dropped_packets: Record<string, number>;
  buffer: RollingBufferStats;
  transport: string | null;
};

export type SupervisorStatus = {
  running: boolean;
  cameras: number;
  camera_ids: string[];
  details: Record<string, CameraStatus>;
};

type RegistryEntry = {
  pipeline: CameraPipeline;
  registered: boolean | null;
};

/**
 * Owns the camera registry. Adds and removes run one at a time under a
 * promise-chain lock; status reads never wait for it.
 */
export class CameraSupervisor {
  private readonly registry = new Map<string, RegistryEntry>();
  private lock: Promise<void> = Promise.resolve();
  private running = true;
  private readonly logger: ComponentLogger;
  private readonly store: (recording: AnyFinalizedRecording) => void;

  constructor(private readonly options: SupervisorOptions) {
    this.logger = options.logger ?? loggerModule;
    this.store = options.storeRecording ?? storeRecording;
  }

  /** Adds every configured camera; one bad camera does not stop the rest. */
  async start(cameras: CameraConfig[]): Promise<void> {
    this.running = true;
    for (const camera of cameras) {
      try {
        await this.addCamera(camera);
      } catch (error) {
        this.logger.error({ err: error, camera: camera.id }, 'Failed to start camera');
      }
    }
  }

  async addCamera(input: unknown): Promise<CameraStatus> {
    const camera = validateCameraConfig(input);
    const entry = await this.withLock(async () => {
      if (this.registry.has(camera.id)) {
        throw new CameraConflictError(camera.id);
      }
      const pipeline = this.createPipeline(camera);
      const created: RegistryEntry = { pipeline, registered: null };
      this.registry.set(camera.id, created);
      try {
        await pipeline.start();
      } catch (error) {
        this.registry.delete(camera.id);
        await pipeline.stop();
        throw error;
      }
      this.logger.info({ camera: camera.id, input: redactInput(camera.input) }, 'Camera added');
      return created;
    });

    const catalog = this.options.catalog;
    if (catalog) {
      entry.registered = await catalog.addMonitor(camera.id, {
        name: camera.name,
        input: camera.input,
        rtspTransport: camera.ffmpeg?.rtspTransport === 'udp' ? 'udp' : 'tcp'
      });
    }
    return this.describe(camera.id, entry);
  }

  async removeCamera(cameraId: string): Promise<void> {
    const id = normalizeCameraId(cameraId);
    await this.withLock(async () => {
      const entry = this.registry.get(id);
      if (!entry) {
        throw new CameraNotFoundError(cameraId);
      }
      this.registry.delete(id);
      try {
        await entry.pipeline.stop();
      } catch (error) {
        this.logger.error({ err: error, camera: id }, 'Failed to stop camera pipeline');
      }
      entry.pipeline.removeAllListeners();
      this.logger.info({ camera: id }, 'Camera removed');
    });

    const catalog = this.options.catalog;
    if (catalog) {
      await catalog.deleteMonitor(id);
    }
  }

  hasCamera(cameraId: string): boolean {
    return this.registry.has(normalizeCameraId(cameraId));
  }

  getPipeline(cameraId: string): CameraPipeline | null {
    return this.registry.get(normalizeCameraId(cameraId))?.pipeline ?? null;
  }

  trigger(event: RecorderEvent): Promise<TriggerResult> {
    if (!this.running) {
      return Promise.reject(new RecorderError('transient', 'RECORDER_STOPPED', 'Recorder is shutting down', 503));
    }
    const entry = this.registry.get(normalizeCameraId(event.cameraId));
    if (!entry) {
      return Promise.reject(new CameraNotFoundError(event.cameraId));
    }
    return entry.pipeline.trigger(event);
  }

  cameraStatus(cameraId: string): CameraStatus {
    const id = normalizeCameraId(cameraId);
    const entry = this.registry.get(id);
    if (!entry) {
      throw new CameraNotFoundError(cameraId);
    }
    return this.describe(id, entry);
  }

  status(): SupervisorStatus {
    const details: Record<string, CameraStatus> = {};
    for (const [id, entry] of this.registry) {
      details[id] = this.describe(id, entry);
    }
    const ids = Object.keys(details);
    return { running: this.running, cameras: ids.length, camera_ids: ids, details };
  }

  async stop(): Promise<void> {
    this.running = false;
    const ids = [...this.registry.keys()];
    for (const id of ids) {
      try {
        await this.removeCamera(id);
      } catch (error) {
        this.logger.warn({ err: error, camera: id }, 'Failed to remove camera during shutdown');
      }
    }
  }

  private createPipeline(camera: CameraConfig): CameraPipeline {
    const pipeline = new CameraPipeline({
      camera,
      recording: this.options.recording,
      ffmpeg: this.options.ffmpeg,
      commandFactory: this.options.commandFactory,
      random: this.options.random,
      clock: this.options.clock,
      logger: this.logger
    });
    pipeline.on('recording', (recording: AnyFinalizedRecording) => {
      try {
        this.store(recording);
      } catch (error) {
        this.logger.warn({ err: error, camera: camera.id, file: recording.filePath }, 'Failed to index recording');
      }
    });
    pipeline.on('fatal', (error: Error) => {
      this.logger.error({ err: error, camera: camera.id }, 'Camera pipeline failed');
    });
    return pipeline;
  }

  private describe(id: string, entry: RegistryEntry): CameraStatus {
    const status = entry.pipeline.status();
    const camera = entry.pipeline.camera;
    return {
      camera_id: id,
      name: camera.name ?? id,
      input: redactInput(camera.input),
      connected: status.connected,
      state: status.state,
      active_segment_start: status.active_segment_start,
      event_session_open: status.event_session.open,
      event_session_deadline: status.event_session.deadline,
      registered: entry.registered,
      health: status.health,
      health_reason: status.health_reason,
      restarts: status.restarts,
      dropped_packets: status.dropped_packets,
      buffer: status.buffer,
      transport: status.transport
    };
  }

  private withLock<T>(work: () => Promise<T>): Promise<T> {
    const run = this.lock.then(work);
    this.lock = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}
