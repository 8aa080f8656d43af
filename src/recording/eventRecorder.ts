import { EventEmitter } from 'node:events';
import { StorageFatalError } from '../errors.js';
import loggerModule, { type ComponentLogger } from '../logger.js';
import metrics from '../metrics/index.js';
import type { PacketFanout, PacketSubscription } from '../pipeline/fanout.js';
import {
  systemClock,
  type Clock,
  type EventRecordingMetadata,
  type FinalizedRecording,
  type Packet,
  type RecorderEvent,
  type TriggeringEventRecord
} from '../types.js';
import type { RollingBuffer } from './ringBuffer.js';
import { PartialRecording, formatTimeOfDay, recordingDirectory, roundSeconds } from './storage.js';

const DEFAULT_POST_EVENT_DURATION_SEC = 60;
const DEFAULT_QUEUE_CAPACITY = 256;

export type EventRecorderOptions = {
  cameraId: string;
  baseDir: string;
  fanout: PacketFanout;
  buffer: RollingBuffer;
  postEventDurationSec?: number;
  queueCapacity?: number;
  clock?: Clock;
  logger?: ComponentLogger;
};

export type TriggerResult = {
  status: 'opened' | 'extended';
  cameraId: string;
  triggerAt: number;
  deadline: number;
};

export type EventSessionStatus = {
  open: boolean;
  eventType: string | null;
  triggerAt: number | null;
  deadline: number | null;
  events: number;
};

type CloseReason = 'deadline' | 'stopped';

type Session = {
  id: number;
  eventType: string;
  triggerAt: number;
  openedAt: number;
  deadline: number;
  preEventStart: number | null;
  lastQueuedTimestamp: number;
  frameCount: number;
  events: TriggeringEventRecord[];
  subscription: PacketSubscription;
  recording: PartialRecording | null;
  chain: Promise<void>;
  ready: Promise<void>;
  loop: Promise<void>;
  timer: NodeJS.Timeout | null;
  failed: boolean;
};

function fileSafe(value: string) {
  return value.replace(/[^A-Za-z0-9_-]+/g, '_').slice(0, 64) || 'event';
}

/**
 * Produces event recordings for one camera: the rolling buffer's contents
 * at trigger time followed by live packets until the session deadline.
 * Triggers that arrive while a session is open extend it.
 */
export class EventRecorder extends EventEmitter {
  private session: Session | null = null;
  private closing: Promise<void> | null = null;
  private sessionCounter = 0;
  private stopped = false;
  private readonly postEventDurationSec: number;
  private readonly clock: Clock;
  private readonly logger: ComponentLogger;

  constructor(private readonly options: EventRecorderOptions) {
    super();
    this.postEventDurationSec = options.postEventDurationSec ?? DEFAULT_POST_EVENT_DURATION_SEC;
    if (!(this.postEventDurationSec > 0)) {
      throw new RangeError('postEventDurationSec must be greater than 0');
    }
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? loggerModule;
  }

  get cameraId() {
    return this.options.cameraId;
  }

  isSessionOpen() {
    return this.session !== null;
  }

  getStatus(): EventSessionStatus {
    const session = this.session;
    return {
      open: session !== null,
      eventType: session?.eventType ?? null,
      triggerAt: session?.triggerAt ?? null,
      deadline: session?.deadline ?? null,
      events: session?.events.length ?? 0
    };
  }

  async trigger(event: RecorderEvent): Promise<TriggerResult> {
    if (this.stopped) {
      throw new Error(`Event recorder for camera ${this.options.cameraId} is stopped`);
    }

    if (this.closing) {
      await this.closing;
      if (this.stopped) {
        throw new Error(`Event recorder for camera ${this.options.cameraId} is stopped`);
      }
    }

    const now = this.clock();
    const triggerAt = Math.min(event.timestamp, now);
    const record: TriggeringEventRecord = {
      event_type: event.eventType,
      timestamp: event.timestamp,
      origin: event.origin,
      metadata: event.metadata
    };

    const current = this.session;
    if (current) {
      const candidate = now + this.postEventDurationSec;
      if (candidate > current.deadline) {
        current.deadline = candidate;
        this.scheduleClose(current);
      }
      current.events.push(record);
      metrics.recordEventSession(this.options.cameraId, 'extended');
      this.logger.info(
        { camera: this.options.cameraId, eventType: event.eventType, deadline: current.deadline },
        'Event session extended'
      );
      return { status: 'extended', cameraId: this.options.cameraId, triggerAt, deadline: current.deadline };
    }

    const session = this.openSession(event, triggerAt, now, record);
    const deadline = session.deadline;
    await session.ready;
    return { status: 'opened', cameraId: this.options.cameraId, triggerAt, deadline };
  }

  /** Closes the open session now, finalizing what has been captured so far. */
  async close(): Promise<void> {
    const session = this.session;
    if (session) {
      await this.closeSession(session, 'stopped');
      return;
    }
    if (this.closing) {
      await this.closing;
    }
  }

  async stop(): Promise<void> {
    this.stopped = true;
    await this.close();
  }

  /** The deadline runs from the recorder clock; the event timestamp only names the recording. */
  private openSession(
    event: RecorderEvent,
    triggerAt: number,
    openedAt: number,
    record: TriggeringEventRecord
  ): Session {
    this.sessionCounter += 1;
    const deadline = openedAt + this.postEventDurationSec;
    const snapshot = this.options.buffer.snapshot().filter(packet => packet.timestamp < deadline);
    const subscription = this.options.fanout.subscribe(`event-recorder-${this.sessionCounter}`, {
      capacity: this.options.queueCapacity ?? DEFAULT_QUEUE_CAPACITY
    });
    const first = snapshot[0];
    const last = snapshot[snapshot.length - 1];

    const session: Session = {
      id: this.sessionCounter,
      eventType: event.eventType,
      triggerAt,
      openedAt,
      deadline,
      preEventStart: first ? first.timestamp : null,
      lastQueuedTimestamp: last ? last.timestamp : Number.NEGATIVE_INFINITY,
      frameCount: 0,
      events: [record],
      subscription,
      recording: null,
      chain: Promise.resolve(),
      ready: Promise.resolve(),
      loop: Promise.resolve(),
      timer: null,
      failed: false
    };
    this.session = session;

    const directory = recordingDirectory(this.options.baseDir, this.options.cameraId, triggerAt);
    const baseName = `event_${formatTimeOfDay(triggerAt)}_${fileSafe(event.eventType)}`;
    session.ready = this.runOperation(session, async () => {
      session.recording = await PartialRecording.open(directory, baseName);
      for (const packet of snapshot) {
        await this.writePacket(session, packet);
      }
    });
    session.loop = this.consumeContinuation(session);
    this.scheduleClose(session);

    metrics.recordEventSession(this.options.cameraId, 'opened');
    this.logger.info(
      {
        camera: this.options.cameraId,
        eventType: event.eventType,
        origin: event.origin,
        triggerAt,
        deadline,
        preEventPackets: snapshot.length
      },
      'Event session opened'
    );
    return session;
  }

  private async consumeContinuation(session: Session) {
    for await (const packet of session.subscription) {
      if (packet.timestamp < session.lastQueuedTimestamp || packet.timestamp >= session.deadline) {
        continue;
      }
      session.lastQueuedTimestamp = packet.timestamp;
      await this.runOperation(session, () => this.writePacket(session, packet));
    }
  }

  private async writePacket(session: Session, packet: Packet) {
    const recording = session.recording;
    if (!recording) {
      return;
    }
    await recording.write(packet.data);
    session.frameCount += 1;
  }

  private runOperation(session: Session, operation: () => Promise<void>): Promise<void> {
    session.chain = session.chain.then(async () => {
      if (session.failed) {
        return;
      }
      try {
        await operation();
      } catch (error) {
        this.failSession(session, error);
      }
    });
    return session.chain;
  }

  private scheduleClose(session: Session) {
    if (session.timer) {
      clearTimeout(session.timer);
    }
    const delayMs = Math.max(0, (session.deadline - this.clock()) * 1000);
    session.timer = setTimeout(() => {
      session.timer = null;
      void this.closeSession(session, 'deadline');
    }, delayMs);
    session.timer.unref?.();
  }

  private closeSession(session: Session, reason: CloseReason): Promise<void> {
    if (this.session !== session) {
      return this.closing ?? Promise.resolve();
    }

    this.session = null;
    if (session.timer) {
      clearTimeout(session.timer);
      session.timer = null;
    }
    const closedAt = this.clock();
    session.subscription.close();

    const closing = this.finalizeSession(session, reason, closedAt);
    this.closing = closing;
    void closing.finally(() => {
      if (this.closing === closing) {
        this.closing = null;
      }
    });
    return closing;
  }

  private async finalizeSession(session: Session, reason: CloseReason, closedAt: number) {
    await session.ready;
    await session.loop;
    await session.chain;

    const recording = session.recording;
    metrics.recordEventSession(this.options.cameraId, 'closed');
    if (session.failed || !recording) {
      if (recording) {
        await recording.discard().catch(error => {
          this.logger.warn({ err: error, camera: this.options.cameraId }, 'Failed to discard event recording');
        });
      }
      return;
    }

    const triggerTimestamp = roundSeconds(session.triggerAt);
    const postEventStart = roundSeconds(session.openedAt);
    const postEventEnd = roundSeconds(
      reason === 'deadline' ? session.deadline : Math.min(session.deadline, Math.max(session.openedAt, closedAt))
    );
    const preEventStart = session.preEventStart === null ? null : roundSeconds(session.preEventStart);
    const metadata: EventRecordingMetadata = {
      camera_id: this.options.cameraId,
      type: 'event',
      event_type: session.eventType,
      trigger_timestamp: triggerTimestamp,
      pre_event_start: preEventStart,
      pre_event_duration: preEventStart === null ? 0 : roundSeconds(Math.max(0, postEventStart - preEventStart)),
      post_event_start: postEventStart,
      post_event_end: postEventEnd,
      post_event_duration: roundSeconds(postEventEnd - postEventStart),
      frame_count: session.frameCount,
      bytes: recording.bytes,
      keep: true,
      file: recording.fileName,
      triggering_events: session.events
    };

    let paths: { filePath: string; metadataPath: string };
    try {
      paths = await recording.finalize(metadata);
    } catch (error) {
      this.failSession(session, error);
      return;
    }

    this.logger.info(
      {
        camera: this.options.cameraId,
        file: metadata.file,
        frames: metadata.frame_count,
        events: metadata.triggering_events.length,
        reason
      },
      'Event recording finalized'
    );
    const finalized: FinalizedRecording<EventRecordingMetadata> = {
      cameraId: this.options.cameraId,
      filePath: paths.filePath,
      metadataPath: paths.metadataPath,
      metadata
    };
    this.emit('recording', finalized);
  }

  private failSession(session: Session, error: unknown) {
    if (session.failed) {
      return;
    }
    session.failed = true;
    session.subscription.close({ discard: true });
    const location = session.recording?.partialPath ?? this.options.baseDir;
    metrics.recordStorageFailure(this.options.cameraId);
    const fatal = new StorageFatalError(this.options.cameraId, location, error);
    this.logger.error({ err: error, camera: this.options.cameraId, path: location }, fatal.message);
    this.emit('fatal', fatal);
    if (this.session === session) {
      void this.closeSession(session, 'stopped');
    }
  }
}
