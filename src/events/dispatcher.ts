import { EventEmitter } from 'node:events';
import { z } from 'zod';
import type { CatalogClient } from '../catalog/client.js';
import { storeEvent, type CatalogEventStatus } from '../db.js';
import { CameraNotFoundError, EventValidationError } from '../errors.js';
import loggerModule, { type ComponentLogger } from '../logger.js';
import metrics, { type MetricsRegistry } from '../metrics/index.js';
import type { TriggerResult } from '../recording/eventRecorder.js';
import { systemClock, type Clock, type EventOrigin, type RecorderEvent } from '../types.js';
import { normalizeCameraId } from '../utils/camera.js';

const DEFAULT_DEDUPE_WINDOW_SEC = 300;

export interface DispatchTarget {
  hasCamera(cameraId: string): boolean;
  trigger(event: RecorderEvent): Promise<TriggerResult>;
}

export interface EventSource {
  on(event: 'event', listener: (payload: unknown) => void): unknown;
  off(event: 'event', listener: (payload: unknown) => void): unknown;
}

export type DispatchOptions = {
  origin: EventOrigin;
  defaultEventType?: string;
};

export type DispatchResult =
  | { status: 'dispatched'; event: RecorderEvent; recording: TriggerResult }
  | { status: 'duplicate'; event: RecorderEvent };

interface EventDispatcherDependencies {
  target: DispatchTarget;
  store?: (event: RecorderEvent, status: CatalogEventStatus) => void;
  catalog?: Pick<CatalogClient, 'triggerEvent'> | null;
  dedupeWindowSec?: number;
  clock?: Clock;
  log?: ComponentLogger;
  metrics?: MetricsRegistry;
}

const timestampSchema = z.union([
  z.number().finite().nonnegative(),
  z
    .string()
    .datetime({ offset: true })
    .transform(value => Date.parse(value) / 1000)
]);

const eventPayloadSchema = z.object({
  camera_id: z.string().trim().min(1, 'camera_id is required'),
  event_type: z.string().trim().min(1).max(64).optional(),
  timestamp: timestampSchema.nullish(),
  metadata: z.record(z.unknown()).optional(),
  alarm_type: z.string().trim().min(1).optional(),
  topic: z.string().trim().min(1).optional()
});

/** Maps an ONVIF-style notification topic onto an event type. */
export function classifyTopic(topic: string): 'motion' | 'alarm' | null {
  if (/motion/i.test(topic)) {
    return 'motion';
  }
  if (/alarm|digitalinput/i.test(topic)) {
    return 'alarm';
  }
  return null;
}

/**
 * Validates a raw trigger payload and turns it into an event. Throws
 * EventValidationError for anything that cannot be recorded.
 */
export function normalizeEventPayload(payload: unknown, options: DispatchOptions, clock: Clock = systemClock): RecorderEvent {
  const parsed = eventPayloadSchema.safeParse(payload);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.') || 'payload'}: ${issue.message}`);
    throw new EventValidationError('Invalid event payload', issues);
  }

  const data = parsed.data;
  const cameraId = normalizeCameraId(data.camera_id);
  if (!cameraId) {
    throw new EventValidationError('Invalid event payload', [`camera_id: "${data.camera_id}" is not a valid camera id`]);
  }

  const eventType = data.event_type ?? (data.topic ? classifyTopic(data.topic) : null) ?? options.defaultEventType;
  if (!eventType) {
    const issue = data.topic ? `topic: "${data.topic}" is not a recognised event topic` : 'event_type: Required';
    throw new EventValidationError('Invalid event payload', [issue]);
  }

  const metadata: Record<string, unknown> = { ...(data.metadata ?? {}) };
  if (data.alarm_type) {
    metadata.alarm_type = data.alarm_type;
  }
  if (data.topic) {
    metadata.topic = data.topic;
  }

  return {
    cameraId,
    eventType,
    timestamp: data.timestamp ?? clock(),
    metadata,
    origin: options.origin
  };
}

/**
 * Routes events from the monitor and manual origins to camera pipelines.
 * Repeats of the same (camera, type, timestamp) inside the dedupe window
 * are reported as duplicates. Each camera's triggers run in order on their
 * own chain.
 */
export class EventDispatcher extends EventEmitter {
  private readonly target: DispatchTarget;
  private readonly store: (event: RecorderEvent, status: CatalogEventStatus) => void;
  private readonly catalog: Pick<CatalogClient, 'triggerEvent'> | null;
  private readonly dedupeWindowSec: number;
  private readonly clock: Clock;
  private readonly log: ComponentLogger;
  private readonly metrics: MetricsRegistry;
  private readonly seen = new Map<string, number>();
  private readonly chains = new Map<string, Promise<void>>();
  private readonly pendingForwards = new Set<Promise<void>>();

  constructor(dependencies: EventDispatcherDependencies) {
    super();
    this.target = dependencies.target;
    this.store = dependencies.store ?? storeEvent;
    this.catalog = dependencies.catalog ?? null;
    this.dedupeWindowSec = dependencies.dedupeWindowSec ?? DEFAULT_DEDUPE_WINDOW_SEC;
    this.clock = dependencies.clock ?? systemClock;
    this.log = dependencies.log ?? loggerModule;
    this.metrics = dependencies.metrics ?? metrics;
  }

  async dispatch(payload: unknown, options: DispatchOptions): Promise<DispatchResult> {
    let event: RecorderEvent;
    try {
      event = normalizeEventPayload(payload, options, this.clock);
      if (!this.target.hasCamera(event.cameraId)) {
        throw new CameraNotFoundError(event.cameraId);
      }
    } catch (error) {
      this.metrics.recordDispatch('rejected');
      this.log.warn({ err: error, origin: options.origin }, 'Rejected event');
      throw error;
    }

    return this.enqueue(event.cameraId, () => this.route(event));
  }

  /** Subscribes to a push monitor; returns a function that detaches it. */
  attachSource(source: EventSource): () => void {
    const listener = (payload: unknown) => {
      this.dispatch(payload, { origin: 'monitor' }).catch(error => {
        this.log.warn({ err: error }, 'Failed to dispatch monitor event');
      });
    };
    source.on('event', listener);
    return () => {
      source.off('event', listener);
    };
  }

  /** Resolves once every catalog forward started so far has settled. */
  async flush(): Promise<void> {
    await Promise.all([...this.chains.values(), ...this.pendingForwards]);
  }

  clearDedupe() {
    this.seen.clear();
  }

  private enqueue<T>(cameraId: string, work: () => Promise<T>): Promise<T> {
    const previous = this.chains.get(cameraId) ?? Promise.resolve();
    const run = previous.then(work);
    const tail = run.then(
      () => undefined,
      () => undefined
    );
    this.chains.set(cameraId, tail);
    void tail.then(() => {
      if (this.chains.get(cameraId) === tail) {
        this.chains.delete(cameraId);
      }
    });
    return run;
  }

  private async route(event: RecorderEvent): Promise<DispatchResult> {
    const now = this.clock();
    this.pruneSeen(now);

    const key = `${event.cameraId}|${event.eventType}|${event.timestamp}`;
    if (this.seen.has(key)) {
      this.metrics.recordDispatch('duplicate');
      this.log.debug({ camera: event.cameraId, eventType: event.eventType }, 'Ignored duplicate event');
      this.persist(event, 'duplicate');
      return { status: 'duplicate', event };
    }

    this.seen.set(key, now + this.dedupeWindowSec);
    let recording: TriggerResult;
    try {
      recording = await this.target.trigger(event);
    } catch (error) {
      this.seen.delete(key);
      this.metrics.recordDispatch('rejected');
      this.log.error({ err: error, camera: event.cameraId, eventType: event.eventType }, 'Event trigger failed');
      throw error;
    }

    this.metrics.recordDispatch('dispatched', event);
    this.log.info(
      {
        camera: event.cameraId,
        eventType: event.eventType,
        origin: event.origin,
        session: recording.status,
        deadline: recording.deadline
      },
      'Event dispatched'
    );
    this.persist(event, 'dispatched');
    this.forward(event);
    this.emit('dispatched', event, recording);
    return { status: 'dispatched', event, recording };
  }

  private persist(event: RecorderEvent, status: CatalogEventStatus) {
    try {
      this.store(event, status);
    } catch (error) {
      this.log.warn({ err: error, camera: event.cameraId }, 'Failed to store event in catalog');
    }
  }

  private forward(event: RecorderEvent) {
    const catalog = this.catalog;
    if (!catalog) {
      return;
    }
    const pending = catalog
      .triggerEvent(event.cameraId, `${event.eventType} event (${event.origin})`)
      .then(
        () => undefined,
        error => {
          this.log.warn({ err: error, camera: event.cameraId }, 'Failed to forward event to catalog');
        }
      );
    this.pendingForwards.add(pending);
    void pending.then(() => {
      this.pendingForwards.delete(pending);
    });
  }

  private pruneSeen(now: number) {
    for (const [key, expiresAt] of this.seen) {
      if (expiresAt <= now) {
        this.seen.delete(key);
      }
    }
  }
}
