import { EventEmitter } from 'node:events';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import { CameraNotFoundError, EventValidationError } from '../src/errors.js';
import {
  EventDispatcher,
  classifyTopic,
  normalizeEventPayload,
  type DispatchTarget
} from '../src/events/dispatcher.js';
import metrics from '../src/metrics/index.js';
import type { TriggerResult } from '../src/recording/eventRecorder.js';
import type { RecorderEvent } from '../src/types.js';

function deferred<T>() {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>(res => {
    resolve = res;
  });
  return { promise, resolve };
}

class FakeTarget implements DispatchTarget {
  readonly triggered: RecorderEvent[] = [];
  readonly gates = new Map<string, Promise<void>>();

  constructor(private readonly cameras: string[]) {}

  hasCamera(cameraId: string) {
    return this.cameras.includes(cameraId);
  }

  async trigger(event: RecorderEvent): Promise<TriggerResult> {
    await this.gates.get(event.cameraId);
    this.triggered.push(event);
    return { status: 'opened', cameraId: event.cameraId, triggerAt: event.timestamp, deadline: event.timestamp + 60 };
  }
}

const log = { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };

describe('EventDispatcher', () => {
  let now: number;
  let target: FakeTarget;
  let stored: Array<[RecorderEvent, string]>;
  let catalog: { triggerEvent: ReturnType<typeof vi.fn> };
  let dispatcher: EventDispatcher;

  beforeEach(() => {
    metrics.reset();
    vi.clearAllMocks();
    now = 1000;
    target = new FakeTarget(['cam-1', 'cam-2']);
    stored = [];
    catalog = { triggerEvent: vi.fn(async () => true) };
    dispatcher = new EventDispatcher({
      target,
      store: (event, status) => stored.push([event, status]),
      catalog,
      clock: () => now,
      log
    });
  });

  it('DispatcherNormalizesManualPayloads', () => {
    const event = normalizeEventPayload(
      { camera_id: ' cam-1 ', alarm_type: 'door', metadata: { source: 'panel' } },
      { origin: 'manual', defaultEventType: 'alarm' },
      () => 42
    );

    expect(event).toEqual({
      cameraId: 'cam-1',
      eventType: 'alarm',
      timestamp: 42,
      metadata: { source: 'panel', alarm_type: 'door' },
      origin: 'manual'
    });
  });

  it('DispatcherParsesIsoTimestamps', () => {
    const event = normalizeEventPayload(
      { camera_id: 'cam-1', event_type: 'motion', timestamp: '1970-01-01T00:01:40Z' },
      { origin: 'manual' }
    );
    expect(event.timestamp).toBe(100);
  });

  it('DispatcherClassifiesTopics', () => {
    expect(classifyTopic('tns1:RuleEngine/CellMotionDetector/Motion')).toBe('motion');
    expect(classifyTopic('tns1:VideoSource/MotionAlarm')).toBe('motion');
    expect(classifyTopic('tns1:Device/Trigger/DigitalInput')).toBe('alarm');
    expect(classifyTopic('tns1:Device/HardwareFailure/StorageFailure')).toBeNull();

    const event = normalizeEventPayload(
      { camera_id: 'cam-1', topic: 'tns1:Device/Trigger/DigitalInput', timestamp: 5 },
      { origin: 'monitor' }
    );
    expect(event).toMatchObject({ eventType: 'alarm', metadata: { topic: 'tns1:Device/Trigger/DigitalInput' } });
  });

  it('DispatcherRejectsMalformedPayloads', async () => {
    await expect(dispatcher.dispatch({ event_type: 'motion' }, { origin: 'manual' })).rejects.toBeInstanceOf(
      EventValidationError
    );
    await expect(
      dispatcher.dispatch({ camera_id: '../etc', event_type: 'motion' }, { origin: 'manual' })
    ).rejects.toBeInstanceOf(EventValidationError);
    await expect(dispatcher.dispatch({ camera_id: 'cam-1' }, { origin: 'manual' })).rejects.toThrow(
      'Invalid event payload'
    );
    await expect(
      dispatcher.dispatch({ camera_id: 'cam-9', event_type: 'motion' }, { origin: 'manual' })
    ).rejects.toBeInstanceOf(CameraNotFoundError);

    expect(target.triggered).toHaveLength(0);
    expect(metrics.snapshot().events.rejected).toBe(4);
  });

  it('DispatcherDedupesWithinWindow', async () => {
    const payload = { camera_id: 'cam-1', event_type: 'motion', timestamp: 990 };

    const first = await dispatcher.dispatch(payload, { origin: 'manual' });
    const second = await dispatcher.dispatch(payload, { origin: 'manual' });
    expect(first.status).toBe('dispatched');
    expect(second.status).toBe('duplicate');
    expect(target.triggered).toHaveLength(1);

    now = 1300;
    const third = await dispatcher.dispatch(payload, { origin: 'manual' });
    expect(third.status).toBe('dispatched');
    expect(target.triggered).toHaveLength(2);

    expect(stored.map(([, status]) => status)).toEqual(['dispatched', 'duplicate', 'dispatched']);
    expect(metrics.snapshot().events).toMatchObject({ dispatched: 2, duplicates: 1, byType: { motion: 2 } });
  });

  it('DispatcherForwardsToCatalog', async () => {
    await dispatcher.dispatch({ camera_id: 'cam-2', event_type: 'alarm', timestamp: 1 }, { origin: 'monitor' });
    await dispatcher.flush();
    expect(catalog.triggerEvent).toHaveBeenCalledWith('cam-2', 'alarm event (monitor)');
  });

  it('DispatcherCameraIsolation keeps other cameras moving while one is blocked', async () => {
    const gate = deferred<void>();
    target.gates.set('cam-1', gate.promise);

    const blocked = dispatcher.dispatch({ camera_id: 'cam-1', event_type: 'motion', timestamp: 1 }, { origin: 'manual' });
    const queued = dispatcher.dispatch({ camera_id: 'cam-1', event_type: 'motion', timestamp: 2 }, { origin: 'manual' });
    const other = await dispatcher.dispatch({ camera_id: 'cam-2', event_type: 'motion', timestamp: 3 }, { origin: 'manual' });

    expect(other.status).toBe('dispatched');
    expect(target.triggered.map(event => event.cameraId)).toEqual(['cam-2']);

    gate.resolve();
    await Promise.all([blocked, queued]);
    expect(target.triggered.map(event => event.timestamp)).toEqual([3, 1, 2]);
  });

  it('DispatcherAttachSource dispatches monitor payloads until detached', async () => {
    const source = new EventEmitter();
    const dispatched: RecorderEvent[] = [];
    dispatcher.on('dispatched', (event: RecorderEvent) => dispatched.push(event));

    const detach = dispatcher.attachSource(source);
    source.emit('event', { camera_id: 'cam-1', topic: 'tns1:RuleEngine/CellMotionDetector/Motion', timestamp: 7 });
    source.emit('event', { camera_id: 'cam-1' });
    await dispatcher.flush();

    expect(dispatched).toHaveLength(1);
    expect(dispatched[0]).toMatchObject({ cameraId: 'cam-1', eventType: 'motion', origin: 'monitor' });
    expect(log.warn).toHaveBeenCalledWith(expect.objectContaining({ err: expect.any(EventValidationError) }), 'Failed to dispatch monitor event');

    detach();
    source.emit('event', { camera_id: 'cam-1', event_type: 'motion', timestamp: 8 });
    await dispatcher.flush();
    expect(dispatched).toHaveLength(1);
  });
});
