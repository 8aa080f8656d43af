import { beforeEach, describe, expect, it, vi } from 'vitest';
import metrics from '../src/metrics/index.js';
import { PacketFanout } from '../src/pipeline/fanout.js';
import type { Packet } from '../src/types.js';

function packet(timestamp: number): Packet {
  const data = Buffer.from([timestamp % 256]);
  return Object.freeze({ cameraId: 'cam-1', timestamp, data, byteLength: data.length });
}

const quietLogger = { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };

describe('PacketFanout', () => {
  beforeEach(() => {
    metrics.reset();
    vi.clearAllMocks();
  });

  it('FanoutDropOldest keeps the newest packets when a consumer falls behind', async () => {
    const fanout = new PacketFanout({ cameraId: 'cam-1', logger: quietLogger });
    const slow = fanout.subscribe('slow', { capacity: 3 });

    for (let ts = 0; ts < 5; ts += 1) {
      fanout.publish(packet(ts));
    }
    slow.close();

    const received: number[] = [];
    for await (const item of slow) {
      received.push(item.timestamp);
    }

    expect(received).toEqual([2, 3, 4]);
    expect(slow.dropped).toBe(2);
    expect(metrics.snapshot().pipelines.byCamera['cam-1']?.drops).toEqual({ slow: 2 });
    expect(quietLogger.warn).toHaveBeenCalledTimes(1);
  });

  it('FanoutIndependentConsumers delivers to every subscriber without waiting', async () => {
    const fanout = new PacketFanout({ cameraId: 'cam-1', logger: quietLogger });
    const fast = fanout.subscribe('fast', { capacity: 10 });
    const slow = fanout.subscribe('slow', { capacity: 1 });

    const pending = fast.next();
    fanout.publish(packet(1));
    fanout.publish(packet(2));

    await expect(pending).resolves.toEqual({ value: packet(1), done: false });
    await expect(fast.next()).resolves.toEqual({ value: packet(2), done: false });
    await expect(slow.next()).resolves.toEqual({ value: packet(2), done: false });
    expect(fanout.droppedByConsumer()).toEqual({ fast: 0, slow: 1 });
  });

  it('FanoutTapsRunInline and a failing tap does not affect others', () => {
    const fanout = new PacketFanout({ cameraId: 'cam-1', logger: quietLogger });
    const seen: number[] = [];
    fanout.tap('broken', () => {
      throw new Error('tap failure');
    });
    const untap = fanout.tap('buffer', item => seen.push(item.timestamp));

    fanout.publish(packet(1));
    untap();
    fanout.publish(packet(2));

    expect(seen).toEqual([1]);
    expect(quietLogger.error).toHaveBeenCalledTimes(2);
  });

  it('FanoutClose ends waiting iterators and removes subscriptions', async () => {
    const fanout = new PacketFanout({ cameraId: 'cam-1', logger: quietLogger });
    const subscription = fanout.subscribe('writer');
    const pending = subscription.next();

    fanout.close();

    await expect(pending).resolves.toEqual({ value: undefined, done: true });
    expect(fanout.droppedByConsumer()).toEqual({});
    expect(() => fanout.subscribe('writer')).not.toThrow();
  });

  it('FanoutWhenIdle resolves once the consumer waits on an empty queue', async () => {
    const fanout = new PacketFanout({ cameraId: 'cam-1', logger: quietLogger });
    const subscription = fanout.subscribe('writer');
    for (let ts = 0; ts < 3; ts += 1) {
      fanout.publish(packet(ts));
    }

    let idle = false;
    const waiting = subscription.whenIdle().then(() => {
      idle = true;
    });
    for (let index = 0; index < 3; index += 1) {
      await subscription.next();
    }
    await Promise.resolve();
    expect(idle).toBe(false);

    const pending = subscription.next();
    await waiting;
    expect(idle).toBe(true);

    subscription.close();
    expect(await pending).toEqual({ value: undefined, done: true });
    await expect(subscription.whenIdle()).resolves.toBeUndefined();
  });

  it('FanoutRejectsDuplicateNames', () => {
    const fanout = new PacketFanout({ cameraId: 'cam-1', logger: quietLogger });
    fanout.subscribe('writer');
    expect(() => fanout.subscribe('writer')).toThrow('Subscription "writer" already exists for camera cam-1');
  });
});
