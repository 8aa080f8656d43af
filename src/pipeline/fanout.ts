import loggerModule, { type ComponentLogger } from '../logger.js';
import metrics from '../metrics/index.js';
import type { Packet } from '../types.js';

const DEFAULT_QUEUE_CAPACITY = 256;

export type PacketTap = (packet: Packet) => void;

export type FanoutOptions = {
  cameraId: string;
  defaultCapacity?: number;
  logger?: ComponentLogger;
};

export type SubscribeOptions = {
  capacity?: number;
};

/**
 * Bounded queue for one consumer. When the consumer falls behind, the
 * oldest queued packet is dropped so the producer never waits.
 */
export class PacketSubscription implements AsyncIterableIterator<Packet> {
  private queue: Array<Packet | undefined> = [];
  private head = 0;
  private waiter: ((result: IteratorResult<Packet>) => void) | null = null;
  private idleWaiters: Array<() => void> = [];
  private closed = false;
  private droppedCount = 0;

  constructor(
    readonly name: string,
    readonly capacity: number,
    private readonly onDrop: (count: number) => void,
    private readonly onClose: () => void
  ) {}

  get dropped() {
    return this.droppedCount;
  }

  get size() {
    return this.queue.length - this.head;
  }

  get isClosed() {
    return this.closed;
  }

  push(packet: Packet) {
    if (this.closed) {
      return;
    }

    const waiter = this.waiter;
    if (waiter) {
      this.waiter = null;
      waiter({ value: packet, done: false });
      return;
    }

    if (this.size >= this.capacity) {
      this.queue[this.head] = undefined;
      this.head += 1;
      this.droppedCount += 1;
      this.onDrop(1);
    }

    this.queue.push(packet);
    this.compact();
  }

  next(): Promise<IteratorResult<Packet>> {
    const packet = this.shift();
    if (packet) {
      return Promise.resolve({ value: packet, done: false });
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    const pending = new Promise<IteratorResult<Packet>>(resolve => {
      this.waiter = resolve;
    });
    this.notifyIdle();
    return pending;
  }

  /**
   * Resolves once the consumer has taken every queued packet and is waiting
   * for the next one, or the subscription is closed.
   */
  whenIdle(): Promise<void> {
    if (this.closed || (this.waiter !== null && this.size === 0)) {
      return Promise.resolve();
    }
    return new Promise(resolve => {
      this.idleWaiters.push(resolve);
    });
  }

  return(): Promise<IteratorResult<Packet>> {
    this.close({ discard: true });
    return Promise.resolve({ value: undefined, done: true });
  }

  /**
   * Ends the subscription. Queued packets are still delivered unless
   * `discard` is set.
   */
  close(options: { discard?: boolean } = {}) {
    if (options.discard) {
      this.queue = [];
      this.head = 0;
    }
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.onClose();
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = null;
      waiter({ value: undefined, done: true });
    }
    this.notifyIdle();
  }

  [Symbol.asyncIterator]() {
    return this;
  }

  private notifyIdle() {
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) {
      resolve();
    }
  }

  private shift(): Packet | undefined {
    if (this.head >= this.queue.length) {
      return undefined;
    }
    const packet = this.queue[this.head];
    this.queue[this.head] = undefined;
    this.head += 1;
    this.compact();
    return packet;
  }

  private compact() {
    if (this.head > 0 && this.head * 2 >= this.queue.length) {
      this.queue = this.queue.slice(this.head);
      this.head = 0;
    }
  }
}

export class PacketFanout {
  private readonly subscriptions = new Map<string, PacketSubscription>();
  private readonly taps = new Map<string, PacketTap>();
  private readonly logger: ComponentLogger;
  private readonly defaultCapacity: number;
  private closed = false;

  constructor(private readonly options: FanoutOptions) {
    this.logger = options.logger ?? loggerModule;
    this.defaultCapacity = Math.max(1, options.defaultCapacity ?? DEFAULT_QUEUE_CAPACITY);
  }

  get cameraId() {
    return this.options.cameraId;
  }

  publish(packet: Packet) {
    if (this.closed) {
      return;
    }

    for (const [name, handler] of this.taps) {
      try {
        handler(packet);
      } catch (error) {
        this.logger.error({ err: error, camera: this.options.cameraId, consumer: name }, 'Packet tap failed');
      }
    }

    for (const subscription of this.subscriptions.values()) {
      subscription.push(packet);
    }
  }

  subscribe(name: string, options: SubscribeOptions = {}): PacketSubscription {
    if (this.subscriptions.has(name)) {
      throw new Error(`Subscription "${name}" already exists for camera ${this.options.cameraId}`);
    }

    const capacity = Math.max(1, options.capacity ?? this.defaultCapacity);
    const created = new PacketSubscription(
      name,
      capacity,
      count => {
        metrics.recordDroppedPackets(this.options.cameraId, name, count);
        if (created.dropped === 1 || created.dropped % 100 === 0) {
          this.logger.warn(
            { camera: this.options.cameraId, consumer: name, dropped: created.dropped },
            'Consumer queue full, dropping oldest packets'
          );
        }
      },
      () => {
        if (this.subscriptions.get(name) === created) {
          this.subscriptions.delete(name);
        }
      }
    );

    if (this.closed) {
      created.close();
      return created;
    }

    this.subscriptions.set(name, created);
    return created;
  }

  tap(name: string, handler: PacketTap): () => void {
    this.taps.set(name, handler);
    return () => {
      if (this.taps.get(name) === handler) {
        this.taps.delete(name);
      }
    };
  }

  droppedByConsumer(): Record<string, number> {
    const result: Record<string, number> = {};
    for (const [name, subscription] of this.subscriptions) {
      result[name] = subscription.dropped;
    }
    return result;
  }

  close() {
    this.closed = true;
    this.taps.clear();
    for (const subscription of Array.from(this.subscriptions.values())) {
      subscription.close();
    }
  }
}
