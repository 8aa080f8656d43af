import loggerModule, { type ComponentLogger } from '../logger.js';
import metrics from '../metrics/index.js';
import type { Packet } from '../types.js';

const DEFAULT_MAX_PACKETS = 5400;
const DEFAULT_MAX_BYTES = 256 * 1024 * 1024;

export type RollingBufferOptions = {
  cameraId: string;
  windowSec: number;
  maxPackets?: number;
  maxBytes?: number;
  logger?: ComponentLogger;
};

export type RollingBufferStats = {
  packets: number;
  bytes: number;
  oldest: number | null;
  newest: number | null;
  spanSec: number;
  windowSec: number;
  evicted: number;
  capacityEvicted: number;
  rejected: number;
  degraded: boolean;
};

/**
 * Time-windowed history of the most recent packets for one camera.
 * Retained packets always satisfy `newest - oldest < windowSec`.
 */
export class RollingBuffer {
  private packets: Array<Packet | undefined> = [];
  private head = 0;
  private totalBytes = 0;
  private evictedCount = 0;
  private capacityEvictedCount = 0;
  private rejectedCount = 0;
  private degraded = false;
  private readonly maxPackets: number;
  private readonly maxBytes: number;
  private readonly logger: ComponentLogger;

  constructor(private readonly options: RollingBufferOptions) {
    if (!(options.windowSec > 0)) {
      throw new RangeError('windowSec must be greater than 0');
    }
    this.maxPackets = Math.max(1, options.maxPackets ?? DEFAULT_MAX_PACKETS);
    this.maxBytes = Math.max(1, options.maxBytes ?? DEFAULT_MAX_BYTES);
    this.logger = options.logger ?? loggerModule;
  }

  get size() {
    return this.packets.length - this.head;
  }

  get windowSec() {
    return this.options.windowSec;
  }

  push(packet: Packet): boolean {
    const newest = this.newest();
    if (newest && packet.timestamp < newest.timestamp) {
      this.rejectedCount += 1;
      metrics.recordRejectedPacket(this.options.cameraId);
      this.logger.debug(
        { camera: this.options.cameraId, timestamp: packet.timestamp, newest: newest.timestamp },
        'Rejected out-of-order packet'
      );
      return false;
    }

    this.packets.push(packet);
    this.totalBytes += packet.byteLength;

    const windowStart = packet.timestamp - this.options.windowSec;
    let oldest = this.oldest();
    while (oldest && oldest.timestamp <= windowStart) {
      this.evictOldest();
      oldest = this.oldest();
    }

    let capacityEvictions = 0;
    while (this.size > 1 && (this.size > this.maxPackets || this.totalBytes > this.maxBytes)) {
      this.evictOldest();
      capacityEvictions += 1;
    }

    this.compact();
    this.trackCapacity(capacityEvictions);
    return true;
  }

  /** Frozen, ordered copy of the retained packets. */
  snapshot(): readonly Packet[] {
    const copy: Packet[] = [];
    for (let index = this.head; index < this.packets.length; index += 1) {
      const packet = this.packets[index];
      if (packet) {
        copy.push(packet);
      }
    }
    return Object.freeze(copy);
  }

  clear() {
    this.packets = [];
    this.head = 0;
    this.totalBytes = 0;
    this.degraded = false;
  }

  stats(): RollingBufferStats {
    const oldest = this.oldest()?.timestamp ?? null;
    const newest = this.newest()?.timestamp ?? null;
    return {
      packets: this.size,
      bytes: this.totalBytes,
      oldest,
      newest,
      spanSec: oldest !== null && newest !== null ? newest - oldest : 0,
      windowSec: this.options.windowSec,
      evicted: this.evictedCount,
      capacityEvicted: this.capacityEvictedCount,
      rejected: this.rejectedCount,
      degraded: this.degraded
    };
  }

  private trackCapacity(capacityEvictions: number) {
    if (capacityEvictions > 0) {
      this.capacityEvictedCount += capacityEvictions;
      const startedEpisode = !this.degraded;
      metrics.recordBufferEviction(this.options.cameraId, capacityEvictions, startedEpisode);
      if (startedEpisode) {
        this.degraded = true;
        this.logger.warn(
          {
            camera: this.options.cameraId,
            packets: this.size,
            bytes: this.totalBytes,
            maxPackets: this.maxPackets,
            maxBytes: this.maxBytes
          },
          'Pre-event buffer reached its ceiling, evicting early'
        );
      }
      return;
    }

    if (this.degraded) {
      this.degraded = false;
      this.logger.info({ camera: this.options.cameraId, packets: this.size }, 'Pre-event buffer capacity recovered');
    }
  }

  private oldest(): Packet | undefined {
    return this.packets[this.head];
  }

  private newest(): Packet | undefined {
    return this.size > 0 ? this.packets[this.packets.length - 1] : undefined;
  }

  private evictOldest() {
    const packet = this.packets[this.head];
    if (!packet) {
      return;
    }
    this.packets[this.head] = undefined;
    this.head += 1;
    this.totalBytes -= packet.byteLength;
    this.evictedCount += 1;
  }

  private compact() {
    if (this.head > 1024 && this.head * 2 >= this.packets.length) {
      this.packets = this.packets.slice(this.head);
      this.head = 0;
    }
  }
}
