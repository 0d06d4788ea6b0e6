import pLimit from 'p-limit';
import type { LimitFunction } from 'p-limit';

export interface DeviceLease {
  readonly device: number;
  /** Idempotent; the next waiter for the device starts once this is called. */
  release(): void;
}

export interface DeviceStatus {
  device: number;
  busy: boolean;
  pending: number;
}

/**
 * One exclusive slot per accelerator. Waiters queue in arrival order and
 * block without a timeout while the device is held.
 */
export class DeviceLocks {
  private readonly limiters = new Map<number, LimitFunction>();

  constructor(private readonly deviceCount: number) {
    if (!Number.isInteger(deviceCount) || deviceCount < 1) {
      throw new RangeError(`deviceCount must be a positive integer (got ${deviceCount})`);
    }
  }

  acquire(device: number): Promise<DeviceLease> {
    const limit = this.limiterFor(device);
    return new Promise<DeviceLease>((resolveLease) => {
      void limit(
        () =>
          new Promise<void>((done) => {
            let released = false;
            resolveLease({
              device,
              release: () => {
                if (released) return;
                released = true;
                done();
              },
            });
          })
      );
    });
  }

  async runExclusive<T>(device: number, fn: () => Promise<T> | T): Promise<T> {
    const lease = await this.acquire(device);
    try {
      return await fn();
    } finally {
      lease.release();
    }
  }

  /**
   * Holds the device for as long as the source is being consumed. The lease is
   * released when the source finishes, throws, or the consumer stops early.
   */
  async *hold<T>(device: number, source: () => AsyncIterable<T>): AsyncGenerator<T> {
    const lease = await this.acquire(device);
    try {
      yield* source();
    } finally {
      lease.release();
    }
  }

  status(): DeviceStatus[] {
    return Array.from({ length: this.deviceCount }, (_, device) => {
      const limit = this.limiters.get(device);
      return {
        device,
        busy: (limit?.activeCount ?? 0) > 0,
        pending: limit?.pendingCount ?? 0,
      };
    });
  }

  private limiterFor(device: number): LimitFunction {
    if (!Number.isInteger(device) || device < 0 || device >= this.deviceCount) {
      throw new RangeError(`unknown device index ${device}`);
    }
    let limit = this.limiters.get(device);
    if (!limit) {
      limit = pLimit(1);
      this.limiters.set(device, limit);
    }
    return limit;
  }
}
