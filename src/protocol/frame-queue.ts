import { FRAME_QUEUE_CAPACITY } from './constants.js';
import { FrameQueueOverflowError } from './errors.js';
import { abortReason } from '../utils/error.js';

interface Waiter {
  resolve(frame: Buffer | undefined): void;
  reject(err: unknown): void;
}

/**
 * Bounded single-consumer queue between a transport notification callback and
 * a protocol state machine. Frames are copied on push and delivered in arrival order.
 *
 * The producer side is a synchronous BLE callback that cannot be paused, so a full
 * queue fails the consumer with FrameQueueOverflowError instead of dropping frames.
 */
export class FrameQueue {
  private readonly frames: Buffer[] = [];
  private waiter: Waiter | null = null;
  private failure: Error | null = null;

  constructor(readonly capacity: number = FRAME_QUEUE_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.frames.length;
  }

  push(frame: Uint8Array): void {
    if (this.failure) return;
    const copy = Buffer.from(frame);

    if (this.waiter) {
      const waiter = this.waiter;
      this.waiter = null;
      waiter.resolve(copy);
      return;
    }

    if (this.frames.length >= this.capacity) {
      this.fail(new FrameQueueOverflowError(this.capacity));
      return;
    }
    this.frames.push(copy);
  }

  /** Fail the queue: pending and future `next()` calls reject with `err`. */
  fail(err: Error): void {
    if (this.failure) return;
    this.failure = err;
    this.frames.length = 0;
    if (this.waiter) {
      const waiter = this.waiter;
      this.waiter = null;
      waiter.reject(err);
    }
  }

  /**
   * Take the next frame. Resolves `undefined` when nothing arrives within
   * `timeoutMs`; rejects when the signal aborts or the queue has failed.
   */
  next(timeoutMs: number, signal?: AbortSignal): Promise<Buffer | undefined> {
    if (this.failure) return Promise.reject(this.failure);

    const queued = this.frames.shift();
    if (queued) return Promise.resolve(queued);

    if (signal?.aborted) return Promise.reject(abortReason(signal));
    if (this.waiter) {
      return Promise.reject(new Error('FrameQueue already has a pending consumer'));
    }

    return new Promise<Buffer | undefined>((resolve, reject) => {
      const settle = (): void => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        this.waiter = null;
      };
      const onAbort = (): void => {
        settle();
        reject(abortReason(signal));
      };
      const timer = setTimeout(() => {
        settle();
        resolve(undefined);
      }, Math.max(0, timeoutMs));

      this.waiter = {
        resolve: (frame) => {
          settle();
          resolve(frame);
        },
        reject: (err) => {
          settle();
          reject(err);
        },
      };
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }
}
