import { createLogger } from '../logger.js';
import { BULK_HEADER_LENGTH, BULK_MAGIC, BULK_TIMEOUT_MS, FRAME_QUEUE_CAPACITY } from './constants.js';
import { BulkTransferTimeoutError, ProtocolStateError } from './errors.js';
import { BulkReassembler } from './bulk-reassembler.js';
import type { BulkTransferResult, ReassemblerOptions } from './bulk-reassembler.js';
import { FrameQueue } from './frame-queue.js';
import type { RingTransport, Subscription } from './transport.js';

const log = createLogger('Bulk');

export type BulkSessionState =
  | 'idle'
  | 'requested'
  | 'receiving'
  | 'complete'
  | 'timed-out'
  | 'cancelled'
  | 'failed';

export interface BulkSessionOptions extends ReassemblerOptions {
  queueCapacity?: number;
}

export interface AwaitCompletionOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
  /** Attach the records received so far to the timeout error. Off by default. */
  allowPartial?: boolean;
}

/** `[0xBC, subcommand, length-hi, length-lo, 0xFF, 0xFF]` with a zero length. */
export function buildBulkRequest(subcommand: number): Buffer {
  const packet = Buffer.alloc(BULK_HEADER_LENGTH);
  packet[0] = BULK_MAGIC;
  packet[1] = subcommand;
  packet.writeUInt16BE(0, 2);
  packet.writeUInt16BE(0xffff, 4);
  return packet;
}

/**
 * One bulk-data exchange on the big-data characteristic pair.
 *
 * Notifications are pushed into a bounded queue from the moment the session
 * subscribes, then drained in order by `awaitCompletion()`. A session is used once;
 * construct a fresh one per exchange.
 */
export class BulkTransferSession {
  private currentState: BulkSessionState = 'idle';
  private reassembler: BulkReassembler | null = null;
  private queue: FrameQueue | null = null;
  private subscription: Subscription | null = null;

  constructor(
    private readonly transport: RingTransport,
    private readonly opts: BulkSessionOptions = {},
  ) {}

  get state(): BulkSessionState {
    return this.currentState;
  }

  async start(subcommand: number): Promise<void> {
    if (this.currentState !== 'idle') {
      throw new ProtocolStateError(`Cannot start a bulk session in state '${this.currentState}'`);
    }

    const queue = new FrameQueue(this.opts.queueCapacity ?? FRAME_QUEUE_CAPACITY);
    this.queue = queue;
    this.reassembler = new BulkReassembler(subcommand, this.opts);
    this.subscription = await this.transport.subscribe((frame) => queue.push(frame));

    const request = buildBulkRequest(subcommand);
    this.currentState = 'requested';
    try {
      log.frame('tx', request);
      await this.transport.write(request);
    } catch (err) {
      this.currentState = 'failed';
      await this.release();
      throw err;
    }
    this.currentState = 'receiving';
  }

  async awaitCompletion(opts: AwaitCompletionOptions = {}): Promise<BulkTransferResult> {
    const { reassembler, queue } = this;
    if (this.currentState !== 'receiving' || !reassembler || !queue) {
      throw new ProtocolStateError(`Cannot await completion in state '${this.currentState}'`);
    }

    const timeoutMs = opts.timeoutMs ?? BULK_TIMEOUT_MS;
    const deadline = Date.now() + timeoutMs;

    try {
      for (;;) {
        const remaining = deadline - Date.now();
        const frame = remaining > 0 ? await queue.next(remaining, opts.signal) : undefined;

        if (!frame) {
          this.currentState = 'timed-out';
          const partial = reassembler.result();
          log.warn(
            `Bulk transfer timed out after ${partial.frameCount} frame(s), ` +
              `${partial.records.length} record(s)`,
          );
          throw new BulkTransferTimeoutError(
            reassembler.subcommand,
            timeoutMs,
            partial.records.length,
            opts.allowPartial ? partial : undefined,
          );
        }

        log.frame('rx', frame);
        if (reassembler.push(frame)) {
          this.currentState = 'complete';
          const result = reassembler.result();
          log.debug(`Bulk transfer complete: ${result.frameCount} frame(s), ${result.records.length} record(s)`);
          return result;
        }
      }
    } catch (err) {
      if (this.currentState === 'receiving') {
        this.currentState = opts.signal?.aborted ? 'cancelled' : 'failed';
      }
      throw err;
    } finally {
      await this.release();
    }
  }

  /** Abandon a started session and release its subscription. */
  async cancel(): Promise<void> {
    if (this.currentState === 'requested' || this.currentState === 'receiving') {
      this.currentState = 'cancelled';
    }
    await this.release();
  }

  private async release(): Promise<void> {
    const subscription = this.subscription;
    this.subscription = null;
    if (subscription) await this.transport.unsubscribe(subscription);
  }
}
