import { createLogger } from '../logger.js';
import { abortReason } from '../utils/error.js';
import { FRAME_QUEUE_CAPACITY, RESPONSE_TIMEOUT_MS } from './constants.js';
import { ResponseTimeoutError } from './errors.js';
import { ExchangeLock } from './exchange-lock.js';
import { FrameQueue } from './frame-queue.js';
import { buildPacket } from './packet.js';
import type { PayloadInput } from './packet.js';
import type { RingTransport } from './transport.js';

const log = createLogger('Channel');

export type ChannelState = 'idle' | 'awaiting-response';

export interface ChannelOptions {
  /** Default response timeout for `send()`. */
  timeoutMs?: number;
  queueCapacity?: number;
  /** Shared with the bulk sessions of the same connection. */
  lock?: ExchangeLock;
}

export interface SendOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
}

/**
 * One-request/one-response exchanges over the UART characteristic pair.
 *
 * A notification is subscribed only for the duration of an exchange and released
 * on every exit path. Frames whose command id differs from the awaited one are
 * discarded, not queued for a later exchange.
 */
export class RequestResponseChannel {
  private currentState: ChannelState = 'idle';
  private awaited: number | null = null;
  readonly lock: ExchangeLock;
  private readonly timeoutMs: number;
  private readonly queueCapacity: number;

  constructor(
    private readonly transport: RingTransport,
    opts: ChannelOptions = {},
  ) {
    this.lock = opts.lock ?? new ExchangeLock();
    this.timeoutMs = opts.timeoutMs ?? RESPONSE_TIMEOUT_MS;
    this.queueCapacity = opts.queueCapacity ?? FRAME_QUEUE_CAPACITY;
  }

  get state(): ChannelState {
    return this.currentState;
  }

  /** Command id of the exchange in flight, or null when idle. */
  get awaitedCommand(): number | null {
    return this.awaited;
  }

  /** Send a command and resolve with the first 16-byte frame echoing its id. */
  async send(command: number, payload: PayloadInput = [], opts: SendOptions = {}): Promise<Buffer> {
    // Oversize payloads reject here, before the lock is taken
    const packet = buildPacket(command, payload);
    return this.lock.run(() =>
      this.exchange(command, packet, opts.timeoutMs ?? this.timeoutMs, opts.signal),
    );
  }

  /** Write a command the device does not answer (or whose answer is not needed). */
  async sendOnly(command: number, payload: PayloadInput = [], opts: Pick<SendOptions, 'signal'> = {}): Promise<void> {
    const packet = buildPacket(command, payload);
    const { signal } = opts;
    return this.lock.run(async () => {
      if (signal?.aborted) throw abortReason(signal);
      log.frame('tx', packet);
      await this.transport.write(packet);
    });
  }

  private async exchange(
    command: number,
    packet: Buffer,
    timeoutMs: number,
    signal?: AbortSignal,
  ): Promise<Buffer> {
    // A request cancelled while queued behind the lock never reaches the ring
    if (signal?.aborted) throw abortReason(signal);
    const queue = new FrameQueue(this.queueCapacity);
    const subscription = await this.transport.subscribe((frame) => queue.push(frame));
    this.currentState = 'awaiting-response';
    this.awaited = command;

    try {
      log.frame('tx', packet);
      await this.transport.write(packet);

      const deadline = Date.now() + timeoutMs;
      for (;;) {
        const remaining = deadline - Date.now();
        const frame = remaining > 0 ? await queue.next(remaining, signal) : undefined;
        if (!frame) throw new ResponseTimeoutError(command, timeoutMs);

        log.frame('rx', frame);
        if (frame[0] === command) return frame;
        log.debug(`Discarding frame for command ${frame[0]} while awaiting ${command}`);
      }
    } finally {
      this.currentState = 'idle';
      this.awaited = null;
      await this.transport.unsubscribe(subscription);
    }
  }
}
