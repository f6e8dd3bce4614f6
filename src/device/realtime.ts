import { createLogger } from '../logger.js';
import { abortReason } from '../utils/error.js';
import { Command, FRAME_QUEUE_CAPACITY, PACKET_LENGTH } from '../protocol/constants.js';
import { ExchangeLock } from '../protocol/exchange-lock.js';
import { FrameQueue } from '../protocol/frame-queue.js';
import { buildPacket } from '../protocol/packet.js';
import type { RingTransport } from '../protocol/transport.js';

const log = createLogger('Realtime');

export type RealtimeKind = 'heart-rate' | 'spo2';

interface RealtimeProfile {
  code: number;
  startParam: number;
}

const PROFILES: Record<RealtimeKind, RealtimeProfile> = {
  'heart-rate': { code: 0x01, startParam: 0x00 },
  spo2: { code: 0x03, startParam: 0x25 },
};

/** ASCII '3', the keep-alive argument the firmware expects. */
const KEEPALIVE_ARG = 0x33;
const KEEPALIVE_INTERVAL_MS = 2_000;

export interface RealtimeReading {
  kind: RealtimeKind;
  /** BPM for heart-rate, percent for SpO2. */
  value: number;
  at: Date;
}

export interface RealtimeOptions {
  /** Stops the measurement; required, since the ring streams until told to stop. */
  signal: AbortSignal;
  /** Keep-alive period when no reading arrives. */
  keepAliveMs?: number;
  /** Stop after this many readings. */
  maxReadings?: number;
  queueCapacity?: number;
  lock?: ExchangeLock;
}

export function startPacket(kind: RealtimeKind): Buffer {
  const { code, startParam } = PROFILES[kind];
  return buildPacket(Command.REALTIME_START, [code, startParam]);
}

export function stopPacket(kind: RealtimeKind): Buffer {
  return buildPacket(Command.REALTIME_STOP, [PROFILES[kind].code, 0, 0]);
}

export const keepAlivePacket = (): Buffer => buildPacket(Command.REALTIME_KEEPALIVE, [KEEPALIVE_ARG]);

/**
 * Decode a realtime measurement frame `[0x69, kind, error, value, ...]`.
 * Returns null for other frames, error codes and zero (still measuring) values.
 */
export function parseRealtimeFrame(kind: RealtimeKind, frame: Buffer): number | null {
  if (frame.length !== PACKET_LENGTH || frame[0] !== Command.REALTIME_START) return null;
  if (frame[1] !== PROFILES[kind].code) return null;
  const errorCode = frame[2];
  if (errorCode !== 0) {
    log.warn(`Ring reported ${kind} measurement error ${errorCode}`);
    return null;
  }
  const value = frame[3];
  return value === 0 ? null : value;
}

/**
 * Stream live readings until the signal aborts (or `maxReadings` is reached).
 * The stop command is always sent and the subscription released on exit.
 * Resolves with the number of readings delivered.
 */
export async function streamRealtime(
  transport: RingTransport,
  kind: RealtimeKind,
  onReading: (reading: RealtimeReading) => void,
  opts: RealtimeOptions,
): Promise<number> {
  const lock = opts.lock ?? new ExchangeLock();
  const keepAliveMs = opts.keepAliveMs ?? KEEPALIVE_INTERVAL_MS;
  const { signal } = opts;

  return lock.run(async () => {
    if (signal.aborted) throw abortReason(signal);
    const queue = new FrameQueue(opts.queueCapacity ?? FRAME_QUEUE_CAPACITY);
    const subscription = await transport.subscribe((frame) => queue.push(frame));
    let count = 0;

    try {
      await transport.write(startPacket(kind));
      log.info(`Started ${kind} measurement`);

      while (!signal.aborted) {
        let frame: Buffer | undefined;
        try {
          frame = await queue.next(keepAliveMs, signal);
        } catch (err) {
          if (signal.aborted) break;
          throw err;
        }

        if (frame) {
          log.frame('rx', frame);
          const value = parseRealtimeFrame(kind, frame);
          if (value === null) continue;
          count++;
          onReading({ kind, value, at: new Date() });
          if (opts.maxReadings !== undefined && count >= opts.maxReadings) break;
        }
        await transport.write(keepAlivePacket());
      }
    } finally {
      try {
        await transport.write(stopPacket(kind));
        log.info(`Stopped ${kind} measurement`);
      } finally {
        await transport.unsubscribe(subscription);
      }
    }
    return count;
  });
}
