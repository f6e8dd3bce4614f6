import { createLogger, hexDump } from '../logger.js';
import { toSleepStage } from '../sleep/stage.js';
import type { SleepStage } from '../sleep/stage.js';
import { decodeEmbeddedTimestamp } from './bcd-time.js';
import type { EmbeddedTimestamp } from './bcd-time.js';
import {
  BULK_HEADER_LENGTH,
  BULK_MAGIC,
  EMBEDDED_TIMESTAMP_LENGTH,
  FINAL_FRAME_THRESHOLD,
  TIMESTAMP_MARKER,
} from './constants.js';
import { ProtocolStateError } from './errors.js';

const log = createLogger('Bulk');

// ─── Types ────────────────────────────────────────────────────────────────────

/**
 * Where record data begins in the first frame of a bulk response.
 * Resolved once per session from the first frame.
 */
export type HeaderStyle =
  | { kind: 'marked'; marker: number }
  | { kind: 'fixed-offset'; offset: number };

export const marked = (marker: number = TIMESTAMP_MARKER): HeaderStyle => ({
  kind: 'marked',
  marker,
});

export const fixedOffset = (offset: number = BULK_HEADER_LENGTH): HeaderStyle => ({
  kind: 'fixed-offset',
  offset,
});

export interface BulkRecord {
  stage: SleepStage;
  rawStage: number;
  durationMinutes: number;
}

export interface FrameContext {
  frame: Buffer;
  /** Zero-based position of the frame in the stream. */
  index: number;
  /** True for the first frame when it carried the bulk header. */
  isHeaderFrame: boolean;
}

/** Decides, after each frame is consumed, whether the stream has ended. */
export type CompletionPredicate = (ctx: FrameContext) => boolean;

/**
 * Observed firmware convention: any data frame shorter than `threshold` bytes is
 * the last one. The header frame never ends the stream.
 */
export function shortFrameCompletion(threshold: number = FINAL_FRAME_THRESHOLD): CompletionPredicate {
  return ({ frame, isHeaderFrame }) => !isHeaderFrame && frame.length < threshold;
}

export interface DeclaredLength {
  littleEndian: number;
  bigEndian: number;
}

export interface BulkTransferResult {
  subcommand: number;
  records: BulkRecord[];
  startTimestamp?: EmbeddedTimestamp;
  headerStyle: HeaderStyle | null;
  /** Length field of the response header; firmware-dependent, informational only. */
  declaredLength?: DeclaredLength;
  frameCount: number;
  byteCount: number;
  complete: boolean;
  /** Unpaired byte left in the carry buffer when the stream ended. */
  trailingByte?: number;
}

export interface ReassemblerOptions {
  /** 'auto' (default): marked when byte 6 of the first frame is the marker, else fixed offset 6. */
  headerStyle?: HeaderStyle | 'auto';
  isComplete?: CompletionPredicate;
}

type Phase = 'header' | 'timestamp' | 'records';

export function isBulkHeader(frame: Uint8Array, subcommand: number): boolean {
  return frame.length >= 2 && frame[0] === BULK_MAGIC && frame[1] === subcommand;
}

// ─── Reassembler ──────────────────────────────────────────────────────────────

/**
 * Glues bulk notification frames back into (stage, duration) records.
 *
 * Frame boundaries follow the transport MTU, not the 2-byte record layout, so a
 * record may straddle two frames: an odd trailing byte is carried over and
 * prepended to the next frame before pairing.
 */
export class BulkReassembler {
  private phase: Phase = 'header';
  private carry: number | null = null;
  private trailingByte: number | undefined;
  private readonly timestampBytes: number[] = [];
  private readonly records: BulkRecord[] = [];
  private headerStyle: HeaderStyle | null = null;
  private declaredLength: DeclaredLength | undefined;
  private startTimestamp: EmbeddedTimestamp | undefined;
  private frameCount = 0;
  private byteCount = 0;
  private completed = false;
  private readonly isComplete: CompletionPredicate;

  constructor(
    readonly subcommand: number,
    private readonly opts: ReassemblerOptions = {},
  ) {
    this.isComplete = opts.isComplete ?? shortFrameCompletion();
  }

  get done(): boolean {
    return this.completed;
  }

  /** Number of records decoded so far. */
  get recordCount(): number {
    return this.records.length;
  }

  /** Consume one frame; returns true once the stream is complete. */
  push(frame: Buffer): boolean {
    if (this.completed) {
      throw new ProtocolStateError('Bulk stream already complete; no further frames expected');
    }

    const index = this.frameCount++;
    this.byteCount += frame.length;
    const isHeaderFrame = index === 0 && isBulkHeader(frame, this.subcommand);
    let body = frame;

    if (index === 0) {
      if (isHeaderFrame) {
        body = this.consumeHeader(frame);
      } else {
        log.warn(`First frame lacks the bulk header (${hexDump(frame.subarray(0, 2))}); treating it as data`);
        this.phase = 'records';
      }
    }

    if (this.phase === 'timestamp') body = this.consumeTimestamp(body);
    if (this.phase === 'records') this.consumeRecords(body);

    if (this.isComplete({ frame, index, isHeaderFrame })) {
      this.finish();
    }
    return this.completed;
  }

  /** Snapshot of everything decoded so far (complete or not). */
  result(): BulkTransferResult {
    return {
      subcommand: this.subcommand,
      records: [...this.records],
      ...(this.startTimestamp ? { startTimestamp: { ...this.startTimestamp } } : {}),
      headerStyle: this.headerStyle,
      ...(this.declaredLength ? { declaredLength: this.declaredLength } : {}),
      frameCount: this.frameCount,
      byteCount: this.byteCount,
      complete: this.completed,
      ...(this.trailingByte !== undefined ? { trailingByte: this.trailingByte } : {}),
    };
  }

  private finish(): void {
    this.completed = true;
    if (this.phase === 'timestamp') {
      log.warn('Stream ended inside the embedded timestamp; no start time recovered');
    }
    if (this.carry !== null) {
      log.debug(`Dropping unpaired trailing byte 0x${this.carry.toString(16)}`);
      this.trailingByte = this.carry;
      this.carry = null;
    }
  }

  private resolveHeaderStyle(frame: Buffer): HeaderStyle {
    const configured = this.opts.headerStyle ?? 'auto';
    if (configured !== 'auto') return configured;
    return frame[BULK_HEADER_LENGTH] === TIMESTAMP_MARKER ? marked() : fixedOffset();
  }

  private consumeHeader(frame: Buffer): Buffer {
    if (frame.length >= 4) {
      this.declaredLength = {
        littleEndian: frame.readUInt16LE(2),
        bigEndian: frame.readUInt16BE(2),
      };
    }

    const style = this.resolveHeaderStyle(frame);
    this.headerStyle = style;
    log.debug(`Header style: ${style.kind === 'marked' ? `marked(0x${style.marker.toString(16)})` : `fixed-offset(${style.offset})`}`);

    if (style.kind === 'fixed-offset') {
      this.phase = 'records';
      return frame.subarray(Math.min(style.offset, frame.length));
    }

    const at = frame.indexOf(style.marker, BULK_HEADER_LENGTH);
    if (at === -1) {
      log.warn('Timestamp marker not found in first frame; records start after the header');
      this.phase = 'records';
      return frame.subarray(Math.min(BULK_HEADER_LENGTH, frame.length));
    }
    this.phase = 'timestamp';
    return frame.subarray(at + 1);
  }

  /** Collect embedded timestamp bytes, which may continue into the next frame. */
  private consumeTimestamp(body: Buffer): Buffer {
    const needed = EMBEDDED_TIMESTAMP_LENGTH - this.timestampBytes.length;
    const taken = body.subarray(0, needed);
    this.timestampBytes.push(...taken);

    if (this.timestampBytes.length === EMBEDDED_TIMESTAMP_LENGTH) {
      const decoded = decodeEmbeddedTimestamp(Uint8Array.from(this.timestampBytes));
      if (decoded) {
        this.startTimestamp = decoded;
      } else {
        log.warn(`Embedded timestamp is not a valid date: ${hexDump(Uint8Array.from(this.timestampBytes))}`);
      }
      this.phase = 'records';
    }
    return body.subarray(taken.length);
  }

  private consumeRecords(body: Buffer): void {
    let data = this.carry === null ? body : Buffer.concat([Buffer.of(this.carry), body]);
    this.carry = null;

    if (data.length % 2 !== 0) {
      this.carry = data[data.length - 1];
      data = data.subarray(0, data.length - 1);
    }

    for (let i = 0; i < data.length; i += 2) {
      const rawStage = data[i];
      this.records.push({
        stage: toSleepStage(rawStage),
        rawStage,
        durationMinutes: data[i + 1],
      });
    }
  }
}
