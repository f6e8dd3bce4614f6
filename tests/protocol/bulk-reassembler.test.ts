import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  BulkReassembler,
  fixedOffset,
  isBulkHeader,
  marked,
  shortFrameCompletion,
} from '../../src/protocol/bulk-reassembler.js';
import type { CompletionPredicate } from '../../src/protocol/bulk-reassembler.js';
import { MissingTimestampMarkerError, ProtocolStateError } from '../../src/protocol/errors.js';
import { decodeSleepDay } from '../../src/sleep/decoder.js';
import { silenceLogs } from '../helpers/fake-transport.js';

const SLEEP = 0x27;
const HEADER = [0xbc, SLEEP, 0x00, 0x00, 0xff, 0xff];
const TS = [24, 3, 15, 22, 47, 9];

const frame = (...bytes: number[]): Buffer => Buffer.from(bytes);

/** Completes after the frame at `index`, whatever its length. */
const completeAt =
  (index: number): CompletionPredicate =>
  (ctx) =>
    ctx.index === index;

beforeEach(() => {
  silenceLogs();
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('BulkReassembler', () => {
  it('decodes the marked example stream and completes on the short second frame', () => {
    const r = new BulkReassembler(SLEEP);

    expect(r.push(frame(...HEADER, 0x57, ...TS, 0x02, 0x1e))).toBe(false);
    expect(r.push(frame(0x03, 0x05))).toBe(true);

    const result = r.result();
    expect(result.records).toEqual([
      { stage: 'light', rawStage: 2, durationMinutes: 30 },
      { stage: 'deep', rawStage: 3, durationMinutes: 5 },
    ]);
    expect(result.startTimestamp).toEqual({ year: 2024, month: 3, day: 15, hour: 22, minute: 47, second: 9 });
    expect(result.headerStyle).toEqual({ kind: 'marked', marker: 0x57 });
    expect(result.frameCount).toBe(2);
    expect(result.byteCount).toBe(17);
    expect(result.complete).toBe(true);
    expect(result.trailingByte).toBeUndefined();
  });

  it('never completes on the header frame, even when it is short', () => {
    const r = new BulkReassembler(SLEEP);
    expect(r.push(frame(...HEADER, 0x02, 0x10))).toBe(false);
    expect(r.done).toBe(false);
  });

  it('does not complete while every data frame is at least 20 bytes', () => {
    const r = new BulkReassembler(SLEEP);
    r.push(frame(...HEADER, 0x02, 0x10));
    expect(r.push(Buffer.alloc(20, 0x02))).toBe(false);
    expect(r.push(Buffer.alloc(24, 0x03))).toBe(false);
    expect(r.recordCount).toBe(1 + 10 + 12);
  });

  it('falls back to fixed offset 6 when byte 6 is not the marker', () => {
    const r = new BulkReassembler(SLEEP);
    r.push(frame(...HEADER, 0x04, 0x0c, 0x05, 0x02));
    r.push(frame(0x02, 0x01));

    const result = r.result();
    expect(result.headerStyle).toEqual({ kind: 'fixed-offset', offset: 6 });
    expect(result.startTimestamp).toBeUndefined();
    expect(result.records.map((x) => [x.stage, x.durationMinutes])).toEqual([
      ['rem', 12],
      ['awake', 2],
      ['light', 1],
    ]);
  });

  it('searches for the marker from offset 6 when marked style is configured', () => {
    const r = new BulkReassembler(SLEEP, { headerStyle: marked(0x57) });
    r.push(frame(...HEADER, 0x00, 0x57, ...TS, 0x03, 0x14));
    r.push(frame(0x02, 0x0a));

    const result = r.result();
    expect(result.startTimestamp?.hour).toBe(22);
    expect(result.records.map((x) => x.durationMinutes)).toEqual([20, 10]);
  });

  it('starts records after the header when a configured marker is missing', () => {
    const r = new BulkReassembler(SLEEP, { headerStyle: marked(0x57) });
    r.push(frame(...HEADER, 0x02, 0x0a));
    r.push(frame(0x03, 0x05));

    const result = r.result();
    expect(result.startTimestamp).toBeUndefined();
    expect(result.records.map((x) => x.stage)).toEqual(['light', 'deep']);
  });

  it('honours an explicit fixed offset', () => {
    const r = new BulkReassembler(SLEEP, { headerStyle: fixedOffset(8) });
    r.push(frame(...HEADER, 0xaa, 0xbb, 0x02, 0x1e));
    r.push(frame(0x03, 0x05));

    const result = r.result();
    expect(result.headerStyle).toEqual({ kind: 'fixed-offset', offset: 8 });
    expect(result.records.map((x) => x.durationMinutes)).toEqual([30, 5]);
  });

  it('collects a timestamp split across frames', () => {
    const r = new BulkReassembler(SLEEP);
    r.push(frame(...HEADER, 0x57, 24, 3, 15));
    expect(r.push(frame(22, 47, 9, 0x02, 0x1e))).toBe(true);

    const result = r.result();
    expect(result.startTimestamp).toEqual({ year: 2024, month: 3, day: 15, hour: 22, minute: 47, second: 9 });
    expect(result.records).toEqual([{ stage: 'light', rawStage: 2, durationMinutes: 30 }]);
  });

  it('keeps records but drops an invalid embedded timestamp', () => {
    const r = new BulkReassembler(SLEEP);
    r.push(frame(...HEADER, 0x57, 24, 13, 1, 0, 0, 0, 0x02, 0x1e));
    r.push(frame(0x03, 0x05));

    const result = r.result();
    expect(result.startTimestamp).toBeUndefined();
    expect(result.records).toHaveLength(2);
  });

  it('drops a timestamp whose day does not exist instead of rolling it over', () => {
    const r = new BulkReassembler(SLEEP);
    r.push(frame(...HEADER, 0x57, 24, 2, 30, 23, 0, 0, 0x02, 0x1e));
    r.push(frame(0x03, 0x05));

    const result = r.result();
    expect(result.startTimestamp).toBeUndefined();
    expect(result.records).toHaveLength(2);
    expect(console.warn).toHaveBeenCalledWith(
      expect.stringContaining('Embedded timestamp is not a valid date: 18 02 1e 17 00 00'),
    );
    expect(() => decodeSleepDay(result)).toThrow(MissingTimestampMarkerError);
  });

  it('ends without a timestamp when the stream stops inside it', () => {
    const r = new BulkReassembler(SLEEP);
    r.push(frame(...HEADER, 0x57, 24, 3));
    expect(r.push(frame(15))).toBe(true);

    const result = r.result();
    expect(result.startTimestamp).toBeUndefined();
    expect(result.records).toEqual([]);
  });

  it('carries an odd trailing byte into the next frame', () => {
    const r = new BulkReassembler(SLEEP, { isComplete: completeAt(2) });
    r.push(frame(...HEADER, 0x02, 0x1e, 0x03));
    r.push(frame(0x05, 0x04));
    r.push(frame(0x0f));

    expect(r.result().records.map((x) => [x.rawStage, x.durationMinutes])).toEqual([
      [2, 30],
      [3, 5],
      [4, 15],
    ]);
  });

  it('reports an unpaired byte left at completion', () => {
    const r = new BulkReassembler(SLEEP);
    r.push(frame(...HEADER, 0x02, 0x1e));
    r.push(frame(0x03, 0x05, 0x07));

    const result = r.result();
    expect(result.records).toHaveLength(2);
    expect(result.trailingByte).toBe(0x07);
  });

  describe('record boundaries are independent of frame boundaries', () => {
    const data = [0x02, 0x1e, 0x03, 0x0a, 0x04, 0x14, 0x05, 0x05, 0x02, 0x0f];
    const expected = [
      [2, 30],
      [3, 10],
      [4, 20],
      [5, 5],
      [2, 15],
    ];

    it.each(Array.from({ length: data.length + 1 }, (_, k) => k))('split at %i', (k) => {
      const r = new BulkReassembler(SLEEP, { isComplete: completeAt(1) });
      r.push(frame(...HEADER, ...data.slice(0, k)));
      r.push(frame(...data.slice(k)));
      expect(r.result().records.map((x) => [x.rawStage, x.durationMinutes])).toEqual(expected);
    });
  });

  it('keeps zero-minute and unrecognized records', () => {
    const r = new BulkReassembler(SLEEP);
    r.push(frame(...HEADER, 0x02, 0x00));
    r.push(frame(0x09, 0x0a));

    expect(r.result().records).toEqual([
      { stage: 'light', rawStage: 2, durationMinutes: 0 },
      { stage: 'unknown', rawStage: 9, durationMinutes: 10 },
    ]);
  });

  it('reads the declared length in both byte orders', () => {
    const r = new BulkReassembler(SLEEP);
    r.push(frame(0xbc, SLEEP, 0x01, 0x02, 0xff, 0xff, 0x02, 0x1e));
    expect(r.result().declaredLength).toEqual({ littleEndian: 0x0201, bigEndian: 0x0102 });
  });

  it('treats a first frame without the header as data', () => {
    const r = new BulkReassembler(SLEEP);
    expect(r.push(frame(0x02, 0x1e))).toBe(true);

    const result = r.result();
    expect(result.headerStyle).toBeNull();
    expect(result.records).toEqual([{ stage: 'light', rawStage: 2, durationMinutes: 30 }]);
  });

  it('rejects frames after completion', () => {
    const r = new BulkReassembler(SLEEP);
    r.push(frame(0x02, 0x1e));
    expect(() => r.push(frame(0x03, 0x05))).toThrow(ProtocolStateError);
  });

  it('result() is a snapshot', () => {
    const r = new BulkReassembler(SLEEP, { isComplete: completeAt(5) });
    r.push(frame(...HEADER, 0x02, 0x1e));
    const before = r.result();
    r.push(frame(0x03, 0x05));
    expect(before.records).toHaveLength(1);
    expect(before.complete).toBe(false);
    expect(r.result().records).toHaveLength(2);
  });
});

describe('shortFrameCompletion()', () => {
  it('uses the configured threshold and ignores the header frame', () => {
    const rule = shortFrameCompletion(8);
    expect(rule({ frame: Buffer.alloc(7), index: 1, isHeaderFrame: false })).toBe(true);
    expect(rule({ frame: Buffer.alloc(8), index: 1, isHeaderFrame: false })).toBe(false);
    expect(rule({ frame: Buffer.alloc(2), index: 0, isHeaderFrame: true })).toBe(false);
  });
});

describe('isBulkHeader()', () => {
  it('matches magic and subcommand', () => {
    expect(isBulkHeader(Uint8Array.of(0xbc, 0x27), 0x27)).toBe(true);
    expect(isBulkHeader(Uint8Array.of(0xbc, 0x28), 0x27)).toBe(false);
    expect(isBulkHeader(Uint8Array.of(0xbc), 0x27)).toBe(false);
  });
});
