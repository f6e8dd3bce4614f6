import { describe, it, expect } from 'vitest';
import { buildPacket, checksum, parsePacket, verifyChecksum } from '../../src/protocol/packet.js';
import { InvalidLengthError, PayloadTooLargeError } from '../../src/protocol/errors.js';

describe('buildPacket()', () => {
  it('builds the battery query with checksum 3', () => {
    const packet = buildPacket(3);
    expect(packet.length).toBe(16);
    expect([...packet]).toEqual([3, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 3]);
  });

  it('zero-fills after the payload', () => {
    const packet = buildPacket(0x16, [1]);
    expect([...packet.subarray(0, 3)]).toEqual([0x16, 1, 0]);
    expect(packet[15]).toBe(0x17);
  });

  it('wraps the checksum at 256', () => {
    const packet = buildPacket(0xff, [0xff, 0x02]);
    // 255 + 255 + 2 = 512 → 0
    expect(packet[15]).toBe(0);
  });

  it('accepts a full 14-byte payload', () => {
    const payload = Array.from({ length: 14 }, (_, i) => i + 1);
    const packet = buildPacket(1, payload);
    expect([...packet.subarray(1, 15)]).toEqual(payload);
    // 1 + (1+...+14) = 106
    expect(packet[15]).toBe(106);
  });

  it('accepts a Uint8Array payload', () => {
    const packet = buildPacket(0x2c, Uint8Array.of(2, 1));
    expect([...packet.subarray(0, 4)]).toEqual([0x2c, 2, 1, 0]);
  });

  it('rejects a 15-byte payload', () => {
    expect(() => buildPacket(1, new Array(15).fill(0))).toThrow(PayloadTooLargeError);
  });

  it('reports length and limit on oversize payloads', () => {
    try {
      buildPacket(1, new Array(20).fill(0));
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(PayloadTooLargeError);
      if (err instanceof PayloadTooLargeError) {
        expect(err.code).toBe('PAYLOAD_TOO_LARGE');
        expect(err.length).toBe(20);
        expect(err.max).toBe(14);
        expect(err.message).toBe('Payload of 20 bytes exceeds the 14-byte limit');
      }
    }
  });

  it('rejects non-byte values', () => {
    expect(() => buildPacket(256)).toThrow(RangeError);
    expect(() => buildPacket(1, [300])).toThrow('Payload byte 0 must be a byte (0-255), got 300');
    expect(() => buildPacket(1, [-1])).toThrow(RangeError);
    expect(() => buildPacket(1, [1.5])).toThrow(RangeError);
  });
});

describe('checksum()', () => {
  it('ignores the trailing checksum byte itself', () => {
    const packet = buildPacket(3);
    packet[15] = 0xaa;
    expect(checksum(packet)).toBe(3);
  });
});

describe('parsePacket()', () => {
  it('splits command and 14-byte payload', () => {
    const { command, payload } = parsePacket(buildPacket(3, [87, 1]));
    expect(command).toBe(3);
    expect(payload.length).toBe(14);
    expect(payload[0]).toBe(87);
    expect(payload[1]).toBe(1);
  });

  it('does not verify the checksum', () => {
    const frame = buildPacket(3, [50]);
    frame[15] = 0;
    expect(parsePacket(frame).payload[0]).toBe(50);
  });

  it('rejects frames that are not 16 bytes', () => {
    expect(() => parsePacket(Buffer.alloc(15))).toThrow(InvalidLengthError);
    expect(() => parsePacket(Buffer.alloc(17))).toThrow('Expected a 16-byte packet, got 17 bytes');
  });
});

describe('verifyChecksum()', () => {
  it('accepts built packets and rejects tampered ones', () => {
    const packet = buildPacket(0x69, [1, 0]);
    expect(verifyChecksum(packet)).toBe(true);
    packet[3] = 9;
    expect(verifyChecksum(packet)).toBe(false);
  });

  it('rejects wrong lengths', () => {
    expect(verifyChecksum(Buffer.alloc(4))).toBe(false);
  });
});
