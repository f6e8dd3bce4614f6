import { MAX_PAYLOAD_LENGTH, PACKET_LENGTH } from './constants.js';
import { InvalidLengthError, PayloadTooLargeError } from './errors.js';

/**
 * Fixed 16-byte command packet:
 *   [0]      command id
 *   [1-14]   payload, zero-filled
 *   [15]     checksum = sum of bytes 0-14, mod 256
 */

export interface ParsedPacket {
  command: number;
  payload: Buffer;
}

export type PayloadInput = Uint8Array | readonly number[];

function assertByte(value: number, label: string): void {
  if (!Number.isInteger(value) || value < 0 || value > 0xff) {
    throw new RangeError(`${label} must be a byte (0-255), got ${value}`);
  }
}

/** Sum of the first 15 bytes, mod 256. */
export function checksum(packet: Uint8Array): number {
  let sum = 0;
  for (let i = 0; i < PACKET_LENGTH - 1; i++) {
    sum += packet[i] ?? 0;
  }
  return sum & 0xff;
}

export function buildPacket(command: number, payload: PayloadInput = []): Buffer {
  assertByte(command, 'Command id');
  if (payload.length > MAX_PAYLOAD_LENGTH) {
    throw new PayloadTooLargeError(payload.length, MAX_PAYLOAD_LENGTH);
  }

  const packet = Buffer.alloc(PACKET_LENGTH);
  packet[0] = command;
  for (let i = 0; i < payload.length; i++) {
    const byte = payload[i];
    assertByte(byte, `Payload byte ${i}`);
    packet[i + 1] = byte;
  }
  packet[PACKET_LENGTH - 1] = checksum(packet);
  return packet;
}

/**
 * Split a received packet into command id and payload.
 * The checksum is not verified; firmware responses are taken as sent.
 */
export function parsePacket(frame: Uint8Array): ParsedPacket {
  if (frame.length !== PACKET_LENGTH) {
    throw new InvalidLengthError(frame.length, PACKET_LENGTH);
  }
  const buf = Buffer.from(frame);
  return {
    command: buf[0],
    payload: buf.subarray(1, PACKET_LENGTH - 1),
  };
}

export function verifyChecksum(frame: Uint8Array): boolean {
  return frame.length === PACKET_LENGTH && frame[PACKET_LENGTH - 1] === checksum(frame);
}
