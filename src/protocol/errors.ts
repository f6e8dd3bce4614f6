import type { BulkTransferResult } from './bulk-reassembler.js';

export type RingErrorCode =
  | 'PAYLOAD_TOO_LARGE'
  | 'INVALID_LENGTH'
  | 'RESPONSE_TIMEOUT'
  | 'BULK_TRANSFER_TIMEOUT'
  | 'MISSING_TIMESTAMP_MARKER'
  | 'FRAME_QUEUE_OVERFLOW'
  | 'PROTOCOL_STATE';

/**
 * Base class for every failure raised by the protocol engine.
 * Transport errors are not wrapped and reach the caller as thrown by the BLE stack.
 */
export class RingProtocolError extends Error {
  constructor(
    message: string,
    readonly code: RingErrorCode,
  ) {
    super(message);
    this.name = 'RingProtocolError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class PayloadTooLargeError extends RingProtocolError {
  constructor(
    readonly length: number,
    readonly max: number,
  ) {
    super(`Payload of ${length} bytes exceeds the ${max}-byte limit`, 'PAYLOAD_TOO_LARGE');
    this.name = 'PayloadTooLargeError';
  }
}

export class InvalidLengthError extends RingProtocolError {
  constructor(
    readonly length: number,
    readonly expected: number,
  ) {
    super(`Expected a ${expected}-byte packet, got ${length} bytes`, 'INVALID_LENGTH');
    this.name = 'InvalidLengthError';
  }
}

export class ResponseTimeoutError extends RingProtocolError {
  constructor(
    readonly command: number,
    readonly timeoutMs: number,
  ) {
    super(`No response to command ${command} within ${timeoutMs}ms`, 'RESPONSE_TIMEOUT');
    this.name = 'ResponseTimeoutError';
  }
}

export class BulkTransferTimeoutError extends RingProtocolError {
  constructor(
    readonly subcommand: number,
    readonly timeoutMs: number,
    readonly recordsReceived: number,
    /** Records accumulated before the timeout; only set when the caller opted in. */
    readonly partial?: BulkTransferResult,
  ) {
    super(
      `Bulk transfer 0x${subcommand.toString(16)} did not complete within ${timeoutMs}ms ` +
        `(${recordsReceived} record(s) received)`,
      'BULK_TRANSFER_TIMEOUT',
    );
    this.name = 'BulkTransferTimeoutError';
  }
}

export class MissingTimestampMarkerError extends RingProtocolError {
  constructor() {
    super(
      'Sleep data carries no embedded start timestamp; supply a fallback start time',
      'MISSING_TIMESTAMP_MARKER',
    );
    this.name = 'MissingTimestampMarkerError';
  }
}

export class FrameQueueOverflowError extends RingProtocolError {
  constructor(readonly capacity: number) {
    super(`Notification queue overflowed (capacity ${capacity})`, 'FRAME_QUEUE_OVERFLOW');
    this.name = 'FrameQueueOverflowError';
  }
}

export class ProtocolStateError extends RingProtocolError {
  constructor(message: string) {
    super(message, 'PROTOCOL_STATE');
    this.name = 'ProtocolStateError';
  }
}
