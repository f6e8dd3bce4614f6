// ─── Command protocol (UART service) ──────────────────────────────────────────

export const PACKET_LENGTH = 16;
export const MAX_PAYLOAD_LENGTH = PACKET_LENGTH - 2;

export const UART_SERVICE_UUID = '6e40fff0-b5a3-f393-e0a9-e50e24dcca9e';
export const UART_WRITE_UUID = '6e400002-b5a3-f393-e0a9-e50e24dcca9e';
export const UART_NOTIFY_UUID = '6e400003-b5a3-f393-e0a9-e50e24dcca9e';

export const Command = {
  SET_TIME: 0x01,
  BATTERY: 0x03,
  HEART_RATE_LOG_SETTINGS: 0x16,
  REALTIME_KEEPALIVE: 0x1e,
  BLOOD_OXYGEN_SETTINGS: 0x2c,
  PRESSURE_SETTINGS: 0x36,
  HRV_SETTINGS: 0x38,
  REALTIME_START: 0x69,
  REALTIME_STOP: 0x6a,
} as const;

// ─── Bulk-data protocol ───────────────────────────────────────────────────────

export const BIG_DATA_SERVICE_UUID = 'de5bf728-d711-4e47-af26-65e3012a5dc7';
export const BIG_DATA_WRITE_UUID = 'de5bf72a-d711-4e47-af26-65e3012a5dc7';
export const BIG_DATA_NOTIFY_UUID = 'de5bf729-d711-4e47-af26-65e3012a5dc7';

export const BULK_MAGIC = 0xbc;
export const BULK_HEADER_LENGTH = 6;
export const BulkSubcommand = {
  SLEEP: 0x27,
} as const;

/** Marker byte some firmware places right before the embedded start timestamp. */
export const TIMESTAMP_MARKER = 0x57;
export const EMBEDDED_TIMESTAMP_LENGTH = 6;

/** Observed firmware convention: a notification shorter than this ends a bulk stream. */
export const FINAL_FRAME_THRESHOLD = 20;

// ─── Timeouts ─────────────────────────────────────────────────────────────────

export const RESPONSE_TIMEOUT_MS = 5_000;
export const BULK_TIMEOUT_MS = 10_000;
export const FRAME_QUEUE_CAPACITY = 256;

// ─── Device Information service (0x180A) ─────────────────────────────────────

export const DEVICE_INFO_CHARS = {
  manufacturer: '2a29',
  model: '2a24',
  hardwareVersion: '2a27',
  firmwareVersion: '2a26',
  serialNumber: '2a25',
} as const;
