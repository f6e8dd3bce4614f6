import { createLogger } from '../logger.js';
import { abortReason } from '../utils/error.js';
export { errMsg } from '../utils/error.js';

// ─── Timing ───────────────────────────────────────────────────────────────────

export const CONNECT_TIMEOUT_MS = 30_000;
export const MAX_CONNECT_RETRIES = 3;
export const DISCOVERY_TIMEOUT_MS = 60_000;
export const DISCOVERY_POLL_MS = 2_000;
export const DEFAULT_SCAN_DURATION_MS = 15_000;
/** GATT service/characteristic enumeration after the link is up. */
export const GATT_DISCOVERY_TIMEOUT_MS = 30_000;

const BT_BASE_UUID_SUFFIX = '00001000800000805f9b34fb';

// ─── Types ────────────────────────────────────────────────────────────────────

export interface ConnectOptions {
  /** MAC address, or CoreBluetooth UUID on macOS. Without it the first ring by name is used. */
  targetAddress?: string;
  namePatterns?: readonly RegExp[];
  discoveryTimeoutMs?: number;
  signal?: AbortSignal;
}

export interface ScanResult {
  address: string;
  name: string;
  isRing: boolean;
}

/** A BLE step (connect, lookup, GATT discovery) that did not finish in time. */
export class BleTimeoutError extends Error {
  constructor(
    message: string,
    readonly timeoutMs: number,
  ) {
    super(`${message} (${timeoutMs / 1000}s)`);
    this.name = 'BleTimeoutError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export const bleLog = createLogger('BLE');

// ─── Addresses and UUIDs ──────────────────────────────────────────────────────

/** Lowercase 32-hex-digit form; 16-bit UUIDs are expanded on the Bluetooth base UUID. */
export function normalizeUuid(uuid: string): string {
  const hex = uuid.replace(/-/g, '').toLowerCase();
  return hex.length === 4 ? `0000${hex}${BT_BASE_UUID_SUFFIX}` : hex;
}

function addressKey(address: string): string {
  return address.replace(/[:-]/g, '').toUpperCase();
}

/** MAC in the form BlueZ expects on D-Bus: `AA:BB:CC:DD:EE:FF`. */
export function formatMac(mac: string): string {
  return (addressKey(mac).match(/.{2}/g) ?? []).join(':');
}

/** Compare MACs or CoreBluetooth identifiers, ignoring case and separators. */
export function sameAddress(a: string | undefined, b: string): boolean {
  return a !== undefined && a !== '' && addressKey(a) === addressKey(b);
}

// ─── Async helpers ────────────────────────────────────────────────────────────

export function abortableSleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortReason(signal));
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(abortReason(signal));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export async function withTimeout<T>(promise: Promise<T>, ms: number, message: string): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const expired = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(new BleTimeoutError(message, ms)), ms);
  });
  try {
    return await Promise.race([promise, expired]);
  } finally {
    clearTimeout(timer);
  }
}
