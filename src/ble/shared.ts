import type { FrameHandler, RingTransport, Subscription } from '../protocol/transport.js';
import {
  BIG_DATA_NOTIFY_UUID,
  BIG_DATA_WRITE_UUID,
  UART_NOTIFY_UUID,
  UART_WRITE_UUID,
} from '../protocol/constants.js';
import {
  abortableSleep,
  bleLog,
  CONNECT_TIMEOUT_MS,
  errMsg,
  MAX_CONNECT_RETRIES,
  normalizeUuid,
  withTimeout,
} from './types.js';

// ─── Thin abstractions over BLE library objects ───────────────────────────────

export interface BleChar {
  /** Subscribe to notifications. Returns an unsubscribe function that also stops notifications. */
  subscribe(onData: (data: Buffer) => void): Promise<() => Promise<void>>;
  write(data: Buffer, withResponse: boolean): Promise<void>;
  read(): Promise<Buffer>;
}

export interface BleDevice {
  onDisconnect(callback: () => void): void;
  disconnect(): Promise<void>;
}

/** An open link to one ring: the two write/notify pairs plus plain reads. */
export interface RingConnection {
  readonly name: string;
  readonly address: string;
  /** Command channel (UART service). */
  readonly uart: RingTransport;
  /** Bulk-data channel. */
  readonly bigData: RingTransport;
  read(uuid: string): Promise<Buffer>;
  onDisconnect(callback: () => void): void;
  disconnect(): Promise<void>;
}

// ─── Notification listeners ──────────────────────────────────────────────────

/** The listener half of a driver characteristic: attach/detach plus start/stop. */
export interface NotifyHooks {
  attach(): void;
  detach(): void;
  start(): Promise<void>;
  stop(): Promise<void>;
}

/**
 * Attach the data listener and start notifications; the listener is detached
 * again when starting fails. Resolves with the matching unsubscribe.
 */
export async function startNotifying(hooks: NotifyHooks): Promise<() => Promise<void>> {
  hooks.attach();
  try {
    await hooks.start();
  } catch (err) {
    hooks.detach();
    throw err;
  }
  return async () => {
    hooks.detach();
    await hooks.stop();
  };
}

// ─── Transport over a characteristic pair ────────────────────────────────────

/**
 * Expose a write/notify characteristic pair as a RingTransport.
 *
 * Notifications are enabled on the first subscription and disabled when the
 * last one is released; every live subscriber sees every frame.
 */
export function createTransport(writeChar: BleChar, notifyChar: BleChar, label: string): RingTransport {
  const handlers = new Map<number, FrameHandler>();
  let nextId = 1;
  // Settles to the unsubscribe function while notifications are on.
  let notifications: Promise<() => Promise<void>> | null = null;

  const dispatch = (data: Buffer): void => {
    for (const handler of [...handlers.values()]) handler(data);
  };

  return {
    write: (data) => writeChar.write(data, false),

    async subscribe(handler): Promise<Subscription> {
      const id = nextId++;
      handlers.set(id, handler);
      let pending = notifications;
      if (!pending) {
        const enabling = notifyChar.subscribe(dispatch);
        notifications = pending = enabling;
        void enabling.then(
          () => bleLog.debug(`${label}: notifications on`),
          () => {
            if (notifications === enabling) notifications = null;
          },
        );
      }
      try {
        await pending;
      } catch (err) {
        handlers.delete(id);
        throw err;
      }
      return { id };
    },

    async unsubscribe(subscription): Promise<void> {
      if (!handlers.delete(subscription.id)) return;
      if (handlers.size > 0 || !notifications) return;
      const pending = notifications;
      notifications = null;
      const stop = await pending;
      await stop();
      bleLog.debug(`${label}: notifications off`);
    },
  };
}

// ─── Connect retries ─────────────────────────────────────────────────────────

export interface ConnectTarget {
  connect(): Promise<void>;
  /** Tear down a half-open link before the next attempt. */
  reset(): Promise<void>;
}

/**
 * Connect with a bounded number of retries, backing off 1s, 1.5s, 2s... between
 * attempts. Each attempt is capped at CONNECT_TIMEOUT_MS.
 */
export async function connectWithRetries(
  target: ConnectTarget,
  maxRetries: number = MAX_CONNECT_RETRIES,
  signal?: AbortSignal,
): Promise<void> {
  for (let attempt = 0; ; attempt++) {
    const started = Date.now();
    bleLog.debug(`Connect attempt ${attempt + 1}/${maxRetries + 1}...`);
    try {
      await withTimeout(target.connect(), CONNECT_TIMEOUT_MS, 'Connection timed out');
      bleLog.debug(`Connected (took ${Date.now() - started}ms)`);
      return;
    } catch (err) {
      if (attempt >= maxRetries) {
        throw new Error(`Connection failed after ${maxRetries + 1} attempts: ${errMsg(err)}`);
      }
      const delay = 1000 + attempt * 500;
      bleLog.warn(`Connect error: ${errMsg(err)}. Retrying (${attempt + 1}/${maxRetries}) in ${delay}ms...`);
      await target.reset().catch((e: unknown) => bleLog.debug(`Reset before retry failed: ${errMsg(e)}`));
      await abortableSleep(delay, signal);
    }
  }
}

// ─── Connection assembly ─────────────────────────────────────────────────────

function requireChar(charMap: Map<string, BleChar>, uuid: string): BleChar {
  const char = charMap.get(normalizeUuid(uuid));
  if (!char) {
    throw new Error(
      `Characteristic ${uuid} not found. Discovered: [${[...charMap.keys()].join(', ')}]`,
    );
  }
  return char;
}

/**
 * Build a RingConnection from the characteristics discovered after connecting.
 * Shared by both the node-ble (Linux) and noble (Windows/macOS) handlers.
 */
export function buildRingConnection(
  charMap: Map<string, BleChar>,
  device: BleDevice,
  name: string,
  address: string,
): RingConnection {
  const uart = createTransport(
    requireChar(charMap, UART_WRITE_UUID),
    requireChar(charMap, UART_NOTIFY_UUID),
    'uart',
  );
  const bigData = createTransport(
    requireChar(charMap, BIG_DATA_WRITE_UUID),
    requireChar(charMap, BIG_DATA_NOTIFY_UUID),
    'big-data',
  );

  let disconnected = false;
  device.onDisconnect(() => {
    disconnected = true;
  });

  return {
    name,
    address,
    uart,
    bigData,
    read: async (uuid) => requireChar(charMap, uuid).read(),
    onDisconnect: (callback) => device.onDisconnect(callback),
    async disconnect(): Promise<void> {
      if (disconnected) return;
      disconnected = true;
      await device.disconnect();
      bleLog.info(`Disconnected from ${name}`);
    },
  };
}
