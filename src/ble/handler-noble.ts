import noble from '@abandonware/noble';
import type { Peripheral, Characteristic } from '@abandonware/noble';
import type { ConnectOptions, ScanResult } from './types.js';
import type { BleChar, BleDevice, RingConnection } from './shared.js';
import { buildRingConnection, connectWithRetries, startNotifying } from './shared.js';
import { isRingName, RING_NAME_PATTERNS } from './matcher.js';
import { abortReason } from '../utils/error.js';
import {
  bleLog,
  normalizeUuid,
  abortableSleep,
  sameAddress,
  errMsg,
  withTimeout,
  MAX_CONNECT_RETRIES,
  DISCOVERY_TIMEOUT_MS,
  DISCOVERY_POLL_MS,
  DEFAULT_SCAN_DURATION_MS,
  GATT_DISCOVERY_TIMEOUT_MS,
} from './types.js';

// ─── Noble state management ───────────────────────────────────────────────────

/** Wait for the Bluetooth adapter to reach 'poweredOn' state. */
function waitForPoweredOn(): Promise<void> {
  if (noble._state === 'poweredOn') return Promise.resolve();
  return new Promise<void>((resolve, reject) => {
    const timeout = setTimeout(() => {
      noble.removeListener('stateChange', onState);
      reject(new Error(`Bluetooth adapter state: '${noble._state}' (expected 'poweredOn')`));
    }, 10_000);

    const onState = (state: string): void => {
      if (state === 'poweredOn') {
        clearTimeout(timeout);
        noble.removeListener('stateChange', onState);
        resolve();
      }
    };
    noble.on('stateChange', onState);
  });
}

function stopScanning(): void {
  noble.stopScanningAsync().catch((err: unknown) => {
    bleLog.debug(`stopScanning failed: ${errMsg(err)}`);
  });
}

/** Get a stable device address: MAC on Windows/Linux, peripheral.id on macOS. */
function peripheralAddress(peripheral: Peripheral): string {
  // On macOS, peripheral.address is often empty or '<unknown>'.
  if (peripheral.address && !['', 'unknown', '<unknown>'].includes(peripheral.address)) {
    return peripheral.address.toUpperCase();
  }
  return peripheral.id;
}

function matchesTarget(peripheral: Peripheral, target: string): boolean {
  return sameAddress(peripheral.address, target) || sameAddress(peripheral.id, target);
}

// ─── BLE abstraction wrappers ─────────────────────────────────────────────────

function wrapChar(char: Characteristic): BleChar {
  return {
    subscribe: (onData) => {
      const listener = (data: Buffer) => onData(data);
      return startNotifying({
        attach: () => char.on('data', listener),
        detach: () => char.removeListener('data', listener),
        start: () => char.subscribeAsync(),
        stop: () => char.unsubscribeAsync(),
      });
    },
    write: (data, withResponse) => char.writeAsync(data, !withResponse),
    read: () => char.readAsync(),
  };
}

function wrapPeripheral(peripheral: Peripheral): BleDevice {
  return {
    onDisconnect: (callback) => {
      peripheral.once('disconnect', () => callback());
    },
    disconnect: () => peripheral.disconnectAsync(),
  };
}

// ─── Connection helpers ───────────────────────────────────────────────────────

async function buildCharMap(peripheral: Peripheral): Promise<Map<string, BleChar>> {
  const { characteristics } = await peripheral.discoverAllServicesAndCharacteristicsAsync();
  const charMap = new Map<string, BleChar>();

  for (const char of characteristics) {
    const normalized = normalizeUuid(char.uuid);
    bleLog.debug(`  Char ${char.uuid} (${normalized}) props=[${char.properties.join(',')}]`);
    charMap.set(normalized, wrapChar(char));
  }

  return charMap;
}

// ─── Discovery ────────────────────────────────────────────────────────────────

/** Resolve with the first peripheral matching the target address, or any ring by name. */
function discoverPeripheral(opts: ConnectOptions): Promise<Peripheral> {
  const { targetAddress, signal } = opts;
  const patterns = opts.namePatterns ?? RING_NAME_PATTERNS;
  const timeoutMs = opts.discoveryTimeoutMs ?? DISCOVERY_TIMEOUT_MS;
  if (signal?.aborted) return Promise.reject(abortReason(signal));

  return new Promise((resolve, reject) => {
    const timeout = setTimeout(() => {
      cleanup();
      reject(new Error(`No ring found within ${timeoutMs / 1000}s`));
    }, timeoutMs);

    let heartbeat = 0;
    const heartbeatInterval = setInterval(() => {
      heartbeat++;
      if (heartbeat % 5 === 0) bleLog.info('Still scanning...');
    }, DISCOVERY_POLL_MS);

    const cleanup = () => {
      clearTimeout(timeout);
      clearInterval(heartbeatInterval);
      noble.removeListener('discover', onDiscover);
      stopScanning();
      signal?.removeEventListener('abort', onAbort);
    };

    const onAbort = () => {
      cleanup();
      reject(abortReason(signal));
    };
    signal?.addEventListener('abort', onAbort, { once: true });

    const onDiscover = (peripheral: Peripheral): void => {
      const name = peripheral.advertisement?.localName ?? '';
      const addr = peripheralAddress(peripheral);
      bleLog.debug(`Discovered: ${name || '(no name)'} [${addr}]`);

      const matched = targetAddress ? matchesTarget(peripheral, targetAddress) : isRingName(name, patterns);
      if (!matched) return;

      bleLog.info(`Found ring: ${name || '(no name)'} [${addr}]`);
      cleanup();
      resolve(peripheral);
    };

    noble.on('discover', onDiscover);
    noble.startScanningAsync([], true).catch((err: unknown) => {
      cleanup();
      reject(new Error(`Failed to start scanning: ${errMsg(err)}`));
    });

    bleLog.info('Scanning for ring...');
  });
}

// ─── Exports ──────────────────────────────────────────────────────────────────

/**
 * Find a ring, connect and map its characteristics.
 * Uses noble; works on Windows and macOS.
 */
export async function connectRing(opts: ConnectOptions = {}): Promise<RingConnection> {
  await waitForPoweredOn();
  const peripheral = await discoverPeripheral(opts);

  await connectWithRetries(
    { connect: () => peripheral.connectAsync(), reset: () => peripheral.disconnectAsync() },
    MAX_CONNECT_RETRIES,
    opts.signal,
  );
  bleLog.info('Connected. Discovering services...');

  try {
    const charMap = await withTimeout(
      buildCharMap(peripheral),
      GATT_DISCOVERY_TIMEOUT_MS,
      'GATT service discovery timed out',
    );
    return buildRingConnection(
      charMap,
      wrapPeripheral(peripheral),
      peripheral.advertisement?.localName ?? '',
      peripheralAddress(peripheral),
    );
  } catch (err) {
    await peripheral.disconnectAsync().catch((e: unknown) => {
      bleLog.debug(`Disconnect after setup failure failed: ${errMsg(e)}`);
    });
    throw err;
  }
}

/** List nearby devices for `durationMs`, flagging the ones that look like rings. */
export async function scanRings(
  durationMs = DEFAULT_SCAN_DURATION_MS,
  patterns: readonly RegExp[] = RING_NAME_PATTERNS,
): Promise<ScanResult[]> {
  await waitForPoweredOn();

  const results: ScanResult[] = [];
  const seen = new Set<string>();

  const onDiscover = (peripheral: Peripheral): void => {
    const address = peripheralAddress(peripheral);
    if (seen.has(address)) return;
    seen.add(address);

    const name = peripheral.advertisement?.localName ?? '(unknown)';
    results.push({ address, name, isRing: isRingName(name, patterns) });
  };

  noble.on('discover', onDiscover);
  try {
    await noble.startScanningAsync([], true);
    await abortableSleep(durationMs);
  } finally {
    noble.removeListener('discover', onDiscover);
    stopScanning();
  }

  return results;
}
