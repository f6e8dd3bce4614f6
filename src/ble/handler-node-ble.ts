import NodeBle from 'node-ble';
import type { ConnectOptions, ScanResult } from './types.js';
import type { BleChar, BleDevice, RingConnection } from './shared.js';
import { buildRingConnection, connectWithRetries, startNotifying } from './shared.js';
import { isRingName, RING_NAME_PATTERNS } from './matcher.js';
import { abortReason } from '../utils/error.js';
import {
  bleLog,
  normalizeUuid,
  formatMac,
  abortableSleep,
  errMsg,
  withTimeout,
  MAX_CONNECT_RETRIES,
  DISCOVERY_TIMEOUT_MS,
  DISCOVERY_POLL_MS,
  DEFAULT_SCAN_DURATION_MS,
  GATT_DISCOVERY_TIMEOUT_MS,
} from './types.js';

type Device = NodeBle.Device;
type Adapter = NodeBle.Adapter;
type GattCharacteristic = NodeBle.GattCharacteristic;

// ─── Discovery helpers ────────────────────────────────────────────────────────

async function poweredAdapter(bluetooth: NodeBle.Bluetooth): Promise<Adapter> {
  const btAdapter = await bluetooth.defaultAdapter();
  if (!(await btAdapter.isPowered())) {
    throw new Error(
      'Bluetooth adapter is not powered on. ' +
        'Ensure bluetoothd is running: sudo systemctl start bluetooth',
    );
  }
  return btAdapter;
}

/** Start BlueZ discovery, resetting a stale session once. Returns false if passive only. */
async function startDiscoverySafe(btAdapter: Adapter): Promise<boolean> {
  try {
    await btAdapter.startDiscovery();
    bleLog.debug('Discovery started');
    return true;
  } catch (e) {
    bleLog.debug(`startDiscovery failed: ${errMsg(e)}`);
  }

  // Already running (another D-Bus client owns the session)
  if (await btAdapter.isDiscovering()) {
    bleLog.debug('Discovery already active (owned by another client), continuing');
    return true;
  }

  try {
    await btAdapter.stopDiscovery();
  } catch (e) {
    bleLog.debug(`stopDiscovery failed: ${errMsg(e)}`);
  }
  await abortableSleep(1000);

  try {
    await btAdapter.startDiscovery();
    bleLog.debug('Discovery started after reset');
    return true;
  } catch (e) {
    bleLog.debug(`startDiscovery after reset failed: ${errMsg(e)}`);
  }

  bleLog.warn(
    'Could not start active discovery. ' +
      'Proceeding with passive scanning (ring may take longer to appear).',
  );
  return false;
}

/**
 * Stop discovery before connecting: BlueZ on low-power hosts often fails with
 * le-connection-abort-by-local while discovery is still active.
 */
async function stopDiscoveryQuietly(btAdapter: Adapter): Promise<void> {
  try {
    await btAdapter.stopDiscovery();
    bleLog.debug('Discovery stopped');
  } catch {
    bleLog.debug('stopDiscovery failed (may already be stopped)');
  }
}

/** Poll BlueZ's device list until a ring name shows up. */
async function autoDiscover(
  btAdapter: Adapter,
  patterns: readonly RegExp[],
  timeoutMs: number,
  signal?: AbortSignal,
): Promise<{ device: Device; name: string }> {
  const deadline = Date.now() + timeoutMs;
  const checked = new Set<string>();
  let heartbeat = 0;

  while (Date.now() < deadline) {
    if (signal?.aborted) throw abortReason(signal);
    const addresses = await btAdapter.devices();

    for (const addr of addresses) {
      if (checked.has(addr)) continue;
      checked.add(addr);

      try {
        const dev = await btAdapter.getDevice(addr);
        const name = await dev.getName().catch(() => '');
        if (!name) continue;

        bleLog.debug(`Discovered: ${name} [${addr}]`);
        if (isRingName(name, patterns)) {
          bleLog.info(`Found ring: ${name} [${addr}]`);
          return { device: dev, name };
        }
      } catch (err) {
        bleLog.debug(`Skipping ${addr}: ${errMsg(err)}`);
      }
    }

    heartbeat++;
    if (heartbeat % 5 === 0) bleLog.info('Still scanning...');
    await abortableSleep(DISCOVERY_POLL_MS, signal);
  }

  throw new Error(`No ring found within ${timeoutMs / 1000}s`);
}

// ─── BLE abstraction wrappers ─────────────────────────────────────────────────

function wrapChar(char: GattCharacteristic): BleChar {
  return {
    subscribe: (onData) => {
      const listener = (data: Buffer) => onData(data);
      return startNotifying({
        attach: () => char.on('valuechanged', listener),
        detach: () => char.removeListener('valuechanged', listener),
        start: () => char.startNotifications(),
        stop: () => char.stopNotifications(),
      });
    },
    write: async (data, withResponse) => {
      if (withResponse) {
        await char.writeValue(data);
      } else {
        await char.writeValueWithoutResponse(data);
      }
    },
    read: () => char.readValue(),
  };
}

function wrapDevice(device: Device): BleDevice {
  return {
    onDisconnect: (callback) => {
      device.once('disconnect', () => callback());
    },
    disconnect: () => device.disconnect(),
  };
}

async function buildCharMap(gatt: NodeBle.GattServer): Promise<Map<string, BleChar>> {
  const charMap = new Map<string, BleChar>();
  const serviceUuids = await gatt.services();

  for (const svcUuid of serviceUuids) {
    try {
      const service = await gatt.getPrimaryService(svcUuid);
      const charUuids = await service.characteristics();
      bleLog.debug(`  Service ${svcUuid}: chars=[${charUuids.join(', ')}]`);

      for (const charUuid of charUuids) {
        const char = await service.getCharacteristic(charUuid);
        charMap.set(normalizeUuid(charUuid), wrapChar(char));
      }
    } catch (e: unknown) {
      bleLog.debug(`  Service ${svcUuid}: error=${errMsg(e)}`);
    }
  }

  return charMap;
}

// ─── Exports ──────────────────────────────────────────────────────────────────

/**
 * Find a ring, connect and map its characteristics.
 * Uses node-ble (BlueZ D-Bus); requires bluetoothd running on Linux.
 * The D-Bus connection is torn down when the ring is disconnected.
 */
export async function connectRing(opts: ConnectOptions = {}): Promise<RingConnection> {
  const { bluetooth, destroy } = NodeBle.createBluetooth();
  const timeoutMs = opts.discoveryTimeoutMs ?? DISCOVERY_TIMEOUT_MS;
  let device: Device | null = null;

  try {
    const btAdapter = await poweredAdapter(bluetooth);
    await startDiscoverySafe(btAdapter);

    let name: string;
    if (opts.targetAddress) {
      const mac = formatMac(opts.targetAddress);
      bleLog.info(`Scanning for ${mac}...`);
      device = await withTimeout(
        btAdapter.waitDevice(mac),
        timeoutMs,
        `Device ${mac} not found`,
      );
      name = await device.getName().catch(() => '');
    } else {
      bleLog.info('Scanning for ring...');
      const found = await autoDiscover(
        btAdapter,
        opts.namePatterns ?? RING_NAME_PATTERNS,
        timeoutMs,
        opts.signal,
      );
      device = found.device;
      name = found.name;
    }

    await stopDiscoveryQuietly(btAdapter);
    const target = device;
    await connectWithRetries(
      { connect: () => target.connect(), reset: () => target.disconnect() },
      MAX_CONNECT_RETRIES,
      opts.signal,
    );
    bleLog.info('Connected. Discovering services...');

    const gatt = await device.gatt();
    const charMap = await withTimeout(
      buildCharMap(gatt),
      GATT_DISCOVERY_TIMEOUT_MS,
      'GATT service discovery timed out',
    );
    const address = await device.getAddress();

    const inner = wrapDevice(device);
    const bleDevice: BleDevice = {
      onDisconnect: inner.onDisconnect,
      async disconnect() {
        try {
          await inner.disconnect();
        } finally {
          destroy();
        }
      },
    };
    return buildRingConnection(charMap, bleDevice, name, address);
  } catch (err) {
    if (device) {
      await device.disconnect().catch((e: unknown) => {
        bleLog.debug(`Disconnect after setup failure failed: ${errMsg(e)}`);
      });
    }
    destroy();
    throw err;
  }
}

/** List nearby devices for `durationMs`, flagging the ones that look like rings. */
export async function scanRings(
  durationMs = DEFAULT_SCAN_DURATION_MS,
  patterns: readonly RegExp[] = RING_NAME_PATTERNS,
): Promise<ScanResult[]> {
  const { bluetooth, destroy } = NodeBle.createBluetooth();

  try {
    const btAdapter = await poweredAdapter(bluetooth);
    await startDiscoverySafe(btAdapter);

    const seen = new Set<string>();
    const results: ScanResult[] = [];
    const deadline = Date.now() + durationMs;

    while (Date.now() < deadline) {
      const addresses = await btAdapter.devices();

      for (const address of addresses) {
        if (seen.has(address)) continue;
        seen.add(address);

        try {
          const dev = await btAdapter.getDevice(address);
          const name = await dev.getName().catch(() => '(unknown)');
          results.push({ address, name, isRing: isRingName(name, patterns) });
        } catch {
          /* device may have gone away */
        }
      }

      await abortableSleep(DISCOVERY_POLL_MS);
    }

    await stopDiscoveryQuietly(btAdapter);
    return results;
  } finally {
    destroy();
  }
}
