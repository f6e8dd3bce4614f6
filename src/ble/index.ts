import type { ConnectOptions, ScanResult } from './types.js';
import type { RingConnection } from './shared.js';
import { bleLog } from './types.js';

export type { ConnectOptions, ScanResult } from './types.js';
export type { RingConnection } from './shared.js';

export type BleDriver = 'noble' | 'node-ble';

/** Resolve the BLE_DRIVER env var (or configured driver) to a handler, or null for the OS default. */
export function resolveDriver(requested?: string | null): BleDriver | null {
  const driver = (requested ?? process.env.BLE_DRIVER)?.toLowerCase();
  if (driver === 'noble') return 'noble';
  if (driver === 'node-ble') return 'node-ble';
  return null;
}

/** Linux → node-ble (BlueZ D-Bus); everything else → @abandonware/noble. */
export function effectiveDriver(driver: BleDriver | null, platform: NodeJS.Platform = process.platform): BleDriver {
  if (driver) return driver;
  return platform === 'linux' ? 'node-ble' : 'noble';
}

function handlerName(driver: BleDriver): string {
  return driver === 'node-ble' ? 'node-ble (BlueZ D-Bus)' : 'noble (@abandonware/noble)';
}

/**
 * Find a ring and open a connection to it.
 *
 * OS detection selects the BLE handler at runtime; override with
 * BLE_DRIVER=noble|node-ble. Dynamic import() keeps the unused library unloaded.
 */
export async function connectRing(
  opts: ConnectOptions = {},
  driver: BleDriver | null = resolveDriver(),
): Promise<RingConnection> {
  const selected = effectiveDriver(driver);
  bleLog.debug(`BLE handler: ${handlerName(selected)}`);

  if (selected === 'node-ble') {
    const { connectRing: impl } = await import('./handler-node-ble.js');
    return impl(opts);
  }
  const { connectRing: impl } = await import('./handler-noble.js');
  return impl(opts);
}

/** Scan for nearby BLE devices and flag the ones whose names match a ring. */
export async function scanRings(
  durationMs?: number,
  patterns?: readonly RegExp[],
  driver: BleDriver | null = resolveDriver(),
): Promise<ScanResult[]> {
  const selected = effectiveDriver(driver);
  bleLog.debug(`BLE handler: ${handlerName(selected)}`);

  if (selected === 'node-ble') {
    const { scanRings: impl } = await import('./handler-node-ble.js');
    return impl(durationMs, patterns);
  }
  const { scanRings: impl } = await import('./handler-noble.js');
  return impl(durationMs, patterns);
}
