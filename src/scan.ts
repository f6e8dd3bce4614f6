import './env.js';

import { pathToFileURL } from 'node:url';
import { scanRings, resolveDriver } from './ble/index.js';
import type { BleDriver, ScanResult } from './ble/index.js';
import { RING_NAME_PATTERNS } from './ble/matcher.js';
import { DEFAULT_SCAN_DURATION_MS } from './ble/types.js';
import { errMsg } from './utils/error.js';

export interface ScanCommandOptions {
  durationMs?: number;
  patterns?: readonly RegExp[];
  driver?: BleDriver | null;
}

export function formatScanResults(results: readonly ScanResult[]): string[] {
  const rings = results.filter((r) => r.isRing);
  const lines = results.map((r) => `  ${r.address}  Name: ${r.name}${r.isRing ? ' << ring' : ''}`);
  lines.push('', `Done. Found ${results.length} device(s).`);

  if (rings.length === 0) {
    lines.push('', 'No rings found. Make sure the ring is charged and not connected to a phone.');
    return lines;
  }

  lines.push('', `--- Rings (${rings.length}) ---`);
  for (const r of rings) lines.push(`  ${r.address}  ${r.name}`);
  lines.push('', 'To pin to a specific ring, add to .env:', `  RING_ADDRESS=${rings[0].address}`);
  if (rings.length === 1) {
    lines.push('', 'Only one ring found, so auto-discovery works without RING_ADDRESS.');
  }
  return lines;
}

export async function runScan(opts: ScanCommandOptions = {}): Promise<ScanResult[]> {
  const durationMs = opts.durationMs ?? DEFAULT_SCAN_DURATION_MS;
  console.log(`Scanning for BLE devices... (${durationMs / 1000} seconds)\n`);
  const results = await scanRings(
    durationMs,
    opts.patterns ?? RING_NAME_PATTERNS,
    opts.driver === undefined ? resolveDriver() : opts.driver,
  );
  for (const line of formatScanResults(results)) console.log(line);
  return results;
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  runScan().catch((err: unknown) => {
    console.error(`Error: ${errMsg(err)}`);
    process.exit(1);
  });
}
