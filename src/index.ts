#!/usr/bin/env node

// Load .env before any other module initializes
import './env.js';

import { parseArgs, UsageError, USAGE } from './args.js';
import type { CliArgs, CliCommand } from './args.js';
import { connectRing, resolveDriver } from './ble/index.js';
import { RingClient } from './client.js';
import { loadAppConfig, namePatterns, toClientOptions } from './config/load.js';
import type { AppConfig } from './config/schema.js';
import { createLogger, LogLevel, setLogLevel } from './logger.js';
import { BulkTransferTimeoutError } from './protocol/errors.js';
import { formatBattery, formatDeviceInfo, formatSetting, formatSettings, formatSleepDay } from './report.js';
import { runScan } from './scan.js';
import { errMsg } from './utils/error.js';

const log = createLogger('Ring');

// ─── Abort / signal handling ─────────────────────────────────────────────────

const ac = new AbortController();
const { signal } = ac;
let forceExitOnNext = false;

function onSignal(): void {
  if (forceExitOnNext) {
    log.info('Force exit.');
    process.exit(1);
  }
  forceExitOnNext = true;
  log.info('\nShutting down gracefully... (press again to force exit)');
  ac.abort();
}

process.on('SIGINT', onSignal);
process.on('SIGTERM', onSignal);

// ─── Commands ────────────────────────────────────────────────────────────────

function print(lines: string | string[]): void {
  for (const line of Array.isArray(lines) ? lines : [lines]) log.info(line);
}

async function runCommand(client: RingClient, command: CliCommand, config: AppConfig): Promise<void> {
  switch (command.name) {
    case 'battery':
      print(formatBattery(await client.battery({ signal })));
      return;

    case 'set-time': {
      const now = new Date();
      await client.setTime(now);
      print(`Clock set to ${now.toLocaleString()}`);
      return;
    }

    case 'info':
      print(formatDeviceInfo(await client.deviceInfo()));
      return;

    case 'settings':
      print(formatSettings(await client.settings.queryAll({ signal })));
      return;

    case 'settings-set': {
      const { setting, confirmed } = await client.settings.updateAndVerify(
        command.sensor,
        { enabled: command.enabled, intervalMinutes: command.intervalMinutes },
        { signal },
      );
      print(formatSetting(command.sensor, setting));
      if (!confirmed) {
        log.warn('The ring did not report the requested setting');
        process.exitCode = 1;
      }
      return;
    }

    case 'sleep': {
      const allowPartial = command.allowPartial || config.runtime.allow_partial;
      try {
        const { day } = await client.readSleep({
          fallbackStart: command.fallbackStart,
          allowPartial,
          signal,
        });
        print(day ? formatSleepDay(day) : 'No sleep data on the ring.');
      } catch (err) {
        if (!(err instanceof BulkTransferTimeoutError) || !err.partial) throw err;
        log.warn(`${err.message}; showing partial data`);
        print(`Partial transfer: ${err.partial.records.length} record(s) over ${err.partial.frameCount} frame(s)`);
        process.exitCode = 1;
      }
      return;
    }

    case 'realtime': {
      const unit = command.kind === 'heart-rate' ? 'bpm' : '%';
      log.info(`Measuring ${command.kind}... (Ctrl+C to stop)`);
      const count = await client.realtime(command.kind, (r) => print(`${r.kind}: ${r.value} ${unit}`), {
        signal,
        maxReadings: command.count,
      });
      print(`${count} reading(s)`);
      return;
    }

    case 'scan':
      return;
  }
}

// ─── Main ────────────────────────────────────────────────────────────────────

function parseCli(): CliArgs {
  try {
    return parseArgs(process.argv.slice(2));
  } catch (err) {
    if (err instanceof UsageError) {
      console.error(`${err.message}\n\n${USAGE}`);
      process.exit(2);
    }
    throw err;
  }
}

async function main(): Promise<void> {
  const args = parseCli();
  const config = loadAppConfig(args.configPath ?? 'config.yaml');
  if (args.debug || config.runtime.debug) setLogLevel(LogLevel.DEBUG);

  const patterns = namePatterns(config);
  const driver = resolveDriver(config.ble.ble_driver);

  if (args.command.name === 'scan') {
    await runScan({ durationMs: args.command.durationMs, patterns, driver });
    return;
  }

  const targetAddress = args.address ?? config.ble.device_address ?? undefined;
  log.info(targetAddress ? `Connecting to ${targetAddress}...` : 'Looking for a ring...');

  const connection = await connectRing(
    {
      targetAddress,
      namePatterns: patterns,
      discoveryTimeoutMs: config.ble.scan_timeout_ms,
      signal,
    },
    driver,
  );
  log.info(`Connected to ${connection.name || '(no name)'} [${connection.address}]`);

  const client = new RingClient(connection, toClientOptions(config));
  try {
    await runCommand(client, args.command, config);
  } finally {
    await client.disconnect().catch((err: unknown) => log.debug(`Disconnect failed: ${errMsg(err)}`));
  }
}

main().catch((err: unknown) => {
  if (signal.aborted) {
    log.info('Stopped.');
    return;
  }
  log.error(errMsg(err));
  process.exit(1);
});
