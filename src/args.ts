import type { RealtimeKind } from './device/realtime.js';
import { SENSOR_KINDS } from './settings/sensor-settings.js';
import type { SensorKind } from './settings/sensor-settings.js';

export type CliCommand =
  | { name: 'battery' }
  | { name: 'sleep'; allowPartial: boolean; fallbackStart?: Date }
  | { name: 'settings' }
  | { name: 'settings-set'; sensor: SensorKind; enabled: boolean; intervalMinutes?: number }
  | { name: 'set-time' }
  | { name: 'info' }
  | { name: 'realtime'; kind: RealtimeKind; count?: number }
  | { name: 'scan'; durationMs?: number };

export interface CliArgs {
  command: CliCommand;
  configPath?: string;
  address?: string;
  debug: boolean;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export const USAGE = `Usage: ring-link [options] <command>

Commands:
  battery                               Battery level and charging state
  sleep [--allow-partial] [--start ISO] Download and decode last night's sleep
  settings                              Show sensor logging settings
  settings set <sensor> on|off [min]    Change a sensor setting (heart-rate interval in minutes)
  set-time                              Set the ring's clock to local time
  info                                  Device information
  heart-rate [--count N]                Live heart-rate readings until Ctrl+C
  spo2 [--count N]                      Live SpO2 readings until Ctrl+C
  scan [--duration SEC]                 List nearby rings

Options:
  --config PATH    Configuration file (default: config.yaml)
  --address ADDR   Ring MAC address (or CoreBluetooth UUID on macOS)
  --debug          Verbose logging with frame dumps

Sensors: ${SENSOR_KINDS.join(', ')}`;

const SENSOR_ALIASES: Record<string, SensorKind> = {
  hr: 'heart-rate',
  spo2: 'blood-oxygen',
  stress: 'pressure',
};

function parseSensor(raw: string | undefined): SensorKind {
  if (!raw) throw new UsageError('Missing sensor name');
  const lower = raw.toLowerCase();
  const sensor = SENSOR_KINDS.find((k) => k === lower) ?? SENSOR_ALIASES[lower];
  if (!sensor) throw new UsageError(`Unknown sensor '${raw}' (expected ${SENSOR_KINDS.join(', ')})`);
  return sensor;
}

function parseSwitch(raw: string | undefined): boolean {
  if (raw === 'on') return true;
  if (raw === 'off') return false;
  throw new UsageError(`Expected 'on' or 'off', got '${raw ?? ''}'`);
}

function parsePositiveInt(flag: string, raw: string | undefined): number {
  const num = Number(raw);
  if (!raw || !Number.isInteger(num) || num < 1) {
    throw new UsageError(`${flag} must be a positive integer, got '${raw ?? ''}'`);
  }
  return num;
}

function parseDate(raw: string | undefined): Date {
  const date = new Date(raw ?? '');
  if (!raw || Number.isNaN(date.getTime())) {
    throw new UsageError(`--start must be an ISO date/time, got '${raw ?? ''}'`);
  }
  return date;
}

/** Parse `process.argv.slice(2)`. Options may appear anywhere. */
export function parseArgs(argv: readonly string[]): CliArgs {
  const positional: string[] = [];
  const flags = new Map<string, string | true>();
  const valued = new Set(['--config', '--address', '--start', '--count', '--duration']);

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (!arg.startsWith('--')) {
      positional.push(arg);
      continue;
    }
    if (valued.has(arg)) {
      const value = argv[i + 1];
      if (value === undefined || value.startsWith('--')) throw new UsageError(`${arg} needs a value`);
      flags.set(arg, value);
      i++;
    } else if (arg === '--debug' || arg === '--allow-partial') {
      flags.set(arg, true);
    } else {
      throw new UsageError(`Unknown option ${arg}`);
    }
  }

  const str = (flag: string): string | undefined => {
    const value = flags.get(flag);
    return typeof value === 'string' ? value : undefined;
  };

  const [name, ...rest] = positional;
  let command: CliCommand;
  switch (name) {
    case 'battery':
    case 'set-time':
    case 'info':
      command = { name };
      break;
    case 'sleep':
      command = {
        name: 'sleep',
        allowPartial: flags.has('--allow-partial'),
        ...(flags.has('--start') ? { fallbackStart: parseDate(str('--start')) } : {}),
      };
      break;
    case 'settings':
      if (rest.length === 0) {
        command = { name: 'settings' };
      } else if (rest[0] === 'set') {
        const sensor = parseSensor(rest[1]);
        const enabled = parseSwitch(rest[2]);
        command = {
          name: 'settings-set',
          sensor,
          enabled,
          ...(rest[3] !== undefined ? { intervalMinutes: parsePositiveInt('interval', rest[3]) } : {}),
        };
      } else {
        throw new UsageError(`Unknown settings subcommand '${rest[0]}'`);
      }
      break;
    case 'heart-rate':
    case 'spo2':
      command = {
        name: 'realtime',
        kind: name,
        ...(flags.has('--count') ? { count: parsePositiveInt('--count', str('--count')) } : {}),
      };
      break;
    case 'scan':
      command = {
        name: 'scan',
        ...(flags.has('--duration')
          ? { durationMs: parsePositiveInt('--duration', str('--duration')) * 1000 }
          : {}),
      };
      break;
    case undefined:
      throw new UsageError('Missing command');
    default:
      throw new UsageError(`Unknown command '${name}'`);
  }

  return {
    command,
    configPath: str('--config'),
    address: str('--address'),
    debug: flags.has('--debug'),
  };
}
