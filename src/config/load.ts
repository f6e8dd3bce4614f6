import { existsSync, readFileSync } from 'node:fs';
import { parse as parseYaml } from 'yaml';
import { compileNamePatterns, RING_NAME_PATTERNS } from '../ble/matcher.js';
import type { RingClientOptions } from '../client.js';
import { createLogger } from '../logger.js';
import { fixedOffset, marked, shortFrameCompletion } from '../protocol/bulk-reassembler.js';
import type { HeaderStyle } from '../protocol/bulk-reassembler.js';
import { errMsg } from '../utils/error.js';
import { AppConfigSchema, formatConfigError } from './schema.js';
import type { AppConfig, HeaderStyleConfig } from './schema.js';

const log = createLogger('Config');

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

type Env = Record<string, string | undefined>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(raw: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = raw[key];
  return isRecord(value) ? { ...value } : {};
}

/** Overlay RING_ADDRESS, BLE_DRIVER and DEBUG onto the raw file contents before validation. */
export function applyEnvOverrides(raw: Record<string, unknown>, env: Env): Record<string, unknown> {
  const result: Record<string, unknown> = { ...raw };
  const ble = section(raw, 'ble');
  const runtime = section(raw, 'runtime');

  if (env.RING_ADDRESS) ble.device_address = env.RING_ADDRESS;
  if (env.BLE_DRIVER) ble.ble_driver = env.BLE_DRIVER.toLowerCase();
  if (env.DEBUG) runtime.debug = !['0', 'false', 'no'].includes(env.DEBUG.toLowerCase());

  if (Object.keys(ble).length > 0 || 'ble' in raw) result.ble = ble;
  if (Object.keys(runtime).length > 0 || 'runtime' in raw) result.runtime = runtime;
  return result;
}

/** Validate an already-parsed config object; throws ConfigError with a readable report. */
export function parseAppConfig(raw: unknown, env: Env = process.env, source = 'config.yaml'): AppConfig {
  const base = raw === null || raw === undefined ? { version: 1 } : raw;
  if (!isRecord(base)) {
    throw new ConfigError(`Configuration error in ${source}: expected a mapping at the top level`);
  }
  const result = AppConfigSchema.safeParse(applyEnvOverrides(base, env));
  if (!result.success) {
    throw new ConfigError(formatConfigError(result.error, source));
  }
  return result.data;
}

/** Read `path` (YAML); a missing file yields the defaults plus env overrides. */
export function loadAppConfig(path: string, env: Env = process.env): AppConfig {
  if (!existsSync(path)) {
    log.debug(`${path} not found, using defaults`);
    return parseAppConfig(undefined, env, path);
  }

  let raw: unknown;
  try {
    raw = parseYaml(readFileSync(path, 'utf8'));
  } catch (err) {
    throw new ConfigError(`Could not parse ${path}: ${errMsg(err)}`);
  }
  return parseAppConfig(raw, env, path);
}

// ─── Mapping to runtime options ───────────────────────────────────────────────

export function toHeaderStyle(style: HeaderStyleConfig): HeaderStyle | 'auto' {
  if (style === 'auto') return 'auto';
  if ('marker' in style) return marked(style.marker);
  return fixedOffset(style.fixed_offset);
}

export function toClientOptions(config: AppConfig): RingClientOptions {
  const { protocol } = config;
  return {
    responseTimeoutMs: protocol.response_timeout_ms,
    bulkTimeoutMs: protocol.bulk_timeout_ms,
    queueCapacity: protocol.queue_capacity,
    bulk: {
      headerStyle: toHeaderStyle(protocol.header_style),
      isComplete: shortFrameCompletion(protocol.final_frame_threshold),
    },
  };
}

/** Built-in ring names plus any configured extras. */
export function namePatterns(config: AppConfig): RegExp[] {
  return [...RING_NAME_PATTERNS, ...compileNamePatterns(config.ble.name_patterns ?? [])];
}
