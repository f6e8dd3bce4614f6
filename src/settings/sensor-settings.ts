import { createLogger } from '../logger.js';
import type { RequestResponseChannel, SendOptions } from '../protocol/channel.js';
import { Command } from '../protocol/constants.js';
import { parsePacket } from '../protocol/packet.js';

const log = createLogger('Settings');

export type SensorKind = 'heart-rate' | 'blood-oxygen' | 'pressure' | 'hrv';

export const SENSOR_KINDS: readonly SensorKind[] = ['heart-rate', 'blood-oxygen', 'pressure', 'hrv'];

export const SENSOR_COMMANDS: Record<SensorKind, number> = {
  'heart-rate': Command.HEART_RATE_LOG_SETTINGS,
  'blood-oxygen': Command.BLOOD_OXYGEN_SETTINGS,
  pressure: Command.PRESSURE_SETTINGS,
  hrv: Command.HRV_SETTINGS,
};

const ACTION_QUERY = 1;
const ACTION_WRITE = 2;
const FLAG_ENABLED = 1;
const FLAG_DISABLED = 2;

/** Interval written when heart-rate logging is switched off without one. */
export const DEFAULT_HEART_RATE_INTERVAL = 60;

export interface SensorSetting {
  enabled: boolean;
  /** Logging interval in minutes; 0 for sensors without one. */
  intervalMinutes: number;
}

export interface SensorSettingChange {
  enabled: boolean;
  /** Heart-rate only; 1-255 minutes. */
  intervalMinutes?: number;
}

export interface VerifiedSetting {
  setting: SensorSetting;
  /** True when the re-queried setting reflects the requested change. */
  confirmed: boolean;
}

/**
 * Decode a settings query response:
 *   [0]  command id
 *   [2]  1 = enabled
 *   [3]  interval in minutes (heart-rate only)
 */
export function parseSensorSetting(sensor: SensorKind, frame: Buffer): SensorSetting {
  const { payload } = parsePacket(frame);
  return {
    enabled: payload[1] === FLAG_ENABLED,
    intervalMinutes: sensor === 'heart-rate' ? payload[2] : 0,
  };
}

export function buildSettingPayload(sensor: SensorKind, change: SensorSettingChange): number[] {
  const flag = change.enabled ? FLAG_ENABLED : FLAG_DISABLED;
  if (sensor !== 'heart-rate') return [ACTION_WRITE, flag];

  const interval = change.intervalMinutes ?? DEFAULT_HEART_RATE_INTERVAL;
  if (!Number.isInteger(interval) || interval < 1 || interval > 255) {
    throw new RangeError(`Heart-rate interval must be 1-255 minutes, got ${interval}`);
  }
  return [ACTION_WRITE, flag, interval];
}

/**
 * Per-sensor logging settings over the command channel. The device sends no
 * acknowledgement for a change; `updateAndVerify()` confirms by re-querying.
 */
export class SensorSettingsProtocol {
  constructor(private readonly channel: RequestResponseChannel) {}

  async query(sensor: SensorKind, opts: SendOptions = {}): Promise<SensorSetting> {
    const frame = await this.channel.send(SENSOR_COMMANDS[sensor], [ACTION_QUERY], opts);
    const setting = parseSensorSetting(sensor, frame);
    log.debug(`${sensor}: enabled=${setting.enabled} interval=${setting.intervalMinutes}`);
    return setting;
  }

  async queryAll(opts: SendOptions = {}): Promise<Record<SensorKind, SensorSetting>> {
    return {
      'heart-rate': await this.query('heart-rate', opts),
      'blood-oxygen': await this.query('blood-oxygen', opts),
      pressure: await this.query('pressure', opts),
      hrv: await this.query('hrv', opts),
    };
  }

  async update(sensor: SensorKind, change: SensorSettingChange): Promise<void> {
    const payload = buildSettingPayload(sensor, change);
    await this.channel.sendOnly(SENSOR_COMMANDS[sensor], payload);
    log.info(`Requested ${sensor} logging ${change.enabled ? 'on' : 'off'}`);
  }

  async updateAndVerify(
    sensor: SensorKind,
    change: SensorSettingChange,
    opts: SendOptions = {},
  ): Promise<VerifiedSetting> {
    await this.update(sensor, change);
    const setting = await this.query(sensor, opts);

    let confirmed = setting.enabled === change.enabled;
    if (sensor === 'heart-rate' && change.enabled && change.intervalMinutes !== undefined) {
      confirmed = confirmed && setting.intervalMinutes === change.intervalMinutes;
    }
    if (!confirmed) {
      log.warn(`${sensor} setting not reflected by the device after update`);
    }
    return { setting, confirmed };
  }
}
