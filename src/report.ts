import type { BatteryStatus } from './device/battery.js';
import type { DeviceInfo } from './device/device-info.js';
import { SENSOR_KINDS } from './settings/sensor-settings.js';
import type { SensorKind, SensorSetting } from './settings/sensor-settings.js';
import { summarizeSleep } from './sleep/decoder.js';
import type { SleepDay } from './sleep/decoder.js';
import { stageLabel } from './sleep/stage.js';

// Plain-text lines for the CLI; one entry per printed line.

function hhmm(date: Date): string {
  return `${String(date.getHours()).padStart(2, '0')}:${String(date.getMinutes()).padStart(2, '0')}`;
}

function hoursMinutes(minutes: number): string {
  return `${Math.floor(minutes / 60)}h ${String(minutes % 60).padStart(2, '0')}m`;
}

export function formatBattery(status: BatteryStatus): string {
  return `Battery: ${status.level}%${status.charging ? ' (charging)' : ''}`;
}

export function formatSleepDay(day: SleepDay): string[] {
  const totals = summarizeSleep(day);
  const lines = [
    `Sleep ${day.date}: ${hhmm(day.sleepStart)} - ${hhmm(day.sleepEnd)}`,
    ...day.periods.map(
      (p) => `  ${hhmm(p.startTime)}  ${stageLabel(p.stage).padEnd(12)} ${p.durationMinutes} min`,
    ),
    `Total sleep: ${hoursMinutes(totals.totalSleepMinutes)}`,
    `  Deep ${totals.deepMinutes} min | Light ${totals.lightMinutes} min | REM ${totals.remMinutes} min | Awake ${totals.awakeMinutes} min`,
  ];
  if (totals.unknownMinutes > 0) lines.push(`  Unrecognized stages: ${totals.unknownMinutes} min`);
  return lines;
}

export function formatSetting(sensor: SensorKind, setting: SensorSetting): string {
  const interval = setting.intervalMinutes > 0 ? `, every ${setting.intervalMinutes} min` : '';
  return `${sensor.padEnd(13)} ${setting.enabled ? 'on' : 'off'}${interval}`;
}

export function formatSettings(settings: Record<SensorKind, SensorSetting>): string[] {
  return SENSOR_KINDS.map((sensor) => formatSetting(sensor, settings[sensor]));
}

export function formatDeviceInfo(info: DeviceInfo): string[] {
  const rows: [string, string][] = [
    ['Manufacturer', info.manufacturer],
    ['Model', info.model],
    ['Hardware Version', info.hardwareVersion],
    ['Firmware Version', info.firmwareVersion],
    ['Serial Number', info.serialNumber],
  ];
  if (info.buildDate) rows.push(['Build Date', info.buildDate]);
  const width = Math.max(...rows.map(([k]) => k.length));
  return rows.map(([k, v]) => `${k.padEnd(width)}: ${v}`);
}
