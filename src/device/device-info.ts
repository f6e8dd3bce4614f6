import { createLogger } from '../logger.js';
import { DEVICE_INFO_CHARS } from '../protocol/constants.js';
import { errMsg } from '../utils/error.js';

const log = createLogger('DeviceInfo');

export const NOT_AVAILABLE = 'Not available';

export type DeviceInfoField = keyof typeof DEVICE_INFO_CHARS;

export interface DeviceInfo {
  manufacturer: string;
  model: string;
  hardwareVersion: string;
  firmwareVersion: string;
  serialNumber: string;
  /** YYYY-MM-DD, when the firmware string carries one. */
  buildDate?: string;
}

/** Reads one characteristic by 16-bit or 128-bit UUID. */
export type CharacteristicReader = (uuid: string) => Promise<Buffer>;

const utf8 = new TextDecoder('utf-8', { fatal: true });

/** UTF-8 text, hex when the bytes are not valid UTF-8, NOT_AVAILABLE when empty. */
export function formatCharValue(value: Uint8Array): string {
  if (value.length === 0) return NOT_AVAILABLE;
  try {
    const text = utf8.decode(value).replace(/\0+$/, '').trim();
    return text || NOT_AVAILABLE;
  } catch {
    return Buffer.from(value).toString('hex');
  }
}

/** `RY02_3.00.06_240105` → `2024-01-05`. */
export function parseFirmwareBuildDate(firmware: string): string | undefined {
  if (!firmware.startsWith('RY02_')) return undefined;
  const parts = firmware.split('_');
  const date = parts[2];
  if (parts.length < 3 || !/^\d{6}$/.test(date)) return undefined;
  return `20${date.slice(0, 2)}-${date.slice(2, 4)}-${date.slice(4, 6)}`;
}

async function readField(read: CharacteristicReader, field: DeviceInfoField): Promise<string> {
  try {
    return formatCharValue(await read(DEVICE_INFO_CHARS[field]));
  } catch (err) {
    log.debug(`Could not read ${field}: ${errMsg(err)}`);
    return NOT_AVAILABLE;
  }
}

export async function readDeviceInfo(read: CharacteristicReader): Promise<DeviceInfo> {
  const info: DeviceInfo = {
    manufacturer: await readField(read, 'manufacturer'),
    model: await readField(read, 'model'),
    hardwareVersion: await readField(read, 'hardwareVersion'),
    firmwareVersion: await readField(read, 'firmwareVersion'),
    serialNumber: await readField(read, 'serialNumber'),
  };
  const buildDate = parseFirmwareBuildDate(info.firmwareVersion);
  if (buildDate) info.buildDate = buildDate;
  return info;
}
