import type { RequestResponseChannel, SendOptions } from '../protocol/channel.js';
import { Command } from '../protocol/constants.js';
import { parsePacket } from '../protocol/packet.js';

export interface BatteryStatus {
  /** Charge level, percent. */
  level: number;
  charging: boolean;
}

/** Battery response: [0] 0x03, [1] level %, [2] charging flag. */
export function parseBatteryResponse(frame: Buffer): BatteryStatus {
  const { payload } = parsePacket(frame);
  return {
    level: payload[0],
    charging: payload[1] !== 0,
  };
}

export async function readBattery(
  channel: RequestResponseChannel,
  opts: SendOptions = {},
): Promise<BatteryStatus> {
  const frame = await channel.send(Command.BATTERY, [], opts);
  return parseBatteryResponse(frame);
}
