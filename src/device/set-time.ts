import { encodeBcdTime } from '../protocol/bcd-time.js';
import type { BcdTimeOptions } from '../protocol/bcd-time.js';
import type { RequestResponseChannel } from '../protocol/channel.js';
import { Command } from '../protocol/constants.js';

/** Write the ring's clock. The firmware's reply, if any, is not awaited. */
export async function setTime(
  channel: RequestResponseChannel,
  date: Date = new Date(),
  opts: BcdTimeOptions = {},
): Promise<void> {
  await channel.sendOnly(Command.SET_TIME, encodeBcdTime(date, opts));
}
