import type { RingConnection } from './ble/shared.js';
import { readBattery } from './device/battery.js';
import type { BatteryStatus } from './device/battery.js';
import { readDeviceInfo } from './device/device-info.js';
import type { DeviceInfo } from './device/device-info.js';
import { streamRealtime } from './device/realtime.js';
import type { RealtimeKind, RealtimeReading } from './device/realtime.js';
import { setTime } from './device/set-time.js';
import { createLogger } from './logger.js';
import { BulkTransferSession } from './protocol/bulk-session.js';
import type { BulkSessionOptions } from './protocol/bulk-session.js';
import type { BulkTransferResult } from './protocol/bulk-reassembler.js';
import { RequestResponseChannel } from './protocol/channel.js';
import type { SendOptions } from './protocol/channel.js';
import { BulkSubcommand, BULK_TIMEOUT_MS, FRAME_QUEUE_CAPACITY, RESPONSE_TIMEOUT_MS } from './protocol/constants.js';
import { ExchangeLock } from './protocol/exchange-lock.js';
import { SensorSettingsProtocol } from './settings/sensor-settings.js';
import { decodeSleepDay } from './sleep/decoder.js';
import type { SleepDay } from './sleep/decoder.js';

const log = createLogger('Ring');

export interface RingClientOptions {
  responseTimeoutMs?: number;
  bulkTimeoutMs?: number;
  queueCapacity?: number;
  /** Header style and completion rule for bulk transfers. */
  bulk?: Omit<BulkSessionOptions, 'queueCapacity'>;
}

export interface ReadSleepOptions {
  fallbackStart?: Date;
  allowPartial?: boolean;
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface SleepReadout {
  transfer: BulkTransferResult;
  /** Null when the ring returned no records. */
  day: SleepDay | null;
}

export interface RealtimeStreamOptions {
  signal: AbortSignal;
  maxReadings?: number;
  keepAliveMs?: number;
}

/**
 * Every protocol operation against one connected ring. The command channel, bulk
 * sessions and realtime streams share one ExchangeLock, so at most one exchange
 * is in flight on the connection.
 */
export class RingClient {
  readonly lock = new ExchangeLock();
  readonly channel: RequestResponseChannel;
  readonly settings: SensorSettingsProtocol;
  private readonly responseTimeoutMs: number;
  private readonly bulkTimeoutMs: number;
  private readonly queueCapacity: number;

  constructor(
    readonly connection: RingConnection,
    private readonly opts: RingClientOptions = {},
  ) {
    this.responseTimeoutMs = opts.responseTimeoutMs ?? RESPONSE_TIMEOUT_MS;
    this.bulkTimeoutMs = opts.bulkTimeoutMs ?? BULK_TIMEOUT_MS;
    this.queueCapacity = opts.queueCapacity ?? FRAME_QUEUE_CAPACITY;
    this.channel = new RequestResponseChannel(connection.uart, {
      timeoutMs: this.responseTimeoutMs,
      queueCapacity: this.queueCapacity,
      lock: this.lock,
    });
    this.settings = new SensorSettingsProtocol(this.channel);
    connection.onDisconnect(() => log.warn(`${connection.name || connection.address} disconnected`));
  }

  battery(opts: SendOptions = {}): Promise<BatteryStatus> {
    return readBattery(this.channel, opts);
  }

  setTime(date: Date = new Date()): Promise<void> {
    return setTime(this.channel, date);
  }

  /** Run one bulk transfer on the big-data channel under the connection lock. */
  bulkTransfer(
    subcommand: number,
    opts: Omit<ReadSleepOptions, 'fallbackStart'> = {},
  ): Promise<BulkTransferResult> {
    return this.lock.run(async () => {
      const session = new BulkTransferSession(this.connection.bigData, {
        ...this.opts.bulk,
        queueCapacity: this.queueCapacity,
      });
      await session.start(subcommand);
      return session.awaitCompletion({
        timeoutMs: opts.timeoutMs ?? this.bulkTimeoutMs,
        signal: opts.signal,
        allowPartial: opts.allowPartial,
      });
    });
  }

  async readSleep(opts: ReadSleepOptions = {}): Promise<SleepReadout> {
    const transfer = await this.bulkTransfer(BulkSubcommand.SLEEP, opts);
    log.debug(`Sleep transfer: ${transfer.frameCount} frame(s), ${transfer.records.length} record(s)`);
    const day = decodeSleepDay(transfer, { fallbackStart: opts.fallbackStart });
    return { transfer, day };
  }

  realtime(
    kind: RealtimeKind,
    onReading: (reading: RealtimeReading) => void,
    opts: RealtimeStreamOptions,
  ): Promise<number> {
    return streamRealtime(this.connection.uart, kind, onReading, {
      ...opts,
      queueCapacity: this.queueCapacity,
      lock: this.lock,
    });
  }

  deviceInfo(): Promise<DeviceInfo> {
    return this.lock.run(() => readDeviceInfo((uuid) => this.connection.read(uuid)));
  }

  disconnect(): Promise<void> {
    return this.connection.disconnect();
  }
}
