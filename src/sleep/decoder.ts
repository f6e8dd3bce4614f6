import { embeddedTimestampToDate } from '../protocol/bcd-time.js';
import type { BulkTransferResult } from '../protocol/bulk-reassembler.js';
import { MissingTimestampMarkerError } from '../protocol/errors.js';
import type { SleepStage } from './stage.js';

const MINUTE_MS = 60_000;

export interface SleepPeriod {
  stage: SleepStage;
  rawStage: number;
  durationMinutes: number;
  startTime: Date;
}

export interface SleepDay {
  /** Local calendar date of `sleepStart`, as YYYY-MM-DD. */
  date: string;
  sleepStart: Date;
  sleepEnd: Date;
  periods: SleepPeriod[];
}

export interface SleepTotals {
  /** Light + deep + REM. */
  totalSleepMinutes: number;
  deepMinutes: number;
  lightMinutes: number;
  remMinutes: number;
  awakeMinutes: number;
  unknownMinutes: number;
  byStage: Record<SleepStage, number>;
}

export interface DecodeOptions {
  /**
   * Session start to use when the data carries no embedded timestamp.
   * Without it such data is rejected with MissingTimestampMarkerError.
   */
  fallbackStart?: Date;
}

export type SleepTransfer = Pick<BulkTransferResult, 'records' | 'startTimestamp'>;

function localDate(date: Date): string {
  const y = date.getFullYear();
  const m = String(date.getMonth() + 1).padStart(2, '0');
  const d = String(date.getDate()).padStart(2, '0');
  return `${y}-${m}-${d}`;
}

/**
 * Turn reassembled bulk records into a sleep day. Periods are laid end to end
 * from the session start in arrival order; zero-minute records yield no period.
 * Returns null when the transfer holds no records.
 */
export function decodeSleepDay(transfer: SleepTransfer, opts: DecodeOptions = {}): SleepDay | null {
  if (transfer.records.length === 0) return null;

  let sleepStart: Date;
  if (transfer.startTimestamp) {
    sleepStart = embeddedTimestampToDate(transfer.startTimestamp);
  } else if (opts.fallbackStart) {
    sleepStart = new Date(opts.fallbackStart.getTime());
  } else {
    throw new MissingTimestampMarkerError();
  }

  const periods: SleepPeriod[] = [];
  let cursor = sleepStart.getTime();
  for (const record of transfer.records) {
    if (record.durationMinutes === 0) continue;
    periods.push({
      stage: record.stage,
      rawStage: record.rawStage,
      durationMinutes: record.durationMinutes,
      startTime: new Date(cursor),
    });
    cursor += record.durationMinutes * MINUTE_MS;
  }

  return {
    date: localDate(sleepStart),
    sleepStart,
    sleepEnd: new Date(cursor),
    periods,
  };
}

export function summarizeSleep(day: SleepDay): SleepTotals {
  const byStage: Record<SleepStage, number> = {
    'no-data': 0,
    error: 0,
    light: 0,
    deep: 0,
    rem: 0,
    awake: 0,
    motion: 0,
    rest: 0,
    unknown: 0,
  };
  for (const period of day.periods) {
    byStage[period.stage] += period.durationMinutes;
  }
  return {
    totalSleepMinutes: byStage.light + byStage.deep + byStage.rem,
    deepMinutes: byStage.deep,
    lightMinutes: byStage.light,
    remMinutes: byStage.rem,
    awakeMinutes: byStage.awake,
    unknownMinutes: byStage.unknown,
    byStage,
  };
}

/** Minutes between start and end; equals the sum of period durations. */
export function sleepDurationMinutes(day: SleepDay): number {
  return Math.round((day.sleepEnd.getTime() - day.sleepStart.getTime()) / MINUTE_MS);
}
