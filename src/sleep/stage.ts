import { createLogger } from '../logger.js';

const log = createLogger('Sleep');

export type SleepStage =
  | 'no-data'
  | 'error'
  | 'light'
  | 'deep'
  | 'rem'
  | 'awake'
  | 'motion'
  | 'rest'
  | 'unknown';

const STAGE_CODES: ReadonlyMap<number, SleepStage> = new Map<number, SleepStage>([
  [0x00, 'no-data'],
  [0x01, 'error'],
  [0x02, 'light'],
  [0x03, 'deep'],
  [0x04, 'rem'],
  [0x05, 'awake'],
  [0x06, 'motion'],
  [0x07, 'rest'],
]);

export const SLEEP_STAGES: readonly SleepStage[] = [...STAGE_CODES.values(), 'unknown'];

const STAGE_LABELS: Record<SleepStage, string> = {
  'no-data': 'No Data',
  error: 'Error',
  light: 'Light Sleep',
  deep: 'Deep Sleep',
  rem: 'REM Sleep',
  awake: 'Awake',
  motion: 'Motion',
  rest: 'Rest',
  unknown: 'Unknown',
};

/** Map a raw stage byte; bytes with no known meaning become 'unknown'. */
export function toSleepStage(code: number): SleepStage {
  const stage = STAGE_CODES.get(code);
  if (stage) return stage;
  log.debug(`Unrecognized sleep stage byte 0x${code.toString(16).padStart(2, '0')}`);
  return 'unknown';
}

export function stageLabel(stage: SleepStage): string {
  return STAGE_LABELS[stage];
}
