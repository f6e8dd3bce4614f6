export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

const LEVEL_NAMES: Record<string, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  silent: LogLevel.SILENT,
};

/** LOG_LEVEL wins over DEBUG; unknown names fall back to INFO. */
export function levelFromEnv(env: Record<string, string | undefined>): LogLevel {
  const named = env.LOG_LEVEL ? LEVEL_NAMES[env.LOG_LEVEL.toLowerCase()] : undefined;
  if (named !== undefined) return named;
  return env.DEBUG ? LogLevel.DEBUG : LogLevel.INFO;
}

let currentLevel = levelFromEnv(process.env);

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export type FrameDirection = 'tx' | 'rx';

export interface Logger {
  debug(msg: string): void;
  info(msg: string): void;
  warn(msg: string): void;
  error(msg: string): void;
  /** Debug-level hex dump of one packet or notification. */
  frame(direction: FrameDirection, data: Uint8Array, note?: string): void;
}

/** Render bytes as space-separated hex (e.g. `bc 27 00 00`). */
export function hexDump(data: Uint8Array): string {
  return Array.from(data, (b) => b.toString(16).padStart(2, '0')).join(' ');
}

function stamp(): string {
  return new Date().toISOString().replace('T', ' ').replace('Z', '');
}

// Leading newlines stay ahead of the timestamp so blank separator lines survive.
function format(tag: string, msg: string): string {
  const lead = /^\n+/.exec(msg)?.[0] ?? '';
  return `${lead}${stamp()} ${tag} ${msg.slice(lead.length)}`;
}

export function createLogger(scope: string): Logger {
  const tag = `[${scope}]`;
  const debugTag = `[${scope}:debug]`;

  const debug = (msg: string): void => {
    if (currentLevel <= LogLevel.DEBUG) console.log(format(debugTag, msg));
  };

  return {
    debug,
    info: (msg) => {
      if (currentLevel <= LogLevel.INFO) console.log(format(tag, msg));
    },
    warn: (msg) => {
      if (currentLevel <= LogLevel.WARN) console.warn(format(tag, msg));
    },
    error: (msg) => {
      if (currentLevel <= LogLevel.ERROR) console.error(format(tag, msg));
    },
    frame: (direction, data, note) => {
      if (currentLevel > LogLevel.DEBUG) return;
      const arrow = direction === 'tx' ? '→' : '←';
      debug(`${arrow} (${data.length}) ${hexDump(data)}${note ? `  ${note}` : ''}`);
    },
  };
}
