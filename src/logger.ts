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

let currentLevel = process.env.DEBUG ? LogLevel.DEBUG : LogLevel.INFO;

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

/** Map a level name (`debug`, `info`, ...) to its LogLevel; undefined for unknown names. */
export function parseLogLevel(name: string): LogLevel | undefined {
  return LEVEL_NAMES[name.trim().toLowerCase()];
}

export interface Logger {
  debug(msg: string): void;
  info(msg: string): void;
  warn(msg: string): void;
  error(msg: string): void;
}

export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;
  const debugPrefix = `[${scope}:debug]`;
  const timestamp = (): string => new Date().toISOString().replace('T', ' ').replace('Z', '');
  const fmt = (pfx: string, msg: string): string => `${timestamp()} ${pfx} ${msg}`;
  return {
    debug: (msg) => {
      if (currentLevel <= LogLevel.DEBUG) console.log(fmt(debugPrefix, msg));
    },
    info: (msg) => {
      if (currentLevel <= LogLevel.INFO) console.log(fmt(prefix, msg));
    },
    warn: (msg) => {
      if (currentLevel <= LogLevel.WARN) console.warn(fmt(prefix, msg));
    },
    error: (msg) => {
      if (currentLevel <= LogLevel.ERROR) console.error(fmt(prefix, msg));
    },
  };
}
