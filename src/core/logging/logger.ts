export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

type WriteLevel = Exclude<LogLevel, "silent">;

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

export interface Logger {
  debug(message: string, fields?: Record<string, unknown>): void;
  info(message: string, fields?: Record<string, unknown>): void;
  warn(message: string, fields?: Record<string, unknown>): void;
  error(message: string, fields?: Record<string, unknown>): void;
}

let activeLevel: LogLevel = "warn";

/** Process-wide: every logger reads this level, so the most recently constructed engine sets it for all of them. */
export function setLogLevel(level: LogLevel): void {
  activeLevel = level;
}

export function getLogLevel(): LogLevel {
  return activeLevel;
}

export function isLevelEnabled(level: WriteLevel): boolean {
  return LEVEL_RANK[level] >= LEVEL_RANK[activeLevel];
}

export function createLogger(scope: string): Logger {
  const write = (level: WriteLevel, message: string, fields?: Record<string, unknown>): void => {
    if (!isLevelEnabled(level)) return;
    const line = `[${scope}] ${message}`;
    if (fields) {
      console[level](line, fields);
    } else {
      console[level](line);
    }
  };

  return {
    debug: (message, fields) => write("debug", message, fields),
    info: (message, fields) => write("info", message, fields),
    warn: (message, fields) => write("warn", message, fields),
    error: (message, fields) => write("error", message, fields)
  };
}
