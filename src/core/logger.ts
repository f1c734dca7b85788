export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
}

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const noop = (): void => {};

export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};

/** Console-backed logger; messages below `level` are dropped. */
export function createConsoleLogger(level: LogLevel = "warn", scope = "fuzzdex"): Logger {
  const emit = (at: Exclude<LogLevel, "silent">) =>
    SEVERITY[at] < SEVERITY[level]
      ? noop
      : (message: string, meta?: LogMeta) => {
          // resolved per call so replaced console methods are honoured
          if (meta) console[at](`[${scope}] ${message}`, meta);
          else console[at](`[${scope}] ${message}`);
        };

  return {
    debug: emit("debug"),
    info: emit("info"),
    warn: emit("warn"),
    error: emit("error"),
  };
}
