/**
 * Levelled logger used by the binder and the CLI.
 *
 * The library logs through whatever {@link Logger} the caller injects and
 * stays silent otherwise. The CLI writes to stderr so that stdout carries
 * only the JSON it produces.
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export type Logger = {
  debug: (msg: string) => void;
  info: (msg: string) => void;
  warn: (msg: string) => void;
  error: (msg: string) => void;
};

const LEVEL_RANK: Record<LogLevel, number> = {
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

export type LogSink = (line: string) => void;

/** Wrap `logger` so that messages below `level` are dropped. */
export function filterLogger(logger: Logger, level: LogLevel): Logger {
  const enabled = (msgLevel: Exclude<LogLevel, "silent">) => LEVEL_RANK[msgLevel] >= LEVEL_RANK[level];
  return {
    debug: (msg) => {
      if (enabled("debug")) logger.debug(msg);
    },
    info: (msg) => {
      if (enabled("info")) logger.info(msg);
    },
    warn: (msg) => {
      if (enabled("warn")) logger.warn(msg);
    },
    error: (msg) => {
      if (enabled("error")) logger.error(msg);
    },
  };
}

/**
 * Create a logger that drops messages below `level` and hands the rest to
 * `sink` (stderr by default).
 */
export function createConsoleLogger(level: LogLevel = "info", sink: LogSink = (line) => console.error(line)): Logger {
  return filterLogger(
    {
      debug: (msg) => sink(`[debug] ${msg}`),
      info: (msg) => sink(msg),
      warn: (msg) => sink(`[warn] ${msg}`),
      error: (msg) => sink(`[error] ${msg}`),
    },
    level,
  );
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_RANK, value);
}
