export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

const LEVEL_RANK: Readonly<Record<LogLevel, number>> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export type LogSink = Pick<Console, "log" | "warn" | "error">;

export interface Logger {
  readonly level: LogLevel;
  setLevel(level: LogLevel): void;
  debug(msg: string, meta?: Record<string, unknown>): void;
  info(msg: string, meta?: Record<string, unknown>): void;
  warn(msg: string, meta?: Record<string, unknown>): void;
  error(msg: string, meta?: Record<string, unknown>): void;
}

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

export function createLogger(level: LogLevel = "info", sink: LogSink = console): Logger {
  let threshold = level;

  const emit = (at: Exclude<LogLevel, "silent">, msg: string, meta?: Record<string, unknown>) => {
    if (LEVEL_RANK[at] < LEVEL_RANK[threshold]) {
      return;
    }
    const line = `[${at.toUpperCase()}] ${msg}`;
    const detail = meta ? JSON.stringify(meta) : "";
    if (at === "error") {
      sink.error(line, detail);
    } else if (at === "warn") {
      sink.warn(line, detail);
    } else {
      sink.log(line, detail);
    }
  };

  return {
    get level() {
      return threshold;
    },
    setLevel(next: LogLevel) {
      threshold = next;
    },
    debug: (msg, meta) => emit("debug", msg, meta),
    info: (msg, meta) => emit("info", msg, meta),
    warn: (msg, meta) => emit("warn", msg, meta),
    error: (msg, meta) => emit("error", msg, meta),
  };
}

const envLevel = process.env.LOG_LEVEL ?? "info";

export const log: Logger = createLogger(isLogLevel(envLevel) ? envLevel : "info");
