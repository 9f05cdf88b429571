export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";
export type LogKV = Record<string, unknown>;

const LEVELS: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

let threshold: LogLevel = parseLevel(process.env.LOG_LEVEL);

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVELS, value);
}

export function parseLevel(value: string | undefined): LogLevel {
  const level = (value ?? "info").toLowerCase();
  return isLogLevel(level) ? level : "info";
}

export interface Logger {
  debug(event: string, kv?: LogKV): void;
  info(event: string, kv?: LogKV): void;
  warn(event: string, kv?: LogKV): void;
  error(event: string, kv?: LogKV): void;
}

/**
 * One JSON object per line: { ts, level, scope, event, ...fields }.
 * warn and error go to stderr.
 */
export function createLogger(scope: string): Logger {
  const write = (level: Exclude<LogLevel, "silent">, event: string, kv: LogKV = {}) => {
    if (LEVELS[level] < LEVELS[threshold]) {
      return;
    }
    const rec = { ts: new Date().toISOString(), level, scope, event, ...kv };
    const line = JSON.stringify(rec);
    if (LEVELS[level] >= LEVELS.warn) {
      console.error(line);
    } else {
      console.log(line);
    }
  };

  return {
    debug: (event, kv) => write("debug", event, kv),
    info: (event, kv) => write("info", event, kv),
    warn: (event, kv) => write("warn", event, kv),
    error: (event, kv) => write("error", event, kv),
  };
}

export function errorFields(err: unknown): LogKV {
  if (err instanceof Error) {
    return { error: err.message, errorName: err.name };
  }
  return { error: String(err) };
}
