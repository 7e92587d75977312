export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Logger {
  debug(msg: string, meta?: Record<string, unknown>): void;
  info(msg: string, meta?: Record<string, unknown>): void;
  warn(msg: string, meta?: Record<string, unknown>): void;
  error(msg: string, meta?: Record<string, unknown>): void;
}

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function formatLogLine(level: Exclude<LogLevel, "silent">, scope: string, msg: string): string {
  return `[${level.toUpperCase()}] [${scope}] ${msg}`;
}

// Console logger; meta is appended as a single JSON object
export function createLogger(scope: string, level: LogLevel = "info"): Logger {
  const enabled = (target: LogLevel) => SEVERITY[target] >= SEVERITY[level];
  const meta = (value?: Record<string, unknown>) => (value ? JSON.stringify(value) : "");

  return {
    debug: (msg, data) => {
      if (enabled("debug")) console.debug(formatLogLine("debug", scope, msg), meta(data));
    },
    info: (msg, data) => {
      if (enabled("info")) console.log(formatLogLine("info", scope, msg), meta(data));
    },
    warn: (msg, data) => {
      if (enabled("warn")) console.warn(formatLogLine("warn", scope, msg), meta(data));
    },
    error: (msg, data) => {
      if (enabled("error")) console.error(formatLogLine("error", scope, msg), meta(data));
    },
  };
}
