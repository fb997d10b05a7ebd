export const LOG_LEVELS = ["silent", "error", "warn", "info", "debug"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];
export type LogFormat = "text" | "json";

const RANK: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

export interface Logger {
  readonly scope: string;
  error(msg: string, ...details: unknown[]): void;
  warn(msg: string, ...details: unknown[]): void;
  info(msg: string, ...details: unknown[]): void;
  debug(msg: string, ...details: unknown[]): void;
  child(scope: string): Logger;
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

const state: { level: LogLevel; format: LogFormat } = {
  level: isLogLevel(process.env.MDCONVERT_LOG_LEVEL)
    ? process.env.MDCONVERT_LOG_LEVEL
    : "warn",
  format: process.env.MDCONVERT_LOG_FORMAT === "json" ? "json" : "text",
};

/**
 * Sets the process-wide level and format. The values are mirrored into the
 * environment so forked workers start with the same settings.
 */
export function configureLogging(options: {
  level?: LogLevel;
  format?: LogFormat;
}): void {
  if (options.level) {
    state.level = options.level;
    process.env.MDCONVERT_LOG_LEVEL = options.level;
  }
  if (options.format) {
    state.format = options.format;
    process.env.MDCONVERT_LOG_FORMAT = options.format;
  }
}

function describe(detail: unknown): string {
  if (detail instanceof Error) return detail.stack ?? detail.message;
  if (typeof detail === "string") return detail;
  return JSON.stringify(detail);
}

function emit(
  level: Exclude<LogLevel, "silent">,
  scope: string,
  msg: string,
  details: unknown[],
) {
  if (RANK[level] > RANK[state.level]) return;

  // Everything goes to stderr so command output on stdout stays clean.
  if (state.format === "json") {
    const line: Record<string, unknown> = {
      time: new Date().toISOString(),
      level,
      scope,
      msg,
    };
    if (details.length > 0) line.details = details.map(describe);
    console.error(JSON.stringify(line));
    return;
  }
  console.error(`[${scope}] ${msg}`, ...details);
}

export function createLogger(scope: string): Logger {
  return {
    scope,
    error: (msg, ...details) => emit("error", scope, msg, details),
    warn: (msg, ...details) => emit("warn", scope, msg, details),
    info: (msg, ...details) => emit("info", scope, msg, details),
    debug: (msg, ...details) => emit("debug", scope, msg, details),
    child: (sub) => createLogger(`${scope}:${sub}`),
  };
}
