export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LEVEL_PRIORITY;
}

let override: LogLevel | null = null;

function threshold(): LogLevel {
  if (override) return override;
  const configured = process.env.LOG_LEVEL?.toLowerCase();
  return isLevel(configured) ? configured : "info";
}

/** Pins the level; otherwise LOG_LEVEL is read on every call. */
export function setLogLevel(level: LogLevel | null): void {
  override = level;
}

function replacer(_key: string, value: unknown): unknown {
  return typeof value === "bigint" ? value.toString() : value;
}

function emit(level: LogLevel, message: string, context?: Record<string, unknown>): void {
  if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[threshold()]) return;

  const line = JSON.stringify(
    { ts: new Date().toISOString(), level, msg: message, ...context },
    replacer,
  );

  if (level === "error" || level === "warn") {
    console.error(line);
  } else {
    console.log(line);
  }
}

export const log = {
  debug: (message: string, context?: Record<string, unknown>) => emit("debug", message, context),
  info: (message: string, context?: Record<string, unknown>) => emit("info", message, context),
  warn: (message: string, context?: Record<string, unknown>) => emit("warn", message, context),
  error: (message: string, context?: Record<string, unknown>) => emit("error", message, context),
};
