export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogFields = Record<string, unknown>;

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const satisfies readonly LogLevel[];

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

let threshold: LogLevel = "info";

export const setLogLevel = (level: LogLevel): void => {
  threshold = level;
};

// Every level goes to stdout; the process writes nothing else.
const log = (level: LogLevel, message: string, fields?: LogFields): void => {
  if (LEVEL_WEIGHT[level] < LEVEL_WEIGHT[threshold]) {
    return;
  }
  const payload = {
    level,
    message,
    timestamp: new Date().toISOString(),
    ...fields
  };
  console.log(JSON.stringify(payload));
};

export const logger = {
  debug: (message: string, fields?: LogFields): void => log("debug", message, fields),
  info: (message: string, fields?: LogFields): void => log("info", message, fields),
  warn: (message: string, fields?: LogFields): void => log("warn", message, fields),
  error: (message: string, fields?: LogFields): void => log("error", message, fields)
};
