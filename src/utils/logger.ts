import color from "picocolors";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LEVEL_COLORS: Record<LogLevel, (text: string) => string> = {
  debug: color.gray,
  info: color.cyan,
  warn: color.yellow,
  error: color.red,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && Object.hasOwn(LEVEL_PRIORITY, value);
}

const envLevel = process.env.LOG_LEVEL;
let currentLevel: LogLevel = isLogLevel(envLevel) ? envLevel : "info";

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[currentLevel];
}

export function formatMessage(level: LogLevel, message: string, data?: unknown): string {
  const timestamp = new Date().toISOString();
  const tag = LEVEL_COLORS[level](`[${timestamp}] ${level.toUpperCase().padEnd(5)}`);

  let formatted = `${tag} ${message}`;

  if (data !== undefined) {
    if (data instanceof Error) {
      formatted += ` ${data.message}`;
    } else if (typeof data === "object") {
      formatted += ` ${JSON.stringify(data, null, 2)}`;
    } else {
      formatted += ` ${String(data)}`;
    }
  }

  return formatted;
}

export function debug(message: string, data?: unknown): void {
  if (shouldLog("debug")) {
    console.log(formatMessage("debug", message, data));
  }
}

export function info(message: string, data?: unknown): void {
  if (shouldLog("info")) {
    console.log(formatMessage("info", message, data));
  }
}

export function warn(message: string, data?: unknown): void {
  if (shouldLog("warn")) {
    console.warn(formatMessage("warn", message, data));
  }
}

export function error(message: string, data?: unknown): void {
  if (shouldLog("error")) {
    console.error(formatMessage("error", message, data));
  }
}

export const logger = {
  debug,
  info,
  warn,
  error,
  setLevel: setLogLevel,
  getLevel: getLogLevel,
};
