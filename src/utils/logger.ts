import color from "picocolors";

export type LogLevel = "debug" | "info" | "warn" | "error";

let currentLevel: LogLevel = "info";

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

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[currentLevel];
}

function formatData(data: unknown): string {
  if (data instanceof Error) {
    return currentLevel === "debug" && data.stack ? data.stack : data.message;
  }
  if (typeof data === "object" && data !== null) {
    return JSON.stringify(data, null, 2);
  }
  return String(data);
}

export function formatMessage(level: LogLevel, message: string, data?: unknown): string {
  const paint = LEVEL_COLORS[level];
  const levelStr = level.toUpperCase().padEnd(5);

  let formatted = `${paint(`[${new Date().toISOString()}] ${levelStr}`)} ${message}`;

  if (data !== undefined) {
    formatted += ` ${formatData(data)}`;
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
