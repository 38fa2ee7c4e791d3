import { LOG_LEVEL_ENV } from "../constants";

type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const levelOrder: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4
};

const isLogLevel = (value: string): value is LogLevel => Object.prototype.hasOwnProperty.call(levelOrder, value);

export const parseLogLevel = (value: string | undefined): LogLevel | null => {
  const candidate = (value ?? "").trim().toLowerCase();
  return isLogLevel(candidate) ? candidate : null;
};

let level: LogLevel = parseLogLevel(process.env[LOG_LEVEL_ENV]) ?? "warn";

const shouldLog = (messageLevel: LogLevel): boolean => levelOrder[messageLevel] >= levelOrder[level];

export const setLogLevel = (next: LogLevel): void => {
  level = next;
};

export const getLogLevel = (): LogLevel => level;

export const logger = {
  debug: (...args: unknown[]) => {
    if (shouldLog("debug")) console.debug("[lab-report]", ...args);
  },
  info: (...args: unknown[]) => {
    if (shouldLog("info")) console.info("[lab-report]", ...args);
  },
  warn: (...args: unknown[]) => {
    if (shouldLog("warn")) console.warn("[lab-report]", ...args);
  },
  error: (...args: unknown[]) => {
    if (shouldLog("error")) console.error("[lab-report]", ...args);
  }
};

export type { LogLevel };
