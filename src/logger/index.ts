// 统一日志：按级别输出到控制台

import { getConsoleLevel, shouldLogToConsole } from "./config.js";
import type { LogCategory, LogEntry, LogLevel, RssLogger } from "./types.js";

export type { LogCategory, LogEntry, LogLevel, RssLogger } from "./types.js";

function now(): string {
  return new Date().toISOString();
}

function formatValue(value: unknown): string {
  return typeof value === "string" ? value : JSON.stringify(value);
}

/** 控制台行：[category] message key=value ...，字符串值不加引号 */
export function formatConsole(entry: LogEntry): string {
  const fields = Object.entries(entry.payload ?? {}).map(([key, value]) => `${key}=${formatValue(value)}`);
  return [`[${entry.category}]`, entry.message, ...fields].join(" ");
}

const CONSOLE_WRITERS: Record<LogLevel, (line: string) => void> = {
  error: (line) => console.error(line),
  warn: (line) => console.warn(line),
  info: (line) => console.log(line),
  debug: (line) => console.log(line),
};

function emit(level: LogLevel, category: LogCategory, message: string, meta?: Record<string, unknown>): void {
  if (!shouldLogToConsole(getConsoleLevel(), level)) return;
  const entry: LogEntry = {
    level,
    category,
    message,
    payload: meta && Object.keys(meta).length > 0 ? { ...meta } : undefined,
    created_at: now(),
  };
  CONSOLE_WRITERS[level](formatConsole(entry));
}

/** 统一 logger：控制台由 LOG_LEVEL 过滤 */
export const logger: RssLogger = {
  error(category, message, meta) {
    emit("error", category, message, meta);
  },
  warn(category, message, meta) {
    emit("warn", category, message, meta);
  },
  info(category, message, meta) {
    emit("info", category, message, meta);
  },
  debug(category, message, meta) {
    emit("debug", category, message, meta);
  },
};

/** 不输出任何内容的 logger，测试或调用方自行处理日志时使用 */
export const silentLogger: RssLogger = {
  error() {},
  warn() {},
  info() {},
  debug() {},
};
