// 日志配置：从环境变量读取，不依赖 stagepress.json 以尽早可用

import type { LogConfig, LogLevel } from "./types.js";

const LEVEL_ORDER: LogLevel[] = ["debug", "info", "warn", "error"];

let cached: LogConfig | null = null;

function parseLevel(s: string | undefined, fallback: LogLevel): LogLevel {
  if (!s) return fallback;
  const v = s.toLowerCase();
  return LEVEL_ORDER.find((l) => l === v) ?? fallback;
}

function parseFlag(s: string | undefined, fallback: boolean): boolean {
  if (s === "0" || s === "false") return false;
  if (s === "1" || s === "true") return true;
  return fallback;
}

/** 读取日志配置（首次调用后缓存） */
export function getLogConfig(): LogConfig {
  if (cached) return cached;
  cached = {
    consoleLevel: parseLevel(process.env.LOG_LEVEL, "info"),
    logToDb: parseFlag(process.env.LOG_TO_DB, false),
    dbLevel: parseLevel(process.env.LOG_DB_LEVEL, "warn"),
  };
  return cached;
}

/** 丢弃缓存，下次读取时重新解析环境变量 */
export function reloadLoggerConfig(): LogConfig {
  cached = null;
  return getLogConfig();
}

export function levelOrder(l: LogLevel): number {
  return LEVEL_ORDER.indexOf(l);
}

/** 是否应输出到控制台 */
export function shouldLogToConsole(consoleLevel: LogLevel, entryLevel: LogLevel): boolean {
  return levelOrder(entryLevel) >= levelOrder(consoleLevel);
}

/** 是否应写入 DB */
export function shouldLogToDb(logToDb: boolean, dbLevel: LogLevel, entryLevel: LogLevel): boolean {
  return logToDb && levelOrder(entryLevel) >= levelOrder(dbLevel);
}
