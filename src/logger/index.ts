// 统一日志：按级别输出到控制台，warn/error 可落库

import { insertLog } from "../db/index.js";
import { getLogConfig, shouldLogToConsole, shouldLogToDb } from "./config.js";
import type { LogCategory, LogEntry, LogLevel } from "./types.js";

export type { LogCategory, LogEntry, LogLevel } from "./types.js";
export { reloadLoggerConfig } from "./config.js";


type LogMeta = Record<string, unknown>;


function formatConsole(entry: LogEntry): string {
  const payloadStr = entry.payload ? " " + JSON.stringify(entry.payload) : "";
  return `[${entry.category}] ${entry.message}${payloadStr}`;
}


function writeConsole(entry: LogEntry): void {
  const line = formatConsole(entry);
  if (entry.level === "error") {
    console.error(line);
  } else if (entry.level === "warn") {
    console.warn(line);
  } else {
    console.log(line);
  }
}


function writeDb(entry: LogEntry): void {
  insertLog(entry).catch((err: unknown) => {
    // 落库失败只写 stderr，不再经过 logger，避免循环
    process.stderr.write(`[logger] 写入日志表失败: ${errorMessage(err)}\n`);
  });
}


function emit(level: LogLevel, category: LogCategory, message: string, meta?: LogMeta): void {
  const entry: LogEntry = {
    level,
    category,
    message,
    payload: meta && Object.keys(meta).length > 0 ? { ...meta } : undefined,
    created_at: new Date().toISOString(),
  };
  const config = getLogConfig();
  if (shouldLogToConsole(config.consoleLevel, level)) writeConsole(entry);
  if (shouldLogToDb(config.logToDb, config.dbLevel, level)) writeDb(entry);
}


/** 将任意抛出值转为可读消息 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}


/** 统一 logger：控制台由 LOG_LEVEL 过滤，LOG_TO_DB 开启时 warn 以上落库 */
export const logger = {
  error(category: LogCategory, message: string, meta?: LogMeta) {
    emit("error", category, message, meta);
  },
  warn(category: LogCategory, message: string, meta?: LogMeta) {
    emit("warn", category, message, meta);
  },
  info(category: LogCategory, message: string, meta?: LogMeta) {
    emit("info", category, message, meta);
  },
  debug(category: LogCategory, message: string, meta?: LogMeta) {
    emit("debug", category, message, meta);
  },
};
