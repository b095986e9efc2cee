// 日志类型与结构化条目
// 控制台由 LOG_LEVEL 过滤（默认 info）；开启 LOG_TO_DB 后 warn 以上写入构建数据库

/** 日志级别：debug < info < warn < error */
export type LogLevel = "error" | "warn" | "info" | "debug";

/** 日志分类：按模块筛选 */
export type LogCategory =
  | "app"       // CLI 与构建入口
  | "config"    // 配置加载与校验
  | "lifecycle" // 阶段调度
  | "plugin"    // 插件加载与执行
  | "filter"    // 过滤表达式
  | "pool"      // 并发处理
  | "cache"     // 文件缓存
  | "blogroll"  // 外部 feed 抓取
  | "writer"    // 产物写出
  | "db";       // 构建数据库

/** 单条日志的结构化数据 */
export interface LogEntry {
  level: LogLevel;
  category: LogCategory;
  message: string;
  /** 可选上下文（err、plugin、stage 等），落库时存为 JSON */
  payload?: Record<string, unknown>;
  created_at: string;
}

/** 从环境读取的日志配置 */
export interface LogConfig {
  consoleLevel: LogLevel;
  logToDb: boolean;
  dbLevel: LogLevel;
}
