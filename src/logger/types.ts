// 日志类型与结构化条目
// 控制台由 LOG_LEVEL 过滤（默认 info），构建过程中的细节只在 debug 下可见。

/** 日志级别（debug < info < warn < error） */
export type LogLevel = "error" | "warn" | "info" | "debug";

/** 日志分类：按模块筛选 */
export type LogCategory =
  | "builder" // 元素构建与校验
  | "feed";   // 数据驱动的 RSS 组装与序列化

/** 单条日志的结构化数据 */
export interface LogEntry {
  level: LogLevel;
  category: LogCategory;
  message: string;
  /** 可选上下文（字段名、原始值等） */
  payload?: Record<string, unknown>;
  created_at: string;
}

/** builder / feed 接受的 logger 形状，默认使用全局 logger，调用方可替换或静音 */
export interface RssLogger {
  error(category: LogCategory, message: string, meta?: Record<string, unknown>): void;
  warn(category: LogCategory, message: string, meta?: Record<string, unknown>): void;
  info(category: LogCategory, message: string, meta?: Record<string, unknown>): void;
  debug(category: LogCategory, message: string, meta?: Record<string, unknown>): void;
}
