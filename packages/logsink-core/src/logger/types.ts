/**
 * logsink - 类型定义
 *
 * 支持 trace/debug/info/warn/error 五个级别，
 * 输出目标（Sink）通过注册表按类型名创建。
 */

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error";

/** 所有级别，按严重程度升序 */
export const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error"];

/** 日志级别权重，用于比较 */
export const LOG_LEVEL_WEIGHT: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
};

/** 截断级别："none" 表示全部屏蔽 */
export type LogCutoff = LogLevel | "none";

/**
 * Sink 配置：字符串到字符串的映射，由各 Sink 自行解释。
 * 未知 key 忽略。常用 key：
 * - type：注册表中的类型名（""、"std_out"、"file" 或外部注册的名字）
 * - color：出现即启用彩色标签（仅 std_out）
 * - file_name：日志文件名（仅 file，必填）。只在文件名本身前加 "<pid>-"，目录保持不变：
 *   "app.log" -> "12345-app.log"，"logs/app.log" -> "logs/12345-app.log"
 * - reopen_interval：重新打开文件的间隔秒数，正整数，默认 300（仅 file）
 */
export type LoggingConfig = Readonly<Partial<Record<string, string>>>;

/** Sink 接口：接收日志并写到某个目标 */
export interface LogSink {
  /** 创建该实例的注册类型名 */
  readonly kind: string;
  /** 低于截断级别时直接返回，否则格式化后交给 writeRaw */
  emit(message: string, level: LogLevel): void;
  /** 原样写入，不做格式化 */
  writeRaw(text: string): void;
  /** 关闭/清理资源（如关闭文件句柄） */
  close?(): void;
}

/** 注册表中的构造函数 */
export type SinkConstructor = (config: LoggingConfig) => LogSink;

/** Console Sink 的输出流，默认 process.stdout */
export interface OutputStream {
  write(chunk: string): unknown;
}
