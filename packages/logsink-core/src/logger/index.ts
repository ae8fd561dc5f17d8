/**
 * logsink Logger 模块
 *
 * - 五个级别，进程级截断（LOGSINK_LEVEL）
 * - 可替换的输出目标：丢弃 / 控制台 / 文件（定期重新打开，兼容外部轮转）
 * - 按类型名注册 Sink，外部可扩展
 * - 进程级默认 Sink，先到先得
 */

export {
  DEFAULT_SINK_CONFIG,
  configure,
  configureFromEnv,
  debug,
  error,
  getDefaultSink,
  info,
  isConfigured,
  log,
  logRaw,
  trace,
  warn,
} from "./logger.js";
export { SinkRegistry, createSinkRegistry, getSinkRegistry, registerSink } from "./registry.js";
export { createNullSink } from "./null-sink.js";
export { createConsoleSink, type ConsoleSinkOptions } from "./console-sink.js";
export { createFileSink, resolveLogFilePath, type FileSink, type FileSinkOptions } from "./file-sink.js";
export { LOG_LEVEL_CUTOFF, compareLevels, isLevelEnabled, levelLabel } from "./level.js";
export { formatTimestamp, nowMicros, timestamp } from "./timestamp.js";
export {
  DEFAULT_CUTOFF,
  DEFAULT_REOPEN_INTERVAL_SECONDS,
  loggingConfigFromEnv,
  parseCutoff,
  parseReopenInterval,
} from "./config.js";
export { ConfigurationError, LoggingError, ResourceError } from "./errors.js";
export type { LogCutoff, LogLevel, LogSink, LoggingConfig, OutputStream, SinkConstructor } from "./types.js";
export { LOG_LEVELS, LOG_LEVEL_WEIGHT } from "./types.js";
