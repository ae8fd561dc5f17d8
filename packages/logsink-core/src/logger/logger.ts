/**
 * logsink - 进程级默认 Sink
 *
 * 第一次访问时按给定配置（或默认配置：彩色 std_out）创建，之后一直复用。
 * 先到先得：Sink 创建之后再调用 configure 不会替换它，即使配置不同。
 */

import { loggingConfigFromEnv } from "./config.js";
import { getSinkRegistry } from "./registry.js";
import type { LogLevel, LogSink, LoggingConfig } from "./types.js";

export const DEFAULT_SINK_CONFIG: LoggingConfig = Object.freeze({ type: "std_out", color: "" });

let defaultSink: LogSink | null = null;

/**
 * 返回默认 Sink，不存在时用 config 创建。
 * 创建失败会抛出，且不会留下半成品。
 */
export function getDefaultSink(config: LoggingConfig = DEFAULT_SINK_CONFIG): LogSink {
  if (!defaultSink) {
    defaultSink = getSinkRegistry().produce(config);
  }
  return defaultSink;
}

/** 配置默认 Sink（只有第一次生效），返回实际在用的 Sink */
export function configure(config: LoggingConfig): LogSink {
  return getDefaultSink(config);
}

/** 从环境变量配置（用于 CLI 启动） */
export function configureFromEnv(env: NodeJS.ProcessEnv = process.env): LogSink {
  return configure(loggingConfigFromEnv(env));
}

export function isConfigured(): boolean {
  return defaultSink !== null;
}

export function log(message: string, level: LogLevel): void {
  getDefaultSink().emit(message, level);
}

/** 不带级别（或自定义级别）的原样输出 */
export function logRaw(text: string): void {
  getDefaultSink().writeRaw(text);
}

export function trace(message: string): void {
  log(message, "trace");
}

export function debug(message: string): void {
  log(message, "debug");
}

export function info(message: string): void {
  log(message, "info");
}

export function warn(message: string): void {
  log(message, "warn");
}

export function error(message: string): void {
  log(message, "error");
}
