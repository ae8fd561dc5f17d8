/**
 * logsink - 配置解析
 *
 * 截断级别、reopen_interval、以及从环境变量生成 Sink 配置，
 * 统一用 zod 校验，失败转换为 ConfigurationError。
 */

import { z } from "zod";
import { ConfigurationError } from "./errors.js";
import type { LogCutoff, LoggingConfig } from "./types.js";

// ============================================================================
// 默认值
// ============================================================================

export const DEFAULT_CUTOFF: LogCutoff = "info";

/** 文件 Sink 默认 5 分钟重新打开一次 */
export const DEFAULT_REOPEN_INTERVAL_SECONDS = 300;

// ============================================================================
// Zod 验证 Schema
// ============================================================================

const CutoffSchema = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(["all", "trace", "debug", "info", "warn", "error", "none"]))
  .transform((v): LogCutoff => (v === "all" ? "trace" : v));

/** 正整数秒，不接受 "12abc"、"1.5"、"0" */
const ReopenIntervalSchema = z
  .string()
  .trim()
  .regex(/^\d+$/)
  .transform(Number)
  .pipe(z.number().int().positive().max(Number.MAX_SAFE_INTEGER));

const EnvSchema = z.object({
  LOGSINK_TYPE: z.string().optional(),
  LOGSINK_COLOR: z.string().optional(),
  LOGSINK_FILE_NAME: z.string().min(1, "file name must not be empty").optional(),
  LOGSINK_REOPEN_INTERVAL: z.string().optional(),
});

// ============================================================================
// 解析函数
// ============================================================================

/** 解析 LOGSINK_LEVEL，未设置时为 info */
export function parseCutoff(raw: string | undefined): LogCutoff {
  if (raw === undefined || raw.trim() === "") return DEFAULT_CUTOFF;
  const result = CutoffSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(
      `${raw} is not a valid log level cutoff (expected all, trace, debug, info, warn, error or none)`,
      "LOGSINK_LEVEL"
    );
  }
  return result.data;
}

/** 解析 reopen_interval（秒） */
export function parseReopenInterval(raw: string | undefined): number {
  if (raw === undefined) return DEFAULT_REOPEN_INTERVAL_SECONDS;
  const result = ReopenIntervalSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(`${raw} is not a valid reopen interval`, "reopen_interval");
  }
  return result.data;
}

/** 从环境变量生成 Sink 配置（LOGSINK_TYPE 未设置时为 std_out） */
export function loggingConfigFromEnv(env: NodeJS.ProcessEnv = process.env): LoggingConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new ConfigurationError(`Invalid logging environment: ${detail}`);
  }

  const e = parsed.data;
  const config: Record<string, string> = { type: e.LOGSINK_TYPE ?? "std_out" };
  if (e.LOGSINK_COLOR !== undefined) config.color = e.LOGSINK_COLOR;
  if (e.LOGSINK_FILE_NAME !== undefined) config.file_name = e.LOGSINK_FILE_NAME;
  if (e.LOGSINK_REOPEN_INTERVAL !== undefined) config.reopen_interval = e.LOGSINK_REOPEN_INTERVAL;
  return config;
}
