/**
 * logsink - 级别比较、截断、标签
 */

import { parseCutoff } from "./config.js";
import type { LogCutoff, LogLevel } from "./types.js";
import { LOG_LEVEL_WEIGHT } from "./types.js";

/**
 * 进程级截断级别，模块加载时从 LOGSINK_LEVEL 读取一次，之后不可修改。
 */
export const LOG_LEVEL_CUTOFF: LogCutoff = parseCutoff(process.env.LOGSINK_LEVEL);

/** ANSI 颜色码 */
const COLORS = {
  reset: "\x1b[0m",
  red: "\x1b[31;1m",
  yellow: "\x1b[33;1m",
  green: "\x1b[32;1m",
  blue: "\x1b[34;1m",
  white: "\x1b[37;1m",
} as const;

const PLAIN_LABELS: Record<LogLevel, string> = {
  error: "[ERROR]",
  warn: "[WARN]",
  info: "[INFO]",
  debug: "[DEBUG]",
  trace: "[TRACE]",
};

const LABEL_COLORS: Record<LogLevel, string> = {
  error: COLORS.red,
  warn: COLORS.yellow,
  info: COLORS.green,
  debug: COLORS.blue,
  trace: COLORS.white,
};

function weightOf(level: LogLevel): number {
  const weight = LOG_LEVEL_WEIGHT[level];
  if (weight === undefined) {
    throw new TypeError(`Unknown log level: ${String(level)}`);
  }
  return weight;
}

export function compareLevels(a: LogLevel, b: LogLevel): number {
  return weightOf(a) - weightOf(b);
}

export function isLevelEnabled(level: LogLevel, cutoff: LogCutoff = LOG_LEVEL_CUTOFF): boolean {
  if (cutoff === "none") return false;
  return compareLevels(level, cutoff) >= 0;
}

/** "[ERROR]"，或带颜色的 "\x1b[31;1m[ERROR]\x1b[0m" */
export function levelLabel(level: LogLevel, colorized: boolean): string {
  const plain = PLAIN_LABELS[level];
  if (plain === undefined) {
    throw new TypeError(`Unknown log level: ${String(level)}`);
  }
  return colorized ? `${LABEL_COLORS[level]}${plain}${COLORS.reset}` : plain;
}
