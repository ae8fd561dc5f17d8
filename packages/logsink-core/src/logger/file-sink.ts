/**
 * logsink - 文件输出 Sink
 *
 * 功能：
 * - 文件名加进程号前缀：logs/app.log -> logs/12345-app.log，多进程共用配置时互不覆盖
 * - 追加模式写入，每次写入后检查是否需要重新打开
 * - 每隔 reopen_interval 秒（默认 300）关闭并重新打开文件，
 *   配合 logrotate 等外部工具：文件被改名后会在原路径重新创建
 */

import fs from "node:fs";
import path from "node:path";
import { parseReopenInterval } from "./config.js";
import { ConfigurationError, ResourceError, describeError } from "./errors.js";
import { isLevelEnabled, levelLabel } from "./level.js";
import { timestamp } from "./timestamp.js";
import type { LogLevel, LogSink, LoggingConfig } from "./types.js";

export interface FileSinkOptions {
  /** 文件名前缀用的进程号，默认 process.pid */
  pid?: number;
  /** 时钟（毫秒），默认 Date.now */
  now?: () => number;
}

export interface FileSink extends LogSink {
  /** 实际写入的路径 */
  readonly filePath: string;
  readonly reopenIntervalMs: number;
  close(): void;
}

/** 在文件名（不含目录）前加上 "<pid>-" */
export function resolveLogFilePath(fileName: string, pid: number): string {
  return path.join(path.dirname(fileName), `${pid}-${path.basename(fileName)}`);
}

/** writeSync 可能只写入一部分，循环直到全部写完 */
function writeFully(fd: number, text: string): void {
  const buf = Buffer.from(text, "utf-8");
  let offset = 0;
  while (offset < buf.length) {
    const written = fs.writeSync(fd, buf, offset, buf.length - offset);
    if (written <= 0) {
      throw new Error(`wrote ${offset} of ${buf.length} bytes`);
    }
    offset += written;
  }
}

export function createFileSink(config: LoggingConfig, opts: FileSinkOptions = {}): FileSink {
  const fileName = config.file_name;
  if (!fileName) {
    throw new ConfigurationError("No output file provided to file sink (file_name)", "file_name");
  }
  const filePath = resolveLogFilePath(fileName, opts.pid ?? process.pid);
  const reopenIntervalMs = parseReopenInterval(config.reopen_interval) * 1000;
  const now = opts.now ?? Date.now;

  let fd: number | null = null;
  let lastReopen = 0;
  let closed = false;

  /** 尽力关闭，失败只报告到 stderr，不抛出 */
  function closeQuietly(): void {
    if (fd === null) return;
    const old = fd;
    fd = null;
    try {
      fs.closeSync(old);
    } catch (err) {
      process.stderr.write(`[logsink] Failed to close log file ${filePath}: ${describeError(err)}\n`);
    }
  }

  function reopen(): number {
    closeQuietly();
    let opened: number;
    try {
      fs.mkdirSync(path.dirname(filePath), { recursive: true });
      opened = fs.openSync(filePath, "a");
    } catch (err) {
      throw new ResourceError(`Failed to open log file ${filePath}: ${describeError(err)}`, filePath, {
        cause: err,
      });
    }
    fd = opened;
    lastReopen = now();
    return opened;
  }

  function reopenIfDue(): void {
    if (now() - lastReopen > reopenIntervalMs) {
      reopen();
    }
  }

  reopen();

  const sink: FileSink = {
    kind: "file",
    filePath,
    reopenIntervalMs,
    emit(message: string, level: LogLevel) {
      if (!isLevelEnabled(level)) return;
      sink.writeRaw(`${timestamp()} ${levelLabel(level, false)} ${message}\n`);
    },
    writeRaw(text: string) {
      if (closed) {
        throw new ResourceError(`Log file ${filePath} is closed`, filePath);
      }
      // 上一次重新打开失败时 fd 为空，这里再试一次
      const target = fd ?? reopen();
      try {
        writeFully(target, text);
      } catch (err) {
        throw new ResourceError(`Failed to write log file ${filePath}: ${describeError(err)}`, filePath, {
          cause: err,
        });
      }
      reopenIfDue();
    },
    close() {
      closed = true;
      closeQuietly();
    },
  };
  return sink;
}
