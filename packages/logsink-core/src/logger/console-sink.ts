/**
 * logsink - 控制台输出 Sink
 *
 * 配置中出现 color（任意值，包括空串）时使用带颜色的级别标签。
 */

import { isLevelEnabled, levelLabel } from "./level.js";
import { timestamp } from "./timestamp.js";
import type { LogLevel, LogSink, LoggingConfig, OutputStream } from "./types.js";

export interface ConsoleSinkOptions {
  /** 输出流，默认 process.stdout */
  stream?: OutputStream;
  /** 写进每条记录的进程号，默认 process.pid */
  pid?: number;
}

export function createConsoleSink(config: LoggingConfig, opts: ConsoleSinkOptions = {}): LogSink {
  const stream = opts.stream ?? process.stdout;
  const pidTag = ` [${opts.pid ?? process.pid}] `;
  const colorized = config.color !== undefined;

  const sink: LogSink = {
    kind: "std_out",
    emit(message: string, level: LogLevel) {
      if (!isLevelEnabled(level)) return;
      sink.writeRaw(`${timestamp()}${pidTag}${levelLabel(level, colorized)} ${message}\n`);
    },
    writeRaw(text: string) {
      // 每条记录只调用一次 write，避免不同调用方的内容在一行内交错
      stream.write(text);
    },
  };
  return sink;
}
