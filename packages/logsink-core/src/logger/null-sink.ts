import type { LogSink } from "./types.js";

/** 丢弃所有输出，可作为关闭日志用的 Sink */
export function createNullSink(): LogSink {
  return {
    kind: "",
    emit() {},
    writeRaw() {},
  };
}
