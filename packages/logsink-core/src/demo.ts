/**
 * 并发写日志演示：多个异步任务同时向同一个 Sink 写各级别日志，
 * 外加一条自定义标签的原样输出。
 */

import { setTimeout as sleep } from "node:timers/promises";
import { LOG_LEVELS } from "./logger/types.js";
import type { LogSink } from "./logger/types.js";
import { timestamp } from "./logger/timestamp.js";

export interface DemoOptions {
  sink: LogSink;
  workers?: number;
  rounds?: number;
  /** 每次写入后暂停的毫秒数，让任务之间交错 */
  pauseMs?: number;
}

const CUSTOM_LABEL = "\x1b[35;1m[CUSTOM]\x1b[0m";

/** 返回尝试写出的记录数（含被截断级别过滤掉的） */
export async function runDemo(opts: DemoOptions): Promise<number> {
  const { sink } = opts;
  const workers = opts.workers ?? 4;
  const rounds = opts.rounds ?? 2;
  const pauseMs = opts.pauseMs ?? 10;

  async function work(id: number): Promise<number> {
    const message = `hi my name is: worker-${id}`;
    let written = 0;
    for (let round = 0; round < rounds; round++) {
      for (const level of [...LOG_LEVELS].reverse()) {
        sink.emit(message, level);
        written++;
        await sleep(pauseMs);
      }
      sink.writeRaw(`${timestamp()} ${CUSTOM_LABEL} ${message}\n`);
      written++;
      await sleep(pauseMs);
    }
    return written;
  }

  const counts = await Promise.all(Array.from({ length: workers }, (_, i) => work(i)));
  return counts.reduce((sum, n) => sum + n, 0);
}
