import { describe, expect, it } from "vitest";
import { runDemo } from "./demo.js";
import { createConsoleSink } from "./logger/console-sink.js";
import type { LogLevel, LogSink } from "./logger/types.js";

describe("runDemo", () => {
  it("emits every level plus a custom line per round and worker", async () => {
    const emitted: Array<[string, LogLevel]> = [];
    const raw: string[] = [];
    const sink: LogSink = {
      kind: "memory",
      emit: (message, level) => emitted.push([message, level]),
      writeRaw: (text) => raw.push(text),
    };

    const total = await runDemo({ sink, workers: 3, rounds: 2, pauseMs: 0 });

    expect(total).toBe(36);
    expect(emitted).toHaveLength(30);
    expect(raw).toHaveLength(6);
    expect(emitted.filter(([m]) => m === "hi my name is: worker-1").map(([, l]) => l)).toEqual([
      "error",
      "warn",
      "info",
      "debug",
      "trace",
      "error",
      "warn",
      "info",
      "debug",
      "trace",
    ]);
    for (const line of raw) {
      expect(line).toMatch(/ \x1b\[35;1m\[CUSTOM\]\x1b\[0m hi my name is: worker-[0-2]\n$/);
    }
  });

  it("writes only the levels the cutoff lets through", async () => {
    const chunks: string[] = [];
    const sink = createConsoleSink({}, { stream: { write: (chunk: string) => chunks.push(chunk) } });

    await runDemo({ sink, workers: 3, rounds: 2, pauseMs: 0 });

    // info、warn、error 加上一条自定义行
    expect(chunks).toHaveLength(24);
    expect(chunks.every((c) => c.endsWith("\n"))).toBe(true);
  });
});
