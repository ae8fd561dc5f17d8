import { describe, expect, it } from "vitest";
import { createConsoleSink } from "./console-sink.js";
import type { OutputStream } from "./types.js";

function captureStream(): { stream: OutputStream; chunks: string[] } {
  const chunks: string[] = [];
  return { stream: { write: (chunk: string) => chunks.push(chunk) }, chunks };
}

const TS = String.raw`\d{4}/\d{2}/\d{2} \d{2}:\d{2}:\d{2}\.\d{6}`;

describe("console sink", () => {
  it("writes timestamp, pid, plain label and message as one line", () => {
    const { stream, chunks } = captureStream();
    const sink = createConsoleSink({ type: "std_out" }, { stream, pid: 42 });

    sink.emit("hello", "info");

    expect(sink.kind).toBe("std_out");
    expect(chunks).toHaveLength(1);
    expect(chunks[0]).toMatch(new RegExp(`^${TS} \\[42\\] \\[INFO\\] hello\\n$`));
  });

  it("colors labels when the color key is present, even if empty", () => {
    const { stream, chunks } = captureStream();
    const sink = createConsoleSink({ type: "std_out", color: "" }, { stream, pid: 42 });

    sink.emit("boom", "error");

    expect(chunks[0].slice(26)).toBe(" [42] \x1b[31;1m[ERROR]\x1b[0m boom\n");
  });

  it("skips levels below the default cutoff without writing", () => {
    const { stream, chunks } = captureStream();
    const sink = createConsoleSink({}, { stream });

    sink.emit("t", "trace");
    sink.emit("d", "debug");

    expect(chunks).toEqual([]);
  });

  it("passes raw text through verbatim with a single write per call", () => {
    const { stream, chunks } = captureStream();
    const sink = createConsoleSink({ color: "yes" }, { stream });

    sink.writeRaw("custom line\n");
    sink.writeRaw("partial");

    expect(chunks).toEqual(["custom line\n", "partial"]);
  });

  it("tags records with the current process id by default", () => {
    const { stream, chunks } = captureStream();
    createConsoleSink({}, { stream }).emit("pid check", "warn");

    expect(chunks[0].slice(26)).toBe(` [${process.pid}] [WARN] pid check\n`);
  });
});
