import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    // 使用 forks 而非 threads：截断级别和默认 Sink 是进程级状态，每个测试文件独占一个进程
    pool: "forks",
    include: ["packages/*/src/**/*.test.ts"],
  },
});
