/**
 * logsink 并发演示
 *
 * 不设置环境变量时输出到彩色控制台；写文件：
 *   LOGSINK_TYPE=file LOGSINK_FILE_NAME=test.log LOGSINK_REOPEN_INTERVAL=1 npm run demo
 *
 * 用法：node --import tsx packages/logsink-core/src/bin/demo.ts [workers] [rounds]
 */
import { runDemo } from "../demo.js";
import { configureFromEnv } from "../logger/index.js";

function parseCount(raw: string | undefined, fallback: number): number {
    if (raw === undefined) return fallback;
    const n = Number(raw);
    return Number.isInteger(n) && n > 0 ? n : fallback;
}

async function main() {
    try {
        const sink = configureFromEnv();
        const total = await runDemo({
            sink,
            workers: parseCount(process.argv[2], 4),
            rounds: parseCount(process.argv[3], 2),
        });
        sink.close?.();
        console.log(`Done: ${total} records attempted.`);
    } catch (err: unknown) {
        console.error("Demo failed:", err instanceof Error ? err.message : err);
        process.exit(1);
    }
}

void main();
