import { createConsoleSink } from "./console-sink.js";
import { ConfigurationError } from "./errors.js";
import { createFileSink } from "./file-sink.js";
import { createNullSink } from "./null-sink.js";
import type { LogSink, LoggingConfig, SinkConstructor } from "./types.js";

/**
 * 按类型名创建 Sink 的注册表。
 * 外部代码可以 register 自己的类型，不需要修改这里。
 */
export class SinkRegistry {
    private constructors: Map<string, SinkConstructor> = new Map();

    /**
     * Register (or replace) the constructor for a type name.
     */
    register(typeName: string, ctor: SinkConstructor): void {
        this.constructors.set(typeName, ctor);
    }

    has(typeName: string): boolean {
        return this.constructors.has(typeName);
    }

    /**
     * Get all registered type names
     */
    types(): string[] {
        return Array.from(this.constructors.keys());
    }

    /**
     * Build a sink from config.type; constructor errors propagate unchanged.
     */
    produce(config: LoggingConfig): LogSink {
        const type = config.type;
        if (type === undefined) {
            throw new ConfigurationError("Sink configuration requires a type", "type");
        }
        const ctor = this.constructors.get(type);
        if (!ctor) {
            throw new ConfigurationError(`Couldn't produce sink for type: ${JSON.stringify(type)}`, "type");
        }
        return ctor(config);
    }
}

/** 预置 ""（丢弃）、"std_out"、"file" 三种类型 */
export function createSinkRegistry(): SinkRegistry {
    const registry = new SinkRegistry();
    registry.register("", createNullSink);
    registry.register("std_out", (config) => createConsoleSink(config));
    registry.register("file", (config) => createFileSink(config));
    return registry;
}

let registry: SinkRegistry | null = null;

export function getSinkRegistry(): SinkRegistry {
    if (!registry) {
        registry = createSinkRegistry();
    }
    return registry;
}

export function registerSink(typeName: string, ctor: SinkConstructor): void {
    getSinkRegistry().register(typeName, ctor);
}
