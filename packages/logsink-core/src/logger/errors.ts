// logsink error types

export class LoggingError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "LoggingError";
  }
}

/** 缺少必需 key、未知 type、或值格式不对。只在构造阶段抛出。 */
export class ConfigurationError extends LoggingError {
  constructor(
    message: string,
    public readonly key?: string
  ) {
    super(message, "CONFIGURATION_ERROR");
    this.name = "ConfigurationError";
  }
}

/** 日志文件打开/重新打开失败 */
export class ResourceError extends LoggingError {
  constructor(
    message: string,
    public readonly path: string,
    options?: { cause?: unknown }
  ) {
    super(message, "RESOURCE_ERROR", options);
    this.name = "ResourceError";
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
