export { logger, Logger, type LogLevel, type LogSink } from "./logger.js";
export { withRetry, calculateBackoff, type RetryOptions } from "./retry.js";
export * from "./errors.js";
