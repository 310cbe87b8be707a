export { logger, LOG_LEVEL_NAMES, type LogLevel } from "./logger.js";
export * from "./errors.js";
export * from "./cleanup-manager.js";
export * from "./job-log.js";
export { KeyedLock } from "./keyed-lock.js";
export { Semaphore } from "./semaphore.js";
export * from "./watchdog.js";
