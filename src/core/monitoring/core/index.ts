/**
 * Core Monitoring Infrastructure
 * Foundational logging and configuration
 */

export { logger, Logger, LogLevel, type LogContext } from "./logger";
export { ConsoleProcessor, ElectronLogProcessor, MemoryProcessor } from "./processors";
export type { LogEntry, LogProcessor } from "./types";
export {
  loggingConfig,
  getLoggingConfig,
  createLoggingConfig,
  isLogLevelEnabled,
  type LoggingConfig,
  type Environment,
} from "./config";
