/**
 * Shared types for the monitoring system
 * Extracted to prevent circular dependencies
 */

export enum LogLevel {
  ERROR = "error",
  WARN = "warn",
  INFO = "info",
  DEBUG = "debug",
  VERBOSE = "verbose",
}

export interface LogContext {
  component?: string;
  action?: string;
  sessionId?: string;
  [key: string]: unknown;
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  context: LogContext;
  timestamp: string;
}

export interface LogProcessor {
  process(entry: LogEntry): void;
}

/** Ordered from most to least severe */
export const LOG_LEVEL_ORDER: readonly LogLevel[] = [
  LogLevel.ERROR,
  LogLevel.WARN,
  LogLevel.INFO,
  LogLevel.DEBUG,
  LogLevel.VERBOSE,
];
