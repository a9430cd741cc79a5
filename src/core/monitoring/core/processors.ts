/**
 * Built-in log processors
 * Sinks that receive every entry the logger lets through
 */

import log from "electron-log/node";
import { LogLevel, type LogEntry, type LogProcessor } from "./types";

/**
 * Console processor - outputs to the process console
 */
export class ConsoleProcessor implements LogProcessor {
  process(entry: LogEntry): void {
    const message = `[${entry.timestamp}] ${entry.level.toUpperCase()}: ${entry.message}`;

    switch (entry.level) {
      case LogLevel.ERROR:
        console.error(message, entry.context);
        break;
      case LogLevel.WARN:
        console.warn(message, entry.context);
        break;
      case LogLevel.INFO:
        console.info(message, entry.context);
        break;
      case LogLevel.DEBUG:
        console.debug(message, entry.context);
        break;
      case LogLevel.VERBOSE:
        console.log(message, entry.context);
        break;
    }
  }
}

/**
 * Electron Log processor - outputs to electron-log's rotating file transport
 */
export class ElectronLogProcessor implements LogProcessor {
  constructor() {
    // Level filtering happens in the Logger; the console is owned by ConsoleProcessor
    log.transports.console.level = false;
    log.transports.file.level = "silly";
    log.transports.file.maxSize = 10 * 1024 * 1024; // 10MB
    log.transports.file.format = "[{y}-{m}-{d} {h}:{i}:{s}.{ms}] [{level}] {text}";
  }

  process(entry: LogEntry): void {
    switch (entry.level) {
      case LogLevel.ERROR:
        log.error(entry.message, entry.context);
        break;
      case LogLevel.WARN:
        log.warn(entry.message, entry.context);
        break;
      case LogLevel.INFO:
        log.info(entry.message, entry.context);
        break;
      case LogLevel.DEBUG:
        log.debug(entry.message, entry.context);
        break;
      case LogLevel.VERBOSE:
        log.verbose(entry.message, entry.context);
        break;
    }
  }
}

/**
 * Memory processor - keeps entries for inspection (diagnostics and tests)
 */
export class MemoryProcessor implements LogProcessor {
  readonly entries: LogEntry[] = [];

  process(entry: LogEntry): void {
    this.entries.push(entry);
  }

  clear(): void {
    this.entries.length = 0;
  }
}
