/**
 * Logging utility for the tiling engine
 * Structured logging with persistent context, child loggers and throttling
 */

import { loggingConfig, isLogLevelEnabled, type LoggingConfig } from "./config";
import { ConsoleProcessor, ElectronLogProcessor } from "./processors";
import { LogLevel, type LogContext, type LogProcessor } from "./types";

export { LogLevel, type LogContext } from "./types";

export class Logger {
  private context: LogContext = {};
  private throttleMap: Map<string, number> = new Map();

  constructor(
    private readonly config: LoggingConfig = loggingConfig,
    private readonly processors: LogProcessor[] = []
  ) {}

  /**
   * Set persistent context for all log messages
   */
  setContext(context: LogContext): void {
    this.context = { ...this.context, ...context };
  }

  removeProcessor(processor: LogProcessor): void {
    const index = this.processors.indexOf(processor);
    if (index >= 0) {
      this.processors.splice(index, 1);
    }
  }

  /**
   * Check if a log should be throttled
   */
  private shouldThrottle(key: string): boolean {
    const now = Date.now();
    const lastLogged = this.throttleMap.get(key);

    if (lastLogged === undefined || now - lastLogged > this.config.throttleWindowMs) {
      this.throttleMap.set(key, now);
      return false;
    }

    return true;
  }

  /**
   * Log an error message
   */
  error(message: string, error?: unknown, context?: LogContext): void {
    this.log(LogLevel.ERROR, message, { ...context, error: this.serializeError(error) });
  }

  warn(message: string, context?: LogContext): void {
    this.log(LogLevel.WARN, message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log(LogLevel.INFO, message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.log(LogLevel.DEBUG, message, context);
  }

  verbose(message: string, context?: LogContext): void {
    this.log(LogLevel.VERBOSE, message, context);
  }

  // ============================================================================
  // Throttled Logging Methods (for high-frequency events)
  // ============================================================================

  debugThrottled(message: string, context?: LogContext): void {
    this.log(LogLevel.DEBUG, message, context, true);
  }

  /**
   * Core logging method. Processors run synchronously so input handlers
   * never leave work behind once they return.
   */
  private log(level: LogLevel, message: string, context?: LogContext, throttle = false): void {
    if (!isLogLevelEnabled(level, this.config)) {
      return;
    }

    if (throttle && this.shouldThrottle(`${level}:${message}`)) {
      return;
    }

    const entry = {
      level,
      message,
      context: { ...this.context, ...context },
      timestamp: new Date().toISOString(),
    };

    for (const processor of this.processors) {
      processor.process(entry);
    }
  }

  /**
   * Serialize error objects for logging
   */
  private serializeError(error: unknown): unknown {
    if (error === undefined || error === null) return undefined;

    if (error instanceof Error) {
      return {
        name: error.name,
        message: error.message,
        stack: error.stack,
      };
    }

    return { error: String(error) };
  }

  /**
   * Create a child logger with specific context.
   * Children share the parent's processors.
   */
  child(context: LogContext): Logger {
    const childLogger = new Logger(this.config, this.processors);
    childLogger.setContext({ ...this.context, ...context });
    return childLogger;
  }
}

function createDefaultProcessors(config: LoggingConfig): LogProcessor[] {
  const processors: LogProcessor[] = [];
  if (config.enableConsole) processors.push(new ConsoleProcessor());
  if (config.enableFile) processors.push(new ElectronLogProcessor());
  return processors;
}

// Export singleton instance
export const logger = new Logger(loggingConfig, createDefaultProcessors(loggingConfig));

export default logger;
