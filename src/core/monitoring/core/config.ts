/**
 * Environment-based Logging Configuration
 *
 * Provides intelligent defaults based on environment with the ability to override
 * via environment variables or runtime configuration.
 */

import { LogLevel, LOG_LEVEL_ORDER } from "./types";

// ============================================================================
// Configuration Types
// ============================================================================

export interface LoggingConfig {
  /** Minimum log level to output */
  level: LogLevel;

  /** Whether to enable console output */
  enableConsole: boolean;

  /** Whether to write through electron-log's file transport */
  enableFile: boolean;

  /** Window for throttled log variants, in milliseconds */
  throttleWindowMs: number;
}

export type Environment = "development" | "production" | "test";

// ============================================================================
// Default Configurations
// ============================================================================

const DEVELOPMENT_CONFIG: LoggingConfig = {
  level: LogLevel.VERBOSE,
  enableConsole: true,
  enableFile: true,
  throttleWindowMs: 2000,
};

const PRODUCTION_CONFIG: LoggingConfig = {
  level: LogLevel.INFO,
  enableConsole: false,
  enableFile: true,
  throttleWindowMs: 2000,
};

const TEST_CONFIG: LoggingConfig = {
  level: LogLevel.WARN, // Only warnings and errors in tests
  enableConsole: false, // Silent tests
  enableFile: false, // No file output in tests
  throttleWindowMs: 2000,
};

// ============================================================================
// Environment Detection
// ============================================================================

function detectEnvironment(): Environment {
  const env = process.env.NODE_ENV?.toLowerCase();
  if (env) {
    if (env.includes("test")) return "test";
    if (env.includes("prod")) return "production";
    if (env.includes("dev")) return "development";
  }

  // Vitest sets this even when NODE_ENV is left alone
  if (process.env.VITEST) return "test";

  return "development";
}

function parseLevel(value: string | undefined): LogLevel | null {
  if (!value) return null;
  const normalized = value.toLowerCase();
  return LOG_LEVEL_ORDER.find((level) => level === normalized) ?? null;
}

// ============================================================================
// Configuration Builder
// ============================================================================

export class LogConfigBuilder {
  private config: LoggingConfig;

  constructor(private readonly environment: Environment = detectEnvironment()) {
    this.config = this.getBaseConfig();
    this.applyEnvironmentVariables();
  }

  private getBaseConfig(): LoggingConfig {
    switch (this.environment) {
      case "production":
        return { ...PRODUCTION_CONFIG };
      case "test":
        return { ...TEST_CONFIG };
      case "development":
      default:
        return { ...DEVELOPMENT_CONFIG };
    }
  }

  private applyEnvironmentVariables(): void {
    const env = process.env;

    const level = parseLevel(env.TILING_LOG_LEVEL);
    if (level) {
      this.config.level = level;
    }

    if (env.TILING_LOG_CONSOLE !== undefined) {
      this.config.enableConsole = env.TILING_LOG_CONSOLE === "true";
    }

    if (env.TILING_LOG_FILE !== undefined) {
      this.config.enableFile = env.TILING_LOG_FILE === "true";
    }
  }

  setLevel(level: LogLevel): LogConfigBuilder {
    this.config.level = level;
    return this;
  }

  build(): LoggingConfig {
    return { ...this.config };
  }
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Get logging configuration for current environment
 */
export function getLoggingConfig(environment?: Environment): LoggingConfig {
  return new LogConfigBuilder(environment).build();
}

/**
 * Create custom logging configuration
 */
export function createLoggingConfig(environment?: Environment): LogConfigBuilder {
  return new LogConfigBuilder(environment);
}

/**
 * Check if logging is enabled for a specific level
 */
export function isLogLevelEnabled(level: LogLevel, config: LoggingConfig = loggingConfig): boolean {
  return LOG_LEVEL_ORDER.indexOf(level) <= LOG_LEVEL_ORDER.indexOf(config.level);
}

export const loggingConfig: LoggingConfig = getLoggingConfig();
