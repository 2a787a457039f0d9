/**
 * Unified logging abstraction for distroscope.
 *
 * Centralizes all console output with consistent styling and log levels.
 * Uses picocolors for terminal styling.
 *
 * Diagnostics (debug, warn, error) go to stderr so that detection results
 * written to stdout stay machine-readable.
 *
 * IMPORTANT: All distroscope diagnostics MUST go through this module.
 * Never use console.log/console.error directly in other modules.
 */

import pc from "picocolors";

/** Log levels in order of verbosity (debug is most verbose). */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

/** Logger configuration. */
interface LoggerConfig {
  level: LogLevel;
  /** If true, prefix diagnostic messages with [distroscope] */
  prefix: boolean;
}

/** Global logger configuration. */
const config: LoggerConfig = {
  level: LogLevel.INFO,
  prefix: false,
};

/**
 * Check if output is allowed at current level.
 */
function canOutput(level: LogLevel): boolean {
  return config.level <= level;
}

/**
 * Enable quiet mode: suppress ALL output, including results.
 * Only exit codes communicate success/failure.
 */
export function enableQuietMode(): void {
  config.level = LogLevel.SILENT;
}

/**
 * Check if quiet mode is enabled.
 */
export function isQuiet(): boolean {
  return config.level === LogLevel.SILENT;
}

/**
 * Set the minimum log level. Messages below this level are suppressed.
 */
export function setLogLevel(level: LogLevel): void {
  config.level = level;
}

/**
 * Get the current log level.
 */
export function getLogLevel(): LogLevel {
  return config.level;
}

/**
 * Enable or disable the [distroscope] prefix on diagnostic messages.
 */
export function setPrefix(enabled: boolean): void {
  config.prefix = enabled;
}

/**
 * Format message with optional prefix.
 */
function formatMessage(label: string, message: string): string {
  return config.prefix ? `[distroscope] ${label}${message}` : `${label}${message}`;
}

/**
 * Logger object with level-aware methods.
 *
 * Usage:
 *   log.debug("trying detector centos")
 *   log.warn("distro is not part of the known set")
 *   log.error("unable to read file")
 *   log.raw("Distro ID: ubuntu")
 */
export const log = {
  /**
   * Debug-level message (shown only when level <= DEBUG).
   * Styled: dim gray, outputs to stderr
   */
  debug(message: string): void {
    if (canOutput(LogLevel.DEBUG)) {
      console.error(pc.dim(formatMessage("debug: ", message)));
    }
  },

  /**
   * Info-level message (default level).
   * Styled: normal (no color)
   */
  info(message: string): void {
    if (canOutput(LogLevel.INFO)) {
      console.log(formatMessage("", message));
    }
  },

  /**
   * Warning-level message.
   * Styled: yellow, outputs to stderr
   */
  warn(message: string): void {
    if (canOutput(LogLevel.WARN)) {
      console.warn(pc.yellow(formatMessage("warn: ", message)));
    }
  },

  /**
   * Error-level message.
   * Styled: red, outputs to stderr
   */
  error(message: string): void {
    if (canOutput(LogLevel.ERROR)) {
      console.error(pc.red(formatMessage("error: ", message)));
    }
  },

  /**
   * Raw output without any styling or prefix.
   * Respects log level (info).
   */
  raw(message: string): void {
    if (canOutput(LogLevel.INFO)) {
      console.log(message);
    }
  },
};
