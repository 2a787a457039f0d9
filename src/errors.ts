/**
 * Unified exception hierarchy for distroscope.
 *
 * All custom exceptions inherit from DistroscopeError for consistent error handling.
 * The CLI catches these and converts them to user-friendly messages.
 *
 * Dependency direction:
 *   This module has NO internal dependencies (leaf module).
 *   It may be imported by: all other distroscope modules.
 *   It should NOT import from any other distroscope modules.
 */

/**
 * Base exception for all distroscope errors.
 */
export class DistroscopeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DistroscopeError";
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/**
 * Raised by the file resolver when none of the candidate paths is a
 * readable regular file. Detectors treat this as a plain non-match.
 */
export class NoReadableCandidateError extends DistroscopeError {
  readonly candidates: readonly string[];

  constructor(candidates: readonly string[]) {
    super(`unable to find a readable file for any of the paths: ${candidates.join(", ")}`);
    this.name = "NoReadableCandidateError";
    this.candidates = candidates;
  }
}

/**
 * A candidate file exists but opening or reading it failed.
 */
export class FileReadError extends DistroscopeError {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super(`unable to read file (${path}): ${extractErrorDetails(cause)}`);
    this.name = "FileReadError";
    this.path = path;
    this.cause = cause;
  }
}

/**
 * Configuration-related errors.
 *
 * Examples:
 *   - Unreadable config file
 *   - Config file value that fails validation
 */
export class ConfigError extends DistroscopeError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * Input validation errors.
 *
 * Examples:
 *   - Unknown output format
 *   - Unknown field name
 *   - Unknown log level
 */
export class ValidationError extends DistroscopeError {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

/**
 * Extract a human-readable message from an unknown error.
 *
 * Truncates output to maxLength to avoid overwhelming log output.
 */
export function extractErrorDetails(error: unknown, maxLength = 1000): string {
  if (!(error instanceof Error)) {
    return String(error).slice(0, maxLength);
  }
  return error.message.slice(0, maxLength);
}

/**
 * Check if an error is a Node "no such file" error.
 */
export function isNotFoundError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  return "code" in error && (error.code === "ENOENT" || error.code === "ENOTDIR");
}
