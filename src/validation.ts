/**
 * Input validation utilities for distroscope.
 *
 * Parses user-supplied option values (CLI flags, environment variables,
 * config file entries) into their typed forms.
 *
 * Dependency direction:
 *   This module imports from: errors.ts, distro.ts, output.ts, logger.ts
 *   It should NOT import from: cli, classifier, detectors
 */

import { DISTRO_FIELDS, type DistroField } from "./distro.js";
import { ValidationError } from "./errors.js";
import { LogLevel } from "./logger.js";
import { OUTPUT_FORMATS, type OutputFormat } from "./output.js";

/** Accepted log level names. */
const LOG_LEVELS: ReadonlyMap<string, LogLevel> = new Map([
  ["debug", LogLevel.DEBUG],
  ["info", LogLevel.INFO],
  ["warn", LogLevel.WARN],
  ["error", LogLevel.ERROR],
  ["silent", LogLevel.SILENT],
]);

/**
 * Parse an output format name (case-insensitive).
 *
 * @throws ValidationError if the name is not a known format.
 */
export function parseFormat(value: string): OutputFormat {
  const wanted = value.trim().toLowerCase();
  const format = OUTPUT_FORMATS.find((f) => f === wanted);
  if (format === undefined) {
    throw new ValidationError(`Invalid format '${value}'. Expected one of: ${OUTPUT_FORMATS.join(", ")}`);
  }
  return format;
}

/**
 * Parse a comma-separated field list, keeping the given order.
 * Blank entries and repeats are dropped.
 *
 * @throws ValidationError on an unknown field name.
 */
export function parseFields(value: string): DistroField[] {
  const fields: DistroField[] = [];

  for (const entry of value.split(",")) {
    const wanted = entry.trim().toLowerCase();
    if (wanted === "") {
      continue;
    }

    const field = DISTRO_FIELDS.find((f) => f === wanted);
    if (field === undefined) {
      throw new ValidationError(`Invalid field '${entry.trim()}'. Expected any of: ${DISTRO_FIELDS.join(", ")}`);
    }
    if (!fields.includes(field)) {
      fields.push(field);
    }
  }

  return fields;
}

/**
 * Parse a log level name (case-insensitive).
 *
 * @throws ValidationError if the name is not a known level.
 */
export function parseLogLevel(value: string): LogLevel {
  const level = LOG_LEVELS.get(value.trim().toLowerCase());
  if (level === undefined) {
    throw new ValidationError(`Invalid log level '${value}'. Expected one of: ${[...LOG_LEVELS.keys()].join(", ")}`);
  }
  return level;
}
