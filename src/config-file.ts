/**
 * Configuration file support for distroscope.
 *
 * Loads settings from a KEY=VALUE file in the same syntax as os-release:
 *
 *   FORMAT=json
 *   FIELDS=id,version
 *   FSROOT=/mnt/image
 *   LOG_LEVEL=warn
 *
 * Config file location:
 *   1. --config <path> (must exist)
 *   2. $XDG_CONFIG_HOME/distroscope/config
 *   3. ~/.config/distroscope/config
 *
 * Dependency direction:
 *   This module imports from: constants.ts, errors.ts, parsers, validation.ts
 *   It should NOT import from: cli, classifier
 */

import { existsSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";

import type { ConfigOverrides, Environment } from "./config.js";
import { TOOL_NAME } from "./constants.js";
import { ConfigError, ValidationError, extractErrorDetails } from "./errors.js";
import { log } from "./logger.js";
import { parseKeyValue, prop, type PropertyMap } from "./parsers/key-value.js";
import { parseFields, parseFormat, parseLogLevel } from "./validation.js";

/**
 * Default config file path for the given environment.
 */
export function defaultConfigPath(env: Environment): string {
  const xdg = env.XDG_CONFIG_HOME;
  const base = xdg !== undefined && xdg !== "" ? xdg : join(homedir(), ".config");
  return join(base, TOOL_NAME, "config");
}

/**
 * Map KEY=VALUE properties onto config overrides. Keys are looked up
 * with `prefix` prepended, so the same mapping serves the environment.
 *
 * @throws ValidationError on an invalid value.
 */
export function configFromProperties(properties: PropertyMap, prefix = ""): ConfigOverrides {
  const config: ConfigOverrides = {};

  const fsRoot = prop(properties, `${prefix}FSROOT`);
  if (fsRoot !== "") {config.fsRoot = fsRoot;}

  const format = prop(properties, `${prefix}FORMAT`);
  if (format !== "") {config.format = parseFormat(format);}

  const fields = prop(properties, `${prefix}FIELDS`);
  if (fields !== "") {config.fields = parseFields(fields);}

  const logLevel = prop(properties, `${prefix}LOG_LEVEL`);
  if (logLevel !== "") {config.logLevel = parseLogLevel(logLevel);}

  return config;
}

/**
 * Load configuration from file.
 *
 * @param required - Whether a missing file is an error (explicit --config).
 * @throws ConfigError if the file is unreadable, holds an invalid value,
 *   or is required but missing.
 */
export function loadConfigFile(path: string, required = false): ConfigOverrides {
  if (!existsSync(path)) {
    if (required) {
      throw new ConfigError(`Config file not found: ${path}`);
    }
    log.debug(`no config file at ${path}`);
    return {};
  }

  let content: string;
  try {
    content = readFileSync(path, "utf-8");
  } catch (e) {
    throw new ConfigError(`Failed to read config file (${path}): ${extractErrorDetails(e)}`);
  }

  try {
    const config = configFromProperties(parseKeyValue(content));
    log.debug(`loaded config from ${path}`);
    return config;
  } catch (e) {
    if (e instanceof ValidationError) {
      throw new ConfigError(`${path}: ${e.message}`);
    }
    throw e;
  }
}
