/**
 * Configuration management for distroscope.
 *
 * Settings are layered, later layers overriding earlier ones:
 *   defaults < config file < environment (DISTROSCOPE_*) < CLI flags
 *
 * Dependency direction:
 *   This module imports from: config-file.ts, constants.ts, logger.ts
 *   It may be imported by: cli.ts, program.ts
 *   It should NOT import from: classifier, detectors
 */

import { loadConfigFile, configFromProperties, defaultConfigPath } from "./config-file.js";
import { DEFAULT_FS_ROOT, ENV_PREFIX } from "./constants.js";
import type { DistroField } from "./distro.js";
import { LogLevel } from "./logger.js";
import type { OutputFormat } from "./output.js";

/** Process environment shape accepted by the loaders. */
export type Environment = Readonly<Record<string, string | undefined>>;

/** Effective distroscope settings. */
export interface DistroscopeConfig {
  /** Root the marker file paths are resolved under. */
  fsRoot: string;
  format: OutputFormat;
  /** Fields to print, in print order. Empty means all. */
  fields: readonly DistroField[];
  logLevel: LogLevel;
}

/** One configuration layer. Absent keys leave the lower layer in place. */
export type ConfigOverrides = Partial<DistroscopeConfig>;

export const DEFAULT_CONFIG: Readonly<DistroscopeConfig> = Object.freeze({
  fsRoot: DEFAULT_FS_ROOT,
  format: "text",
  fields: [],
  logLevel: LogLevel.INFO,
});

/**
 * Read DISTROSCOPE_* variables.
 *
 * @throws ValidationError on an invalid value.
 */
export function configFromEnv(env: Environment): ConfigOverrides {
  const defined: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (key.startsWith(ENV_PREFIX) && value !== undefined) {
      defined[key] = value.trim();
    }
  }
  return configFromProperties(defined, ENV_PREFIX);
}

/**
 * Apply override layers over a base config, in order.
 */
export function mergeConfig(base: Readonly<DistroscopeConfig>, ...layers: ConfigOverrides[]): DistroscopeConfig {
  return layers.reduce<DistroscopeConfig>(
    (config, layer) => ({
      fsRoot: layer.fsRoot ?? config.fsRoot,
      format: layer.format ?? config.format,
      fields: layer.fields ?? config.fields,
      logLevel: layer.logLevel ?? config.logLevel,
    }),
    { ...base }
  );
}

export interface ResolveConfigOptions {
  /** Explicit config file; it must exist. */
  configPath?: string;
  env?: Environment;
  /** Values from CLI flags. */
  cli?: ConfigOverrides;
}

/**
 * Build the effective config from every source.
 *
 * @throws ConfigError for a bad config file, ValidationError for a bad
 *   environment value.
 */
export function resolveConfig(options: ResolveConfigOptions = {}): DistroscopeConfig {
  const env = options.env ?? process.env;
  const file =
    options.configPath !== undefined
      ? loadConfigFile(options.configPath, true)
      : loadConfigFile(defaultConfigPath(env));

  return mergeConfig(DEFAULT_CONFIG, file, configFromEnv(env), options.cli ?? {});
}
