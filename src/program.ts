/**
 * Command-line program for distroscope.
 *
 * Commander.js-based CLI with all commands and options. The entry point
 * in cli.ts only hands process.argv to runCli().
 *
 * Exit codes:
 *   0  success (including --help and --version)
 *   1  writing the result failed
 *   2  invalid options, environment or config file
 */

import { Command, CommanderError } from "commander";

import { Classifier } from "./classifier.js";
import { resolveConfig, DEFAULT_CONFIG, type ConfigOverrides, type DistroscopeConfig, type Environment } from "./config.js";
import { TOOL_NAME, VERSION } from "./constants.js";
import { detectorNames } from "./detectors/index.js";
import type { LinuxDistro } from "./distro.js";
import { DistroscopeError, extractErrorDetails } from "./errors.js";
import { NodeFileSource, type FileSource } from "./fs/file-source.js";
import { LogLevel, enableQuietMode, isQuiet, log, setLogLevel } from "./logger.js";
import { OUTPUT_FORMATS, formatDistro, formatFamily } from "./output.js";
import { parseFields, parseFormat } from "./validation.js";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

/** Outside world the program talks to. Tests substitute each part. */
export interface CliIO {
  /** File access for detection (default: the local filesystem). */
  source?: FileSource;
  env?: Environment;
  /** Writes result text; rejects when the write fails. */
  write?: (text: string) => Promise<void>;
}

/** Raw global options as commander parses them. */
type GlobalOptions = {
  format?: string;
  fields?: string;
  fsroot?: string;
  config?: string;
  quiet?: boolean;
  verbose?: boolean;
};

/**
 * Write to stdout. Failures such as EPIPE surface either through the
 * write callback or as an "error" event; both reject.
 */
export function writeStdout(text: string, stream: NodeJS.WritableStream = process.stdout): Promise<void> {
  return new Promise((resolve, reject) => {
    const onError = (error: Error): void => reject(error);
    stream.once("error", onError);
    stream.write(text, (error) => {
      if (error) {
        // The listener stays to absorb the "error" event that follows
        reject(error);
        return;
      }
      stream.removeListener("error", onError);
      resolve();
    });
  });
}

/**
 * Translate flags into a config layer. Quiet is applied separately
 * through the logger's quiet mode.
 *
 * @throws ValidationError on an invalid flag value.
 */
function overridesFromFlags(opts: GlobalOptions): ConfigOverrides {
  const overrides: ConfigOverrides = {};

  if (opts.fsroot !== undefined) {overrides.fsRoot = opts.fsroot;}
  if (opts.format !== undefined) {overrides.format = parseFormat(opts.format);}
  if (opts.fields !== undefined) {overrides.fields = parseFields(opts.fields);}

  if (opts.verbose) {
    overrides.logLevel = LogLevel.DEBUG;
  }

  return overrides;
}

/**
 * Build the commander program.
 */
export function createProgram(io: CliIO = {}): Command {
  const source = io.source ?? new NodeFileSource();
  const env = io.env ?? process.env;
  const write = io.write ?? writeStdout;

  let config: DistroscopeConfig = { ...DEFAULT_CONFIG };

  const emit = async (text: string): Promise<void> => {
    if (isQuiet() || text === "") {
      return;
    }
    await write(text);
  };

  const detect = (): LinuxDistro => new Classifier({ source, fsRoot: config.fsRoot }).detect();

  const program = new Command();

  program
    .name(TOOL_NAME)
    .description("Identify the Linux distribution of a system or mounted image")
    .version(VERSION, "-V, --version")
    .option("-f, --format <format>", `Output format (${OUTPUT_FORMATS.join("|")})`)
    .option("--fields <list>", "Comma-separated fields to print (id,name,version,lsb_release,os_release)")
    .option("-r, --fsroot <path>", "Filesystem root to inspect (default: /)")
    .option("-c, --config <path>", "Config file (default: $XDG_CONFIG_HOME/distroscope/config)")
    .option("-q, --quiet", "Suppress all output (exit code only)")
    .option("-v, --verbose", "Log detection details to stderr")
    .configureOutput({
      outputError: (message) => log.error(message.replace(/^error: /, "").trimEnd()),
    })
    .exitOverride()
    .hook("preAction", () => {
      const opts = program.opts<GlobalOptions>();
      const flags = overridesFromFlags(opts);
      // Quiet wins over verbose and over any configured level
      const applyLevel = (level: LogLevel | undefined): void => {
        if (opts.quiet) {
          enableQuietMode();
        } else if (level !== undefined) {
          setLogLevel(level);
        }
      };

      // Flag verbosity applies while the config file is located
      applyLevel(flags.logLevel);
      config = resolveConfig({ env, configPath: opts.config, cli: flags });
      applyLevel(config.logLevel);
    })
    .action(async () => {
      await emit(formatDistro(detect(), { format: config.format, fields: config.fields }));
    });

  program
    .command("detectors")
    .description("List the detectors in evaluation order")
    .action(async () => {
      await emit(detectorNames().map((name) => `${name}\n`).join(""));
    });

  program
    .command("family")
    .description("Show the family predicates (redhat-family, rhel-family, rpm)")
    .action(async () => {
      await emit(formatFamily(detect(), config.format));
    });

  return program;
}

function exitCodeFor(error: unknown): number {
  if (error instanceof CommanderError) {
    // --help and --version also leave through here
    return error.exitCode === 0 ? EXIT_OK : EXIT_USAGE;
  }

  log.error(extractErrorDetails(error));
  return error instanceof DistroscopeError ? EXIT_USAGE : EXIT_FAILURE;
}

/**
 * Run the CLI against `argv` (without the node and script entries).
 *
 * @returns The process exit code.
 */
export async function runCli(argv: readonly string[], io: CliIO = {}): Promise<number> {
  const program = createProgram(io);

  try {
    await program.parseAsync([...argv], { from: "user" });
    return EXIT_OK;
  } catch (e) {
    return exitCodeFor(e);
  }
}
