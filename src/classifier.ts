/**
 * Distro classification.
 *
 * Reads /etc/lsb-release and /etc/os-release once, then runs the detectors
 * in order against the two property maps. The first detector that matches
 * wins; when none does, the best-guess fallback builds the result.
 *
 * Dependency direction:
 *   This module imports from: detectors, fallback.ts, fs, parsers
 *   It may be imported by: index.ts, cli.ts
 */

import { DEFAULT_FS_ROOT, LSB_RELEASE_PATH, OS_RELEASE_PATH } from "./constants.js";
import { DETECTORS } from "./detectors/index.js";
import type { DetectionContext, Detector } from "./detectors/types.js";
import type { LinuxDistro } from "./distro.js";
import { extractErrorDetails } from "./errors.js";
import { bestGuess } from "./fallback.js";
import { NodeFileSource, type FileSource } from "./fs/file-source.js";
import { FileResolver } from "./fs/resolver.js";
import { log } from "./logger.js";
import { EMPTY_PROPERTIES, parseKeyValue, type PropertyMap } from "./parsers/key-value.js";

/** Classifier construction options. */
export interface ClassifierOptions {
  /** File access (defaults to the local filesystem). */
  source?: FileSource;
  /** Root the marker file paths are resolved under (default "/"). */
  fsRoot?: string;
  /** Detectors in evaluation order (default: DETECTORS). */
  detectors?: readonly Detector[];
}

export class Classifier {
  readonly files: FileResolver;
  readonly detectors: readonly Detector[];

  constructor(options: ClassifierOptions = {}) {
    this.files = new FileResolver(options.source ?? new NodeFileSource(), options.fsRoot ?? DEFAULT_FS_ROOT);
    this.detectors = options.detectors ?? DETECTORS;
  }

  /**
   * Identify the distribution under the configured root.
   */
  detect(): LinuxDistro {
    const lsb = this.readReleaseProperties(LSB_RELEASE_PATH);
    const os = this.readReleaseProperties(OS_RELEASE_PATH);
    return this.classify(lsb, os);
  }

  /**
   * Identify the distribution from already parsed release properties.
   * Detectors may still read marker files through the resolver.
   */
  classify(lsb: PropertyMap, os: PropertyMap): LinuxDistro {
    const ctx: DetectionContext = { lsb, os, files: this.files };

    for (const detector of this.detectors) {
      log.debug(`trying detector ${detector.name}`);
      const distro = detector.detect(ctx);
      if (distro) {
        log.debug(`detector ${detector.name} matched: ${distro.id} ${distro.version}`);
        return distro;
      }
    }

    return bestGuess(lsb, os);
  }

  /**
   * Parse a top-level KEY=VALUE release file. Absent or unreadable files
   * yield an empty map.
   */
  readReleaseProperties(path: string): PropertyMap {
    const file = this.files.tryOpen(path);
    if (!file) {
      log.debug(`unable to find release file: ${this.files.resolvePath(path)}`);
      return EMPTY_PROPERTIES;
    }

    try {
      return parseKeyValue(file.text());
    } catch (e) {
      log.error(extractErrorDetails(e));
      return EMPTY_PROPERTIES;
    }
  }
}

/**
 * Identify the distribution with a one-off classifier.
 *
 * Usage:
 *   const distro = detectDistro();
 *   const image = detectDistro({ fsRoot: "/mnt/image" });
 */
export function detectDistro(options: ClassifierOptions = {}): LinuxDistro {
  return new Classifier(options).detect();
}
