/**
 * Detector type definitions.
 */

import type { LinuxDistro } from "../distro.js";
import type { FileResolver } from "../fs/resolver.js";
import type { PropertyMap } from "../parsers/key-value.js";

/** Everything a detector may consult. Never mutated by detectors. */
export interface DetectionContext {
  /** Parsed /etc/lsb-release (empty when absent). */
  readonly lsb: PropertyMap;
  /** Parsed /etc/os-release (empty when absent). */
  readonly os: PropertyMap;
  /** Access to marker files, re-rooted under the configured filesystem root. */
  readonly files: FileResolver;
}

/**
 * A named distribution rule.
 *
 * `detect` returns the identified distro, or null when the rule does not
 * apply. Detectors keep no state between calls.
 */
export interface Detector {
  /** Stable identifier shown in diagnostics, e.g. "centos". */
  readonly name: string;
  detect(ctx: DetectionContext): LinuxDistro | null;
}

/** Display name and ID a detector reports. */
export interface DistroIdentity {
  readonly id: string;
  readonly name: string;
}
