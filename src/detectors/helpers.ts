/**
 * Shared building blocks for distro detectors.
 *
 * These helpers extract the matching strategies several detectors share:
 * os-release/lsb-release field checks, legacy release-line files,
 * key/value bodies under a free-text header and line scans of scripts.
 */

import { UNKNOWN_VERSION } from "../constants.js";
import { LinuxDistro } from "../distro.js";
import { parseKeyValue, prop } from "../parsers/key-value.js";
import { parseReleaseLine } from "../parsers/release-line.js";
import type { DetectionContext, Detector, DistroIdentity } from "./types.js";

/**
 * Build a result for `identity`, carrying both property maps of the context.
 */
export function createDistro(ctx: DetectionContext, identity: DistroIdentity, version: string): LinuxDistro {
  return new LinuxDistro({
    name: identity.name,
    id: identity.id,
    version,
    lsbProperties: ctx.lsb,
    osProperties: ctx.os,
  });
}

/** Where a single-field detector takes its version from. */
export type VersionSource =
  | { from: "os"; key: string }
  | { from: "lsb"; key: string }
  | { from: "literal"; value: string };

/**
 * Read the version named by `source`.
 */
export function readVersion(ctx: DetectionContext, source: VersionSource): string {
  switch (source.from) {
    case "os":
      return prop(ctx.os, source.key);
    case "lsb":
      return prop(ctx.lsb, source.key);
    case "literal":
      return source.value;
  }
}

/** Configuration for a detector that compares one field against a literal. */
export interface FieldMatchConfig {
  name: string;
  identity: DistroIdentity;
  /** Property map and key holding the distro identifier. */
  field: { from: "os" | "lsb"; key: string };
  /** Expected value of the field. */
  equals: string;
  version: VersionSource;
}

/**
 * Create a detector that matches when one os-release/lsb-release field
 * equals a literal.
 */
export function fieldMatchDetector(config: FieldMatchConfig): Detector {
  const { name, identity, field, equals, version } = config;

  return {
    name,
    detect(ctx) {
      const properties = field.from === "os" ? ctx.os : ctx.lsb;
      if (prop(properties, field.key) !== equals) {
        return null;
      }
      return createDistro(ctx, identity, readVersion(ctx, version));
    },
  };
}

/**
 * True when os-release names `id` and carries a non-empty VERSION_ID.
 */
export function osReleaseHasVersionedId(ctx: DetectionContext, id: string): boolean {
  return prop(ctx.os, "ID") === id && prop(ctx.os, "VERSION_ID") !== "";
}

/**
 * Match the first line of a legacy release file against a distro name.
 *
 * @param candidates - Marker files in priority order.
 * @param expectedDistro - Literal the line must start with.
 * @returns The version, or null when no file resolves or the line names
 *   another distro.
 */
export function matchReleaseFile(
  ctx: DetectionContext,
  candidates: string[],
  expectedDistro: string
): string | null {
  const contents = ctx.files.readText(...candidates);
  if (contents === null) {
    return null;
  }
  return parseReleaseLine(contents, expectedDistro);
}

/**
 * Match a file that starts with a free-text header and carries
 * `KEY = VALUE` lines below it (e.g. /etc/SuSE-release).
 *
 * @returns The body's VERSION (or "unknown"), or null when no file
 *   resolves or the header does not start with `prefix`.
 */
export function matchPrefixedKeyValueFile(
  ctx: DetectionContext,
  candidates: string[],
  prefix: string
): string | null {
  const contents = ctx.files.readText(...candidates);
  if (contents === null || !contents.startsWith(prefix)) {
    return null;
  }
  return prop(parseKeyValue(contents), "VERSION") || UNKNOWN_VERSION;
}

/**
 * Find the first capture group of `pattern` in the non-blank,
 * non-comment lines of `contents`.
 */
export function scanLines(contents: string, pattern: RegExp): string | null {
  for (const line of contents.split("\n")) {
    if (line === "" || line.startsWith("#")) {
      continue;
    }

    const match = pattern.exec(line);
    if (match?.[1] !== undefined) {
      return match[1];
    }
  }
  return null;
}
