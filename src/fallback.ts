/**
 * Best-guess identity for distributions no detector recognises.
 */

import { UNKNOWN_ID, UNKNOWN_NAME, UNKNOWN_VERSION } from "./constants.js";
import { LinuxDistro } from "./distro.js";
import { log } from "./logger.js";
import { prop, type PropertyMap } from "./parsers/key-value.js";

/** First whitespace-delimited token. */
function firstToken(value: string): string {
  return value.trim().split(/\s+/)[0] ?? "";
}

/**
 * Synthesize a result from whatever fragments the two property maps hold.
 * Never fails: missing pieces become "unknown" / "Unknown".
 */
export function bestGuess(lsb: PropertyMap, os: PropertyMap): LinuxDistro {
  log.warn("distro is not part of the known set - attempting best guess");

  const id = prop(os, "ID") || prop(lsb, "DISTRIB_ID").toLowerCase() || UNKNOWN_ID;

  const name =
    prop(os, "NAME") ||
    firstToken(prop(os, "PRETTY_NAME")) ||
    prop(lsb, "DISTRIB_ID") ||
    prop(os, "ID") ||
    UNKNOWN_NAME;

  const version =
    prop(os, "VERSION_ID") ||
    prop(lsb, "DISTRIB_RELEASE") ||
    firstToken(prop(os, "VERSION")) ||
    UNKNOWN_VERSION;

  return new LinuxDistro({ name, id, version, lsbProperties: lsb, osProperties: os });
}
