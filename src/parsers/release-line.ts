/**
 * Parser for the free-text first line of legacy /etc/*-release files,
 * e.g. "CentOS Linux release 7.8.2003 (Core)".
 */

import { UNKNOWN_VERSION } from "../constants.js";

/** "<name> [release|version] <version> [extra]" */
const RELEASE_LINE_PATTERN = /^(.+) (release|version)? (\S+)\s*(\S+)?/;

/**
 * Match release file contents against an expected distro name.
 *
 * Only the first line takes part: the pattern is anchored to the start of
 * the text and `.` never crosses a line break.
 *
 * @param contents - Full text of the release file.
 * @param expectedDistro - Literal the leading text must start with.
 * @returns The version ("unknown" when the version token is empty), or
 *   null when the text has no release-line shape or names another distro.
 */
export function parseReleaseLine(contents: string, expectedDistro: string): string | null {
  const match = RELEASE_LINE_PATTERN.exec(contents);
  if (!match) {
    return null;
  }

  const [whole, , , version] = match;
  if (!whole.startsWith(expectedDistro)) {
    return null;
  }

  const trimmed = version?.trim() ?? "";
  return trimmed === "" ? UNKNOWN_VERSION : trimmed;
}
