/**
 * KEY=VALUE parsing for os-release, lsb-release and the legacy release
 * files that share their shape.
 *
 * Dependency direction:
 *   This module has NO internal dependencies (leaf module).
 */

/** Parsed properties of one release file. Frozen once built. */
export type PropertyMap = Readonly<Record<string, string>>;

/** Shared empty map for absent or unreadable files. */
export const EMPTY_PROPERTIES: PropertyMap = Object.freeze({});

/** Splits a key/value pair delimited with an equals sign. */
const KEY_VALUE_PATTERN = /^\s*(\S+)\s*=\s*([\S ]+)\s*/;

/** A single parsed KEY=VALUE line. */
export interface KeyValuePair {
  key: string;
  value: string;
}

/**
 * Remove one pair of enclosing double quotes.
 */
function unquote(value: string): string {
  if (value.length >= 2 && value.startsWith("\"") && value.endsWith("\"")) {
    return value.slice(1, -1);
  }
  return value;
}

/**
 * Parse a single line.
 *
 * @returns The pair, or null for blank lines, comments and lines
 *   without a key/value shape.
 */
export function splitKeyValue(line: string): KeyValuePair | null {
  if (line === "" || line.startsWith("#")) {
    return null;
  }

  const match = KEY_VALUE_PATTERN.exec(line);
  if (!match) {
    return null;
  }

  const [, key, rawValue] = match;
  if (key === undefined || rawValue === undefined) {
    return null;
  }

  return { key, value: unquote(rawValue.trim()) };
}

/**
 * Build a property map from a sequence of lines. The last occurrence of a
 * duplicate key wins.
 */
export function parseKeyValueLines(lines: Iterable<string>): PropertyMap {
  const properties = new Map<string, string>();

  for (const line of lines) {
    const pair = splitKeyValue(line);
    if (pair) {
      properties.set(pair.key, pair.value);
    }
  }

  // fromEntries defines own properties, so a "__proto__" key stays data
  return Object.freeze(Object.fromEntries(properties));
}

/**
 * Build a property map from the full text of a file.
 */
export function parseKeyValue(content: string): PropertyMap {
  return parseKeyValueLines(content.split("\n"));
}

/**
 * Look up a property, treating a missing key and an empty value alike.
 */
export function prop(properties: PropertyMap, key: string): string {
  return Object.hasOwn(properties, key) ? (properties[key] ?? "") : "";
}
