/**
 * Rendering of detection results for the CLI.
 *
 * Dependency direction:
 *   This module imports from: distro.ts, parsers/key-value.ts
 *   It should NOT import from: classifier, cli
 */

import { DISTRO_FIELDS, FIELD_LABELS, type DistroField, type LinuxDistro } from "./distro.js";
import { prop } from "./parsers/key-value.js";

export const OUTPUT_FORMATS = ["text", "text-no-labels", "json", "json-one-line"] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export interface FormatOptions {
  format?: OutputFormat;
  /** Fields to print, in print order. Empty or absent means all. */
  fields?: readonly DistroField[];
}

function isJson(format: OutputFormat): boolean {
  return format === "json" || format === "json-one-line";
}

function stringify(value: unknown, format: OutputFormat): string {
  return format === "json" ? JSON.stringify(value, null, 2) : JSON.stringify(value);
}

function toLines(lines: string[]): string {
  return lines.map((line) => `${line}\n`).join("");
}

/**
 * Text lines for the selected fields. Map fields expand to one line per
 * entry with keys in sorted order; empty scalars are left out.
 */
function textLines(distro: LinuxDistro, fields: readonly DistroField[], labels: boolean): string[] {
  const values = distro.asFieldMap();
  const lines: string[] = [];

  for (const field of fields) {
    const value = values[field];
    const label = FIELD_LABELS[field];

    if (typeof value === "string") {
      if (value !== "") {
        lines.push(labels ? `${label}: ${value}` : value);
      }
      continue;
    }

    for (const key of Object.keys(value).sort()) {
      const entry = prop(value, key);
      lines.push(labels ? `${label} ${key}: ${entry}` : entry);
    }
  }

  return lines;
}

/**
 * Render a detection result.
 *
 * JSON output carries the full record unless fields are selected, in
 * which case it carries exactly those fields under their field names.
 */
export function formatDistro(distro: LinuxDistro, options: FormatOptions = {}): string {
  const format = options.format ?? "text";
  const selected = options.fields !== undefined && options.fields.length > 0 ? options.fields : null;

  if (isJson(format)) {
    if (selected === null) {
      return `${stringify(distro.toJSON(), format)}\n`;
    }
    const json = distro.toJSON();
    const picked = Object.fromEntries(
      selected.map((field): [DistroField, string | Record<string, string>] => [field, json[field]])
    );
    return `${stringify(picked, format)}\n`;
  }

  return toLines(textLines(distro, selected ?? DISTRO_FIELDS, format === "text"));
}

/** Family predicates in print order. */
export function familyFlags(distro: LinuxDistro): Array<[string, boolean]> {
  return [
    ["redhat-family", distro.isRedHatFamily()],
    ["rhel-family", distro.isRHELFamily()],
    ["rpm", distro.usesPackageFormatRPM()],
  ];
}

/**
 * Render the family predicates as yes/no lines or a JSON object of booleans.
 */
export function formatFamily(distro: LinuxDistro, format: OutputFormat = "text"): string {
  const flags = familyFlags(distro);

  if (isJson(format)) {
    return `${stringify(Object.fromEntries(flags), format)}\n`;
  }

  return toLines(
    flags.map(([name, set]) => {
      const answer = set ? "yes" : "no";
      return format === "text" ? `${name}: ${answer}` : answer;
    })
  );
}
