/**
 * The detection result record and its derived family queries.
 *
 * Dependency direction:
 *   This module imports from: constants.ts, parsers/key-value.ts
 *   It should NOT import from: detectors, classifier, cli
 */

import { UNKNOWN_VERSION } from "./constants.js";
import { EMPTY_PROPERTIES, prop, type PropertyMap } from "./parsers/key-value.js";

/** IDs of distributions that descend from Red Hat. */
export const REDHAT_FAMILY_IDS: ReadonlySet<string> = new Set(["centos", "fedora", "ol", "rhel", "scientific"]);

/** IDs of distributions binary-compatible with RHEL. */
export const RHEL_FAMILY_IDS: ReadonlySet<string> = new Set(["centos", "ol", "rhel", "scientific"]);

/** Non-Red-Hat IDs that still package software as RPMs. */
const OTHER_RPM_IDS: ReadonlySet<string> = new Set(["opensuse", "sles"]);

/** Output fields in their canonical order. */
export const DISTRO_FIELDS = ["id", "name", "version", "lsb_release", "os_release"] as const;

export type DistroField = (typeof DISTRO_FIELDS)[number];

/** Human-readable labels for each output field. */
export const FIELD_LABELS: Readonly<Record<DistroField, string>> = {
  id: "Distro ID",
  name: "Distro Name",
  version: "Distro Version",
  lsb_release: "Distro LSB",
  os_release: "Distro OS",
};

/** Constructor input for LinuxDistro. */
export interface LinuxDistroInit {
  name: string;
  id: string;
  version: string;
  lsbProperties?: PropertyMap;
  osProperties?: PropertyMap;
}

/** JSON shape of a LinuxDistro. */
export interface LinuxDistroJSON {
  name: string;
  id: string;
  version: string;
  lsb_release: Record<string, string>;
  os_release: Record<string, string>;
}

/** Copy of a property map with its keys in sorted order. */
function sortedProperties(properties: PropertyMap): Record<string, string> {
  const sorted: Record<string, string> = {};
  for (const key of Object.keys(properties).sort()) {
    sorted[key] = prop(properties, key);
  }
  return sorted;
}

/** Field-keyed view of a LinuxDistro. */
export type DistroFieldMap = {
  readonly [K in DistroField]: K extends "lsb_release" | "os_release" ? PropertyMap : string;
};

/**
 * An identified distribution.
 *
 * Immutable once built. Both property maps are always present (possibly
 * empty) and an empty version is stored as "unknown".
 */
export class LinuxDistro {
  /** Display name, e.g. "CentOS Linux". */
  readonly name: string;
  /** Short machine identifier, e.g. "centos". */
  readonly id: string;
  readonly version: string;
  /** Contents of /etc/lsb-release. */
  readonly lsbProperties: PropertyMap;
  /** Contents of /etc/os-release. See https://www.freedesktop.org/software/systemd/man/os-release.html */
  readonly osProperties: PropertyMap;

  constructor(init: LinuxDistroInit) {
    this.name = init.name;
    this.id = init.id;
    this.version = init.version === "" ? UNKNOWN_VERSION : init.version;
    this.lsbProperties = init.lsbProperties ?? EMPTY_PROPERTIES;
    this.osProperties = init.osProperties ?? EMPTY_PROPERTIES;
    Object.freeze(this);
  }

  /** Space-delimited os-release ID_LIKE entries. */
  get idLike(): string[] {
    return prop(this.osProperties, "ID_LIKE").split(" ").filter((id) => id !== "");
  }

  /** Red Hat descendants: CentOS, Fedora, Oracle, RHEL, Scientific and anything "like" rhel/fedora. */
  isRedHatFamily(): boolean {
    if (REDHAT_FAMILY_IDS.has(this.id)) {
      return true;
    }
    return this.idLike.some((id) => id === "rhel" || id === "fedora");
  }

  isRHELFamily(): boolean {
    if (RHEL_FAMILY_IDS.has(this.id)) {
      return true;
    }
    return this.idLike.includes("rhel");
  }

  usesPackageFormatRPM(): boolean {
    return this.isRedHatFamily() || OTHER_RPM_IDS.has(this.id);
  }

  asFieldMap(): DistroFieldMap {
    return {
      id: this.id,
      name: this.name,
      version: this.version,
      lsb_release: this.lsbProperties,
      os_release: this.osProperties,
    };
  }

  /** JSON shape of the record; property maps are emitted with sorted keys. */
  toJSON(): LinuxDistroJSON {
    return {
      name: this.name,
      id: this.id,
      version: this.version,
      lsb_release: sortedProperties(this.lsbProperties),
      os_release: sortedProperties(this.osProperties),
    };
  }
}
