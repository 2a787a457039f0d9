/**
 * Detectors for independent distributions that nothing else impersonates.
 */

import { MARKER_FILES, UNKNOWN_VERSION } from "../constants.js";
import { parseKeyValue, prop } from "../parsers/key-value.js";
import { parseReleaseLine } from "../parsers/release-line.js";
import {
  createDistro,
  fieldMatchDetector,
  matchReleaseFile,
  osReleaseHasVersionedId,
  scanLines,
} from "./helpers.js";
import type { Detector, DistroIdentity } from "./types.js";

const ALPINE: DistroIdentity = { id: "alpine", name: "Alpine Linux" };
const GENTOO: DistroIdentity = { id: "gentoo", name: "Gentoo" };
const PHOTON: DistroIdentity = { id: "photon", name: "VMware Photon" };
const SLACKWARE: DistroIdentity = { id: "slackware", name: "Slackware" };
const CRUX: DistroIdentity = { id: "crux", name: "CRUX" };
const SOURCE_MAGE: DistroIdentity = { id: "sourcemage", name: "Source Mage GNU/Linux" };
const ANDROID: DistroIdentity = { id: "android", name: "Android" };

/** `echo "CRUX version 3.0"` inside /usr/bin/crux */
const CRUX_VERSION_PATTERN = /\s*echo "CRUX version ([0-9.]+)"\s*/;

/** "... chroot image (Grimoire 0.62-stable) generated on ..." */
const SOURCE_MAGE_VERSION_PATTERN = /.*\((.+)\).*/;

export const alpineDetector: Detector = {
  name: "alpine",

  detect(ctx) {
    if (prop(ctx.os, "ID") === ALPINE.id) {
      return createDistro(ctx, ALPINE, prop(ctx.os, "VERSION_ID"));
    }

    const contents = ctx.files.readText(MARKER_FILES.alpine);
    return contents === null ? null : createDistro(ctx, ALPINE, contents.trim());
  },
};

export const archLinuxDetector = fieldMatchDetector({
  name: "arch-linux",
  identity: { id: "arch", name: "Arch Linux" },
  field: { from: "os", key: "ID" },
  equals: "arch",
  version: { from: "literal", value: "rolling" },
});

export const gentooDetector: Detector = {
  name: "gentoo",

  detect(ctx) {
    if (prop(ctx.os, "ID") !== GENTOO.id) {
      return null;
    }

    const contents = ctx.files.readText(MARKER_FILES.gentoo);
    const version = contents === null ? null : parseReleaseLine(contents, "Gentoo");
    return createDistro(ctx, GENTOO, version ?? UNKNOWN_VERSION);
  },
};

export const photonDetector: Detector = {
  name: "photon",

  detect(ctx) {
    if (osReleaseHasVersionedId(ctx, PHOTON.id)) {
      return createDistro(ctx, PHOTON, prop(ctx.os, "VERSION_ID"));
    }

    const version = matchReleaseFile(ctx, [MARKER_FILES.photon], "VMware Photon Linux");
    return version === null ? null : createDistro(ctx, PHOTON, version);
  },
};

export const slackwareDetector: Detector = {
  name: "slackware",

  detect(ctx) {
    if (osReleaseHasVersionedId(ctx, SLACKWARE.id)) {
      return createDistro(ctx, SLACKWARE, prop(ctx.os, "VERSION_ID"));
    }

    const contents = ctx.files.readText(MARKER_FILES.slackware);
    if (contents === null || !contents.startsWith("Slackware")) {
      return null;
    }

    // "Slackware 14.1"
    const line = contents.trim();
    const space = line.indexOf(" ");
    const version = space === -1 ? UNKNOWN_VERSION : line.slice(space + 1).trim();
    return createDistro(ctx, SLACKWARE, version);
  },
};

export const mageiaDetector = fieldMatchDetector({
  name: "mageia",
  identity: { id: "mageia", name: "Mageia" },
  field: { from: "os", key: "ID" },
  equals: "mageia",
  version: { from: "os", key: "VERSION" },
});

export const clearLinuxDetector = fieldMatchDetector({
  name: "clear-linux",
  identity: { id: "clear-linux-os", name: "Clear Linux OS" },
  field: { from: "os", key: "ID" },
  equals: "clear-linux-os",
  version: { from: "os", key: "VERSION_ID" },
});

export const rancherOsDetector = fieldMatchDetector({
  name: "rancheros",
  identity: { id: "rancheros", name: "RancherOS" },
  field: { from: "os", key: "ID" },
  equals: "rancheros",
  version: { from: "os", key: "VERSION_ID" },
});

export const nixOsDetector = fieldMatchDetector({
  name: "nixos",
  identity: { id: "nixos", name: "NixOS" },
  field: { from: "os", key: "ID" },
  equals: "nixos",
  version: { from: "os", key: "VERSION_ID" },
});

export const altLinuxDetector = fieldMatchDetector({
  name: "alt-linux",
  identity: { id: "altlinux", name: "ALT Starterkit" },
  field: { from: "os", key: "ID" },
  equals: "altlinux",
  version: { from: "os", key: "VERSION_ID" },
});

export const cruxDetector: Detector = {
  name: "crux",

  detect(ctx) {
    const contents = ctx.files.readText(MARKER_FILES.crux);
    if (contents === null) {
      return null;
    }
    return createDistro(ctx, CRUX, scanLines(contents, CRUX_VERSION_PATTERN) ?? UNKNOWN_VERSION);
  },
};

export const sourceMageDetector: Detector = {
  name: "source-mage",

  detect(ctx) {
    const contents = ctx.files.readText(MARKER_FILES.sourceMage);
    if (contents === null) {
      return null;
    }
    return createDistro(ctx, SOURCE_MAGE, scanLines(contents, SOURCE_MAGE_VERSION_PATTERN) ?? UNKNOWN_VERSION);
  },
};

export const androidDetector: Detector = {
  name: "android",

  detect(ctx) {
    const contents = ctx.files.readText(MARKER_FILES.android);
    if (contents === null) {
      return null;
    }

    const buildProps = parseKeyValue(contents);
    const version =
      prop(buildProps, "ro.com.google.gmsversion") ||
      prop(buildProps, "ro.build.version.release") ||
      UNKNOWN_VERSION;
    return createDistro(ctx, ANDROID, version);
  },
};
