/**
 * Debian lineage detectors.
 *
 * MX Linux ships genuine Debian marker files, so the Debian detector asks
 * the MX detector first and defers to it.
 */

import { MARKER_FILES } from "../constants.js";
import { prop } from "../parsers/key-value.js";
import { createDistro, fieldMatchDetector } from "./helpers.js";
import type { Detector, DistroIdentity } from "./types.js";

const MX: DistroIdentity = { id: "mx", name: "MX Linux" };
const DEBIAN: DistroIdentity = { id: "debian", name: "Debian GNU/Linux" };

/** "MX-19.2_ahs_x64 patito feo May 31, 2020" -> ("MX", "19.2") */
const MX_VERSION_PATTERN = /(\S+)-([0-9.]+)/;

export const mxLinuxDetector: Detector = {
  name: "mx-linux",

  detect(ctx) {
    if (prop(ctx.lsb, "DISTRIB_ID") === "MX") {
      return createDistro(ctx, MX, prop(ctx.lsb, "DISTRIB_RELEASE"));
    }

    const contents = ctx.files.readText(MARKER_FILES.mxVersion);
    if (contents === null) {
      return null;
    }

    const match = MX_VERSION_PATTERN.exec(contents);
    if (match?.[1] !== "MX" || match[2] === undefined) {
      return null;
    }
    return createDistro(ctx, MX, match[2]);
  },
};

export const debianDetector: Detector = {
  name: "debian",

  detect(ctx) {
    const mx = mxLinuxDetector.detect(ctx);
    if (mx) {
      return mx;
    }

    const versionContents = ctx.files.readText(MARKER_FILES.debianVersion);
    if (versionContents === null) {
      return null;
    }

    // Derivatives such as Ubuntu keep /etc/debian_version but brand /etc/issue
    const issue = ctx.files.readText(MARKER_FILES.issue);
    if (issue !== null && !issue.startsWith("Debian")) {
      return null;
    }

    const osId = prop(ctx.os, "ID");
    if (osId !== "" && osId !== DEBIAN.id) {
      return null;
    }

    return createDistro(ctx, DEBIAN, versionContents.trim());
  },
};

export const ubuntuDetector = fieldMatchDetector({
  name: "ubuntu",
  identity: { id: "ubuntu", name: "Ubuntu" },
  field: { from: "lsb", key: "DISTRIB_ID" },
  equals: "Ubuntu",
  version: { from: "lsb", key: "DISTRIB_RELEASE" },
});

export const linuxMintDetector = fieldMatchDetector({
  name: "linux-mint",
  identity: { id: "linuxmint", name: "Linux Mint" },
  field: { from: "lsb", key: "DISTRIB_ID" },
  equals: "LinuxMint",
  version: { from: "lsb", key: "DISTRIB_RELEASE" },
});

export const kaliDetector = fieldMatchDetector({
  name: "kali",
  identity: { id: "kali", name: "Kali GNU/Linux" },
  field: { from: "os", key: "ID" },
  equals: "kali",
  version: { from: "os", key: "VERSION_ID" },
});

export const puppyDetector: Detector = {
  name: "puppy",

  detect(ctx) {
    if (prop(ctx.lsb, "DISTRIB_ID") !== "Puppy") {
      return null;
    }
    const version = prop(ctx.os, "VERSION_ID") || prop(ctx.lsb, "DISTRIB_RELEASE");
    return createDistro(ctx, { id: "puppy", name: "Puppy Linux" }, version);
  },
};
