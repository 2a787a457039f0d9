/**
 * SUSE lineage detectors.
 *
 * Legacy SUSE release files open with a free-text header followed by
 * "KEY = VALUE" lines; the version comes from the VERSION line.
 */

import { MARKER_FILES } from "../constants.js";
import { prop } from "../parsers/key-value.js";
import { createDistro, matchPrefixedKeyValueFile } from "./helpers.js";
import type { Detector, DistroIdentity } from "./types.js";

const OPENSUSE: DistroIdentity = { id: "opensuse", name: "openSUSE" };
const SLES: DistroIdentity = { id: "sles", name: "SUSE Linux" };
const NOVELL_OES: DistroIdentity = { id: "oes", name: "Novell Open Enterprise Server" };

export const openSuseDetector: Detector = {
  name: "opensuse",

  detect(ctx) {
    if (prop(ctx.os, "ID") === OPENSUSE.id) {
      return createDistro(ctx, OPENSUSE, prop(ctx.os, "VERSION_ID"));
    }

    const version = matchPrefixedKeyValueFile(ctx, [MARKER_FILES.suse], "openSUSE");
    return version === null ? null : createDistro(ctx, OPENSUSE, version);
  },
};

export const slesDetector: Detector = {
  name: "sles",

  detect(ctx) {
    if (prop(ctx.os, "ID") === SLES.id) {
      return createDistro(ctx, SLES, prop(ctx.os, "VERSION_ID"));
    }

    const version = matchPrefixedKeyValueFile(ctx, [MARKER_FILES.suse, MARKER_FILES.sles], "SUSE Linux");
    return version === null ? null : createDistro(ctx, SLES, version);
  },
};

export const novellOesDetector: Detector = {
  name: "novell-oes",

  detect(ctx) {
    const version = matchPrefixedKeyValueFile(ctx, [MARKER_FILES.novell], "Novell Open Enterprise Server");
    return version === null ? null : createDistro(ctx, NOVELL_OES, version);
  },
};
