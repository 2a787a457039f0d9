/**
 * Red Hat lineage detectors.
 *
 * /etc/redhat-release is shared text across this family, and Oracle Linux
 * ships one that claims to be Red Hat. Every detector that reads the
 * shared file asks the Oracle detector first and defers to it.
 */

import { MARKER_FILES } from "../constants.js";
import { prop } from "../parsers/key-value.js";
import {
  createDistro,
  fieldMatchDetector,
  matchReleaseFile,
  osReleaseHasVersionedId,
} from "./helpers.js";
import type { Detector, DistroIdentity } from "./types.js";

const ORACLE: DistroIdentity = { id: "ol", name: "Oracle Linux" };
const CENTOS: DistroIdentity = { id: "centos", name: "CentOS Linux" };
const RHEL: DistroIdentity = { id: "rhel", name: "Red Hat Enterprise Linux" };
const FEDORA: DistroIdentity = { id: "fedora", name: "Fedora" };
const SCIENTIFIC: DistroIdentity = { id: "scientific", name: "Scientific Linux" };
const YELLOW_DOG: DistroIdentity = { id: "yellow-dog", name: "Yellow Dog Linux" };

export const oracleLinuxDetector: Detector = {
  name: "oracle-linux",

  detect(ctx) {
    if (osReleaseHasVersionedId(ctx, ORACLE.id)) {
      return createDistro(ctx, ORACLE, prop(ctx.os, "VERSION_ID"));
    }

    const version = matchReleaseFile(ctx, [MARKER_FILES.oracle], "Oracle Linux");
    return version === null ? null : createDistro(ctx, ORACLE, version);
  },
};

export const centosDetector: Detector = {
  name: "centos",

  detect(ctx) {
    const oracle = oracleLinuxDetector.detect(ctx);
    if (oracle) {
      return oracle;
    }

    const version = matchReleaseFile(ctx, [MARKER_FILES.centos, MARKER_FILES.redhatRelease], "CentOS");
    return version === null ? null : createDistro(ctx, CENTOS, version);
  },
};

export const rhelDetector: Detector = {
  name: "rhel",

  detect(ctx) {
    if (osReleaseHasVersionedId(ctx, RHEL.id)) {
      return createDistro(ctx, RHEL, prop(ctx.os, "VERSION_ID"));
    }

    const oracle = oracleLinuxDetector.detect(ctx);
    if (oracle) {
      return oracle;
    }

    const version = matchReleaseFile(
      ctx,
      [MARKER_FILES.redhatRelease, MARKER_FILES.redhatVersion],
      "Red Hat Enterprise Linux"
    );
    return version === null ? null : createDistro(ctx, RHEL, version);
  },
};

export const fedoraDetector: Detector = {
  name: "fedora",

  detect(ctx) {
    if (prop(ctx.os, "ID") === FEDORA.id) {
      return createDistro(ctx, FEDORA, prop(ctx.os, "VERSION_ID"));
    }

    const oracle = oracleLinuxDetector.detect(ctx);
    if (oracle) {
      return oracle;
    }

    const version = matchReleaseFile(ctx, [MARKER_FILES.redhatRelease], "Fedora");
    return version === null ? null : createDistro(ctx, FEDORA, version);
  },
};

export const scientificLinuxDetector: Detector = {
  name: "scientific-linux",

  detect(ctx) {
    const oracle = oracleLinuxDetector.detect(ctx);
    if (oracle) {
      return oracle;
    }

    const version = matchReleaseFile(
      ctx,
      [MARKER_FILES.scientific, MARKER_FILES.redhatRelease],
      "Scientific Linux"
    );
    return version === null ? null : createDistro(ctx, SCIENTIFIC, version);
  },
};

export const yellowDogDetector: Detector = {
  name: "yellow-dog",

  detect(ctx) {
    const version = matchReleaseFile(ctx, [MARKER_FILES.yellowDog], "Yellow Dog Linux");
    return version === null ? null : createDistro(ctx, YELLOW_DOG, version);
  },
};

export const amazonLinuxDetector = fieldMatchDetector({
  name: "amazon-linux",
  identity: { id: "amzn", name: "Amazon Linux" },
  field: { from: "os", key: "ID" },
  equals: "amzn",
  version: { from: "os", key: "VERSION_ID" },
});
