/**
 * BusyBox detector.
 *
 * BusyBox is a set of statically linked tools rather than a distro, and
 * real distributions are often built on top of it. A system only counts
 * as BusyBox when it carries neither /etc/os-release nor /etc/lsb-release
 * and /bin/true embeds the "BusyBox v<version>" banner.
 */

import {
  BUSYBOX_MIN_VERSION_LENGTH,
  BUSYBOX_SIGNATURE,
  LSB_RELEASE_PATH,
  MARKER_FILES,
  OS_RELEASE_PATH,
  SCAN_CHUNK_SIZE,
} from "../constants.js";
import { extractErrorDetails } from "../errors.js";
import { log } from "../logger.js";
import { scanForSignatureVersion } from "../parsers/signature-scanner.js";
import { createDistro } from "./helpers.js";
import type { Detector } from "./types.js";

export const busyBoxDetector: Detector = {
  name: "busybox",

  detect(ctx) {
    if (ctx.files.exists(OS_RELEASE_PATH, LSB_RELEASE_PATH)) {
      return null;
    }

    const binary = ctx.files.tryOpen(MARKER_FILES.busyboxBinary);
    if (!binary) {
      return null;
    }

    let version: string | null;
    try {
      version = scanForSignatureVersion(binary.chunks(SCAN_CHUNK_SIZE), {
        signature: BUSYBOX_SIGNATURE,
        minVersionLength: BUSYBOX_MIN_VERSION_LENGTH,
      });
    } catch (e) {
      log.error(extractErrorDetails(e));
      return null;
    }

    if (version === null) {
      return null;
    }
    return createDistro(ctx, { id: "busybox", name: "BusyBox" }, `v${version}`);
  },
};
