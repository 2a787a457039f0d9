/**
 * Distro Detectors
 *
 * Central entry point for all distro detectors, in evaluation order.
 *
 * Order encodes precedence between distributions that share marker files:
 *   - CentOS runs before the other readers of /etc/redhat-release.
 *   - The Red Hat family detectors defer to Oracle Linux themselves, so the
 *     Oracle entry further down only catches systems the others missed.
 *   - Debian defers to MX Linux itself.
 *   - BusyBox is last: its heuristic would claim any minimal system that
 *     merely lacks release files.
 */

import { busyBoxDetector } from "./busybox.js";
import { debianDetector, kaliDetector, linuxMintDetector, mxLinuxDetector, puppyDetector, ubuntuDetector } from "./debian.js";
import {
  amazonLinuxDetector,
  centosDetector,
  fedoraDetector,
  oracleLinuxDetector,
  rhelDetector,
  scientificLinuxDetector,
  yellowDogDetector,
} from "./redhat.js";
import {
  alpineDetector,
  altLinuxDetector,
  androidDetector,
  archLinuxDetector,
  clearLinuxDetector,
  cruxDetector,
  gentooDetector,
  mageiaDetector,
  nixOsDetector,
  photonDetector,
  rancherOsDetector,
  slackwareDetector,
  sourceMageDetector,
} from "./standalone.js";
import { novellOesDetector, openSuseDetector, slesDetector } from "./suse.js";
import type { Detector } from "./types.js";

/**
 * All detectors in evaluation order
 */
export const DETECTORS: readonly Detector[] = Object.freeze([
  centosDetector,
  rhelDetector,
  ubuntuDetector,
  debianDetector,
  amazonLinuxDetector,
  fedoraDetector,
  openSuseDetector,
  slesDetector,
  oracleLinuxDetector,
  photonDetector,
  alpineDetector,
  archLinuxDetector,
  gentooDetector,
  kaliDetector,
  scientificLinuxDetector,
  slackwareDetector,
  mageiaDetector,
  clearLinuxDetector,
  linuxMintDetector,
  mxLinuxDetector,
  novellOesDetector,
  puppyDetector,
  rancherOsDetector,
  nixOsDetector,
  altLinuxDetector,
  cruxDetector,
  sourceMageDetector,
  androidDetector,
  yellowDogDetector,
  busyBoxDetector,
]);

/**
 * Names of `detectors`, in order.
 */
export function detectorNames(detectors: readonly Detector[] = DETECTORS): string[] {
  return detectors.map((d) => d.name);
}

// Re-export all individual detectors for direct access
export {
  alpineDetector,
  altLinuxDetector,
  amazonLinuxDetector,
  androidDetector,
  archLinuxDetector,
  busyBoxDetector,
  centosDetector,
  clearLinuxDetector,
  cruxDetector,
  debianDetector,
  fedoraDetector,
  gentooDetector,
  kaliDetector,
  linuxMintDetector,
  mageiaDetector,
  mxLinuxDetector,
  nixOsDetector,
  novellOesDetector,
  openSuseDetector,
  oracleLinuxDetector,
  photonDetector,
  puppyDetector,
  rancherOsDetector,
  rhelDetector,
  scientificLinuxDetector,
  slackwareDetector,
  slesDetector,
  sourceMageDetector,
  ubuntuDetector,
  yellowDogDetector,
};
export type { DetectionContext, Detector, DistroIdentity } from "./types.js";
