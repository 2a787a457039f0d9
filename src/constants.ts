/**
 * Constants module for distroscope.
 *
 * Marker file locations and shared literals are defined here (SSOT).
 */

// === Version ===
export const VERSION = "1.0.0";

// === Naming ===
export const TOOL_NAME = "distroscope";
export const ENV_PREFIX = "DISTROSCOPE_";

// === Filesystem root ===
export const DEFAULT_FS_ROOT = "/";

// === Top-level release files ===
export const OS_RELEASE_PATH = "/etc/os-release";
export const LSB_RELEASE_PATH = "/etc/lsb-release";

// === Distro marker files ===
export const MARKER_FILES = {
  alpine: "/etc/alpine-release",
  android: "/system/build.prop",
  busyboxBinary: "/bin/true",
  centos: "/etc/centos-release",
  crux: "/usr/bin/crux",
  debianVersion: "/etc/debian_version",
  gentoo: "/etc/gentoo-release",
  issue: "/etc/issue",
  mxVersion: "/etc/mx-version",
  novell: "/etc/novell-release",
  oracle: "/etc/oracle-release",
  photon: "/etc/photon-release",
  redhatRelease: "/etc/redhat-release",
  redhatVersion: "/etc/redhat-version",
  scientific: "/etc/sl-release",
  slackware: "/etc/slackware-version",
  sles: "/etc/sles-release",
  sourceMage: "/etc/sourcemage-release",
  suse: "/etc/SuSE-release",
  yellowDog: "/etc/yellowdog-release",
} as const;

// === Result defaults ===
export const UNKNOWN_ID = "unknown";
export const UNKNOWN_NAME = "Unknown";
export const UNKNOWN_VERSION = "unknown";

// === Binary signature scanning ===
export const BUSYBOX_SIGNATURE = "BusyBox v";
export const BUSYBOX_MIN_VERSION_LENGTH = 6; // "1.32.0" and longer
export const SCAN_CHUNK_SIZE = 64 * 1024;
