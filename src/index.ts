/**
 * distroscope - identify the Linux distribution of a system or mounted image.
 *
 * This is the main entry point for the distroscope npm package.
 */

// Re-export main types and functions
export { VERSION } from "./constants.js";
export { Classifier, detectDistro, type ClassifierOptions } from "./classifier.js";
export { bestGuess } from "./fallback.js";
export {
  LinuxDistro,
  DISTRO_FIELDS,
  FIELD_LABELS,
  REDHAT_FAMILY_IDS,
  RHEL_FAMILY_IDS,
  type DistroField,
  type DistroFieldMap,
  type LinuxDistroInit,
  type LinuxDistroJSON,
} from "./distro.js";
export { DETECTORS, detectorNames, type DetectionContext, type Detector, type DistroIdentity } from "./detectors/index.js";
export {
  DistroscopeError,
  NoReadableCandidateError,
  FileReadError,
  ConfigError,
  ValidationError,
} from "./errors.js";
export { NodeFileSource, type EntryKind, type FileSource } from "./fs/file-source.js";
export { MemoryFileSource, type MemoryEntry } from "./fs/memory-source.js";
export { FileResolver, type ResolvedFile } from "./fs/resolver.js";
export { parseKeyValue, parseKeyValueLines, splitKeyValue, prop, type PropertyMap } from "./parsers/key-value.js";
export { parseReleaseLine } from "./parsers/release-line.js";
export { SignatureScanner, scanForSignatureVersion, type SignatureScannerOptions } from "./parsers/signature-scanner.js";
export { formatDistro, formatFamily, OUTPUT_FORMATS, type FormatOptions, type OutputFormat } from "./output.js";
export { LogLevel, setLogLevel } from "./logger.js";
