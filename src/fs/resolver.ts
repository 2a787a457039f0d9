/**
 * File resolver: the single I/O choke point of distro detection.
 *
 * Given candidate paths in priority order, picks the first one that exists
 * and is not a directory, after re-rooting it under the configured
 * filesystem root (so detection can run against a mounted image).
 *
 * Absence is never an error for callers of the `read*` helpers: it is
 * reported as null. Read failures of a file that does exist are logged at
 * error level and also reported as null.
 */

import { posix } from "node:path";

import { DEFAULT_FS_ROOT } from "../constants.js";
import {
  FileReadError,
  NoReadableCandidateError,
  extractErrorDetails,
  isNotFoundError,
} from "../errors.js";
import { log } from "../logger.js";
import { NodeFileSource, type FileSource } from "./file-source.js";

/** A candidate that resolved to an existing file. */
export interface ResolvedFile {
  /** Path after applying the filesystem root. */
  readonly path: string;
  /** Whole contents as text. Throws FileReadError. */
  text(): string;
  /** Contents in chunks. Iteration throws FileReadError. */
  chunks(chunkSize: number): Iterable<Uint8Array>;
}

export class FileResolver {
  readonly source: FileSource;
  readonly root: string;
  private readonly rerooted: boolean;

  constructor(source: FileSource = new NodeFileSource(), root: string = DEFAULT_FS_ROOT) {
    this.source = source;
    this.root = root;
    this.rerooted = posix.normalize(root) !== posix.sep;
  }

  /**
   * Apply the filesystem root to an absolute candidate path.
   */
  resolvePath(candidate: string): string {
    if (!this.rerooted) {
      return candidate;
    }
    return posix.normalize(posix.join(this.root, candidate));
  }

  /**
   * Open the first candidate that is an existing non-directory entry.
   *
   * @throws NoReadableCandidateError if no candidate resolves.
   */
  open(candidates: readonly string[]): ResolvedFile {
    for (const candidate of candidates) {
      const path = this.resolvePath(candidate);
      if (this.isOpenable(path)) {
        return this.handle(path);
      }
    }
    throw new NoReadableCandidateError(candidates.map((c) => this.resolvePath(c)));
  }

  /**
   * Like open(), but returns null when nothing resolves.
   */
  tryOpen(...candidates: string[]): ResolvedFile | null {
    try {
      return this.open(candidates);
    } catch (e) {
      if (e instanceof NoReadableCandidateError) {
        return null;
      }
      throw e;
    }
  }

  /**
   * Check whether any candidate resolves, without reading it.
   */
  exists(...candidates: string[]): boolean {
    return this.tryOpen(...candidates) !== null;
  }

  /**
   * Read the first resolvable candidate as text.
   *
   * @returns Contents, or null when absent or unreadable.
   */
  readText(...candidates: string[]): string | null {
    const file = this.tryOpen(...candidates);
    if (!file) {
      return null;
    }

    try {
      return file.text();
    } catch (e) {
      log.error(extractErrorDetails(e));
      return null;
    }
  }

  private isOpenable(path: string): boolean {
    try {
      const kind = this.source.stat(path);
      return kind !== null && kind !== "directory";
    } catch (e) {
      if (!isNotFoundError(e)) {
        log.error(`unable to stat file (${path}): ${extractErrorDetails(e)}`);
      }
      return false;
    }
  }

  private handle(path: string): ResolvedFile {
    const source = this.source;

    return {
      path,
      text(): string {
        try {
          return source.readText(path);
        } catch (e) {
          throw new FileReadError(path, e);
        }
      },
      *chunks(chunkSize: number): Generator<Uint8Array> {
        try {
          yield* source.readChunks(path, chunkSize);
        } catch (e) {
          throw new FileReadError(path, e);
        }
      },
    };
  }
}
