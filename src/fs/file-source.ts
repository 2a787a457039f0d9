/**
 * File access capability used by every detector.
 *
 * Detection never touches `node:fs` directly: it goes through a FileSource
 * handed to the resolver, so tests can substitute canned file contents
 * (see memory-source.ts) without a real filesystem.
 *
 * Dependency direction:
 *   This module is a near-leaf module.
 *   It may be imported by: resolver.ts, memory-source.ts, classifier.ts
 */

import { closeSync, openSync, readFileSync, readSync, statSync } from "node:fs";

/** What kind of entry lives at a path. */
export type EntryKind = "file" | "directory" | "other";

/** Synchronous read-only access to files by absolute path. */
export interface FileSource {
  /** Kind of the entry at `path` (symlinks followed), or null when absent. */
  stat(path: string): EntryKind | null;
  /** Whole file as UTF-8 text. Throws on read failure. */
  readText(path: string): string;
  /**
   * File contents as successive chunks of at most `chunkSize` bytes.
   * A chunk is only valid until the next one is requested.
   * Abandoning the iteration early releases the underlying handle.
   */
  readChunks(path: string, chunkSize: number): Iterable<Uint8Array>;
}

/**
 * FileSource backed by the local filesystem.
 */
export class NodeFileSource implements FileSource {
  stat(path: string): EntryKind | null {
    const stats = statSync(path, { throwIfNoEntry: false });
    if (!stats) {
      return null;
    }
    if (stats.isFile()) {
      return "file";
    }
    return stats.isDirectory() ? "directory" : "other";
  }

  readText(path: string): string {
    return readFileSync(path, "utf-8");
  }

  *readChunks(path: string, chunkSize: number): Generator<Uint8Array> {
    const fd = openSync(path, "r");
    try {
      const buffer = Buffer.alloc(chunkSize);
      for (;;) {
        const bytesRead = readSync(fd, buffer, 0, chunkSize, null);
        if (bytesRead === 0) {
          return;
        }
        yield buffer.subarray(0, bytesRead);
      }
    } finally {
      closeSync(fd);
    }
  }
}
