/**
 * In-memory FileSource for deterministic detection runs.
 *
 * Maps absolute paths to canned contents:
 *   - string / Uint8Array: a regular file
 *   - null: a directory
 *   - Error: a file that exists but fails to read
 *
 * Usage:
 *   const source = new MemoryFileSource({
 *     "/etc/redhat-release": "Red Hat Enterprise Linux Server release 7.6 (Maipo)\n",
 *   });
 */

import type { EntryKind, FileSource } from "./file-source.js";

export type MemoryEntry = string | Uint8Array | Error | null;

export class MemoryFileSource implements FileSource {
  private readonly entries: Map<string, MemoryEntry>;
  private readonly reads: string[] = [];

  constructor(entries: Record<string, MemoryEntry> = {}) {
    this.entries = new Map(Object.entries(entries));
  }

  /** Paths passed to readText/readChunks, in call order. */
  get readLog(): readonly string[] {
    return this.reads;
  }

  /** Add or replace an entry. */
  set(path: string, entry: MemoryEntry): this {
    this.entries.set(path, entry);
    return this;
  }

  stat(path: string): EntryKind | null {
    if (!this.entries.has(path)) {
      return null;
    }
    return this.entries.get(path) === null ? "directory" : "file";
  }

  readText(path: string): string {
    const entry = this.read(path);
    return typeof entry === "string" ? entry : new TextDecoder().decode(entry);
  }

  *readChunks(path: string, chunkSize: number): Generator<Uint8Array> {
    const entry = this.read(path);
    const bytes = typeof entry === "string" ? new TextEncoder().encode(entry) : entry;

    for (let offset = 0; offset < bytes.length; offset += chunkSize) {
      yield bytes.subarray(offset, offset + chunkSize);
    }
  }

  private read(path: string): string | Uint8Array {
    this.reads.push(path);
    const entry = this.entries.get(path);

    if (entry === undefined) {
      throw Object.assign(new Error(`ENOENT: no such file or directory, open '${path}'`), {
        code: "ENOENT",
      });
    }
    if (entry === null) {
      throw Object.assign(new Error(`EISDIR: illegal operation on a directory, read '${path}'`), {
        code: "EISDIR",
      });
    }
    if (entry instanceof Error) {
      throw entry;
    }
    return entry;
  }
}
