/**
 * Tests for file sources and the candidate-path resolver
 * @module tests/resolver.test
 */

import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterAll, afterEach, beforeAll, beforeEach, describe, expect, it, vi, type MockInstance } from "vitest";

import { FileReadError, NoReadableCandidateError } from "../src/errors.js";
import { NodeFileSource, type EntryKind, type FileSource } from "../src/fs/file-source.js";
import { MemoryFileSource } from "../src/fs/memory-source.js";
import { FileResolver } from "../src/fs/resolver.js";

describe("FileResolver", () => {
  let errorSpy: MockInstance<typeof console.error>;

  beforeEach(() => {
    errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("open", () => {
    it("should return the first candidate that is a file", () => {
      const source = new MemoryFileSource({
        "/etc/redhat-release": null,
        "/etc/redhat-version": "Red Hat Enterprise Linux release 4",
      });
      const resolver = new FileResolver(source);

      const file = resolver.open(["/etc/missing", "/etc/redhat-release", "/etc/redhat-version"]);

      expect(file.path).toBe("/etc/redhat-version");
      expect(file.text()).toBe("Red Hat Enterprise Linux release 4");
    });

    it("should throw NoReadableCandidateError listing every candidate", () => {
      const resolver = new FileResolver(new MemoryFileSource({ "/etc/issue": null }));

      let caught: unknown;
      try {
        resolver.open(["/etc/issue", "/etc/missing"]);
      } catch (e) {
        caught = e;
      }

      expect(caught).toBeInstanceOf(NoReadableCandidateError);
      if (caught instanceof NoReadableCandidateError) {
        expect(caught.candidates).toEqual(["/etc/issue", "/etc/missing"]);
      }
    });

    it("should throw NoReadableCandidateError for an empty candidate list", () => {
      expect(() => new FileResolver(new MemoryFileSource()).open([])).toThrow(NoReadableCandidateError);
    });

    it("should skip a candidate whose stat fails and log it", () => {
      const failing: FileSource = {
        stat(path: string): EntryKind | null {
          if (path === "/etc/locked") {
            throw Object.assign(new Error("EACCES: permission denied"), { code: "EACCES" });
          }
          return "file";
        },
        readText: () => "ID=alpine\n",
        readChunks: () => [],
      };
      const resolver = new FileResolver(failing);

      expect(resolver.open(["/etc/locked", "/etc/os-release"]).path).toBe("/etc/os-release");
      expect(errorSpy).toHaveBeenCalledWith(
        expect.stringContaining("unable to stat file (/etc/locked): EACCES: permission denied")
      );
    });

    it("should wrap read failures in FileReadError", () => {
      const resolver = new FileResolver(new MemoryFileSource({ "/etc/os-release": new Error("boom") }));

      const file = resolver.open(["/etc/os-release"]);

      expect(() => file.text()).toThrow(FileReadError);
      expect(() => file.text()).toThrow("unable to read file (/etc/os-release): boom");
    });
  });

  describe("fsroot", () => {
    it("should resolve candidates under the root", () => {
      const source = new MemoryFileSource({ "/mnt/image/etc/os-release": "ID=alpine\n" });
      const resolver = new FileResolver(source, "/mnt/image");

      expect(resolver.resolvePath("/etc/os-release")).toBe("/mnt/image/etc/os-release");
      expect(resolver.readText("/etc/os-release")).toBe("ID=alpine\n");
      expect(source.readLog).toEqual(["/mnt/image/etc/os-release"]);
    });

    it("should normalise a trailing slash on the root", () => {
      expect(new FileResolver(new MemoryFileSource(), "/mnt/image/").resolvePath("/etc/issue")).toBe(
        "/mnt/image/etc/issue"
      );
    });

    it("should leave paths untouched for the default root", () => {
      expect(new FileResolver(new MemoryFileSource()).resolvePath("/etc/issue")).toBe("/etc/issue");
    });

    it("should not see files outside the root", () => {
      const resolver = new FileResolver(new MemoryFileSource({ "/etc/os-release": "ID=alpine\n" }), "/mnt/image");

      expect(resolver.exists("/etc/os-release")).toBe(false);
    });
  });

  describe("readText", () => {
    it("should return null when nothing resolves", () => {
      const resolver = new FileResolver(new MemoryFileSource());

      expect(resolver.readText("/etc/alpine-release")).toBeNull();
      expect(errorSpy).not.toHaveBeenCalled();
    });

    it("should log and return null when the file cannot be read", () => {
      const resolver = new FileResolver(new MemoryFileSource({ "/etc/issue": new Error("I/O error") }));

      expect(resolver.readText("/etc/issue")).toBeNull();
      expect(errorSpy).toHaveBeenCalledTimes(1);
      expect(errorSpy).toHaveBeenCalledWith(expect.stringContaining("unable to read file (/etc/issue): I/O error"));
    });
  });

  describe("exists", () => {
    it("should not read the file", () => {
      const source = new MemoryFileSource({ "/etc/os-release": "ID=arch\n" });

      expect(new FileResolver(source).exists("/etc/lsb-release", "/etc/os-release")).toBe(true);
      expect(source.readLog).toEqual([]);
    });
  });
});

describe("MemoryFileSource", () => {
  it("should report directories, files and absent paths", () => {
    const source = new MemoryFileSource({ "/etc": null, "/etc/issue": "Debian" });

    expect(source.stat("/etc")).toBe("directory");
    expect(source.stat("/etc/issue")).toBe("file");
    expect(source.stat("/etc/missing")).toBeNull();
  });

  it("should chunk contents", () => {
    const source = new MemoryFileSource({ "/bin/true": "abcdefg" });

    const chunks = [...source.readChunks("/bin/true", 3)].map((c) => new TextDecoder().decode(c));

    expect(chunks).toEqual(["abc", "def", "g"]);
  });

  it("should decode byte entries as text", () => {
    const source = new MemoryFileSource().set("/etc/issue", new TextEncoder().encode("Debian"));

    expect(source.readText("/etc/issue")).toBe("Debian");
  });
});

describe("NodeFileSource", () => {
  let root: string;

  beforeAll(() => {
    root = mkdtempSync(join(tmpdir(), "distroscope-"));
    mkdirSync(join(root, "etc", "issue"), { recursive: true });
    writeFileSync(join(root, "etc", "os-release"), 'NAME="Alpine Linux"\nID=alpine\nVERSION_ID=3.12.0\n');
  });

  afterAll(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it("should read files under a filesystem root", () => {
    const resolver = new FileResolver(new NodeFileSource(), root);

    expect(resolver.readText("/etc/os-release")).toBe('NAME="Alpine Linux"\nID=alpine\nVERSION_ID=3.12.0\n');
  });

  it("should treat directories as not readable", () => {
    const resolver = new FileResolver(new NodeFileSource(), root);

    expect(resolver.exists("/etc/issue")).toBe(false);
    expect(resolver.exists("/etc/lsb-release")).toBe(false);
  });

  it("should stream a file in chunks", () => {
    const source = new NodeFileSource();
    const decoder = new TextDecoder();

    let text = "";
    for (const chunk of source.readChunks(join(root, "etc", "os-release"), 5)) {
      text += decoder.decode(chunk, { stream: true });
    }

    expect(text).toBe('NAME="Alpine Linux"\nID=alpine\nVERSION_ID=3.12.0\n');
  });
});
