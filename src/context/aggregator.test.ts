import { describe, it, expect, afterEach } from "vitest";
import * as fs from "fs";
import * as path from "path";
import { feed } from "./aggregator.js";
import { walkDirectory, type Walker } from "./traversal.js";
import type { Limits } from "./limiter.js";
import { FatalError } from "../errors.js";
import { createTempDir, cleanupTempDir, createProjectStructure } from "../test-utils.js";

const DEFAULT_LIMITS: Limits = {
  maxFiles: 10000,
  maxTotalSize: 104857600,
  maxFileSize: 1048576,
};

describe("feed", () => {
  let tmpDir: string;

  function project(files: Record<string, string | Buffer>): string {
    tmpDir = createTempDir("feed");
    createProjectStructure(tmpDir, files);
    return tmpDir;
  }

  afterEach(() => {
    cleanupTempDir(tmpDir);
  });

  it("admits a single small text file", () => {
    const root = project({ "hello.txt": "0123456789" });

    const result = feed({ root, limits: DEFAULT_LIMITS });

    expect(result.tree).toBe(`└── ${path.basename(root)}\n└── hello.txt`);
    expect(result.files).toEqual([
      {
        path: path.join(root, "hello.txt"),
        relativePath: "hello.txt",
        content: "0123456789",
        size: 10,
      },
    ]);
    expect(result.skipped).toEqual([]);
    expect(result.totals).toEqual({ filesAdmitted: 1, bytesAdmitted: 10 });
  });

  it("lists binary files in the tree without storing them", () => {
    const root = project({ "blob.bin": Buffer.from([0x41, 0x00, 0x42]) });

    const result = feed({ root, limits: DEFAULT_LIMITS });

    expect(result.tree).toBe(`└── ${path.basename(root)}\n└── blob.bin [Non-text file]`);
    expect(result.files).toEqual([]);
    expect(result.skipped).toEqual([]);
    expect(result.binaryFiles).toEqual([path.join(root, "blob.bin")]);
    expect(result.totals).toEqual({ filesAdmitted: 0, bytesAdmitted: 0 });
  });

  it("skips files past the file count limit", () => {
    const root = project({ "a.txt": "first", "b.txt": "second" });

    const result = feed({ root, limits: { ...DEFAULT_LIMITS, maxFiles: 1 } });

    expect(result.files.map((f) => f.relativePath)).toEqual(["a.txt"]);
    expect(result.skipped).toEqual([
      {
        path: path.join(root, "b.txt"),
        reason: "file-count-limit",
        message: `Skipping file ${path.join(root, "b.txt")}: Maximum file limit (1) reached`,
      },
    ]);
    expect(result.tree).toBe(`└── ${path.basename(root)}\n└── a.txt`);
  });

  it("skips files over the per-file size limit without touching totals", () => {
    const root = project({ "big.txt": "0123456789" });

    const result = feed({ root, limits: { ...DEFAULT_LIMITS, maxFileSize: 4 } });

    expect(result.skipped).toEqual([
      {
        path: path.join(root, "big.txt"),
        reason: "per-file-size-limit",
        message: `Skipping file ${path.join(root, "big.txt")}: File exceeds maximum size (4 bytes)`,
      },
    ]);
    expect(result.totals).toEqual({ filesAdmitted: 0, bytesAdmitted: 0 });
    expect(result.tree).toBe(`└── ${path.basename(root)}`);
  });

  it("rejects a first file that alone exceeds the total size limit", () => {
    const root = project({ "first.txt": "0123456789" });

    const result = feed({ root, limits: { ...DEFAULT_LIMITS, maxTotalSize: 5 } });

    expect(result.skipped).toEqual([
      {
        path: path.join(root, "first.txt"),
        reason: "total-size-limit",
        message: `Skipping file ${path.join(root, "first.txt")}: Total size limit (5 bytes) reached`,
      },
    ]);
    expect(result.files).toEqual([]);
  });

  it("formats size limits in KB and MB", () => {
    const root = project({ "a.txt": "x".repeat(2048), "b.txt": "y" });

    const result = feed({
      root,
      limits: { maxFiles: 10, maxTotalSize: 2 * 1024 * 1024, maxFileSize: 1536 },
    });

    expect(result.skipped.map((s) => s.message)).toEqual([
      `Skipping file ${path.join(root, "a.txt")}: File exceeds maximum size (1.50 KB)`,
    ]);

    const second = feed({
      root,
      limits: { maxFiles: 10, maxTotalSize: 2048, maxFileSize: 4096 },
    });

    expect(second.skipped.map((s) => s.message)).toEqual([
      `Skipping file ${path.join(root, "b.txt")}: Total size limit (2.00 KB) reached`,
    ]);
  });

  it("records invalid UTF-8 as a read error and commits nothing for it", () => {
    const root = project({
      "bad.txt": Buffer.from([0x66, 0x6f, 0xff, 0x6f]),
      "ok.txt": "fine",
    });

    const result = feed({ root, limits: DEFAULT_LIMITS });

    expect(result.skipped).toHaveLength(1);
    expect(result.skipped[0].reason).toBe("read-error");
    expect(result.skipped[0].message.startsWith(`Error reading file ${path.join(root, "bad.txt")}: `)).toBe(
      true
    );
    expect(result.totals).toEqual({ filesAdmitted: 1, bytesAdmitted: 4 });
    expect(result.tree).toBe(`└── ${path.basename(root)}\n└── ok.txt`);
  });

  it("keeps a leading byte order mark in the content", () => {
    const root = project({ "bom.txt": "\uFEFFhi" });

    const result = feed({ root, limits: DEFAULT_LIMITS });

    expect(result.files[0].content).toBe("\uFEFFhi");
    expect(result.totals.bytesAdmitted).toBe(5);
  });

  it("renders nested directories with indentation", () => {
    const root = project({
      "README.md": "z",
      "src/lib/util.ts": "x",
      "src/main.ts": "y",
    });

    const result = feed({ root, limits: DEFAULT_LIMITS });

    expect(result.tree).toBe(
      [
        `└── ${path.basename(root)}`,
        "└── README.md",
        "├── src",
        "    ├── lib",
        "        └── util.ts",
        "    └── main.ts",
      ].join("\n")
    );
    expect(result.files.map((f) => f.relativePath)).toEqual([
      "README.md",
      path.join("src", "lib", "util.ts"),
      path.join("src", "main.ts"),
    ]);
    expect(result.directories).toBe(2);
  });

  it("never limits directories", () => {
    const root = project({ "a/one.txt": "1", "b/two.txt": "2" });

    const result = feed({ root, limits: { maxFiles: 0, maxTotalSize: 0, maxFileSize: 0 } });

    expect(result.tree).toBe(`└── ${path.basename(root)}\n├── a\n├── b`);
    expect(result.skipped.map((s) => s.reason)).toEqual(["file-count-limit", "file-count-limit"]);
  });

  it("records a stat failure as a read error", () => {
    const root = project({});
    const ghost = path.join(root, "ghost.txt");
    const walker: Walker = (r) => [
      { path: r, kind: "directory", depth: 0 },
      { path: ghost, kind: "file", depth: 1 },
    ];

    const result = feed({ root, limits: DEFAULT_LIMITS, walker });

    expect(result.skipped).toHaveLength(1);
    expect(result.skipped[0].reason).toBe("read-error");
    expect(result.skipped[0].message.startsWith(`Failed to get metadata for file ${ghost}: `)).toBe(true);
    expect(result.tree).toBe(`└── ${path.basename(root)}`);
  });

  it("records a classification failure without committing anything", () => {
    const root = project({});
    const sub = path.join(root, "sub");
    fs.mkdirSync(sub);
    // stat succeeds on the directory, reading its first bytes does not
    const walker: Walker = (r) => [
      { path: r, kind: "directory", depth: 0 },
      { path: sub, kind: "file", depth: 1 },
    ];

    const result = feed({ root, limits: DEFAULT_LIMITS, walker });

    expect(result.skipped).toHaveLength(1);
    expect(result.skipped[0].path).toBe(sub);
    expect(result.skipped[0].reason).toBe("classification-error");
    expect(result.skipped[0].message.startsWith(`Error checking if file is text ${sub}: `)).toBe(true);
    expect(result.tree).toBe(`└── ${path.basename(root)}`);
    expect(result.files).toEqual([]);
    expect(result.binaryFiles).toEqual([]);
    expect(result.totals).toEqual({ filesAdmitted: 0, bytesAdmitted: 0 });
  });

  it("throws FatalError for an entry outside the root", () => {
    const root = project({});
    const walker: Walker = (r) => [
      { path: r, kind: "directory", depth: 0 },
      { path: path.join(path.dirname(r), "elsewhere.txt"), kind: "file", depth: 1 },
    ];

    expect(() => feed({ root, limits: DEFAULT_LIMITS, walker })).toThrow(FatalError);
  });

  it("records walker errors as read errors", () => {
    const root = project({});
    const walker: Walker = (r, options) => {
      options.onError(path.join(r, "locked"), new Error("EACCES: permission denied"));
      return [{ path: r, kind: "directory", depth: 0 }];
    };

    const result = feed({ root, limits: DEFAULT_LIMITS, walker });

    expect(result.skipped).toEqual([
      {
        path: path.join(root, "locked"),
        reason: "read-error",
        message: `Error reading ${path.join(root, "locked")}: EACCES: permission denied`,
      },
    ]);
  });

  describe("run invariants", () => {
    const files = {
      "a.txt": "alpha",
      "b.bin": Buffer.from([0x00, 0x01, 0x02]),
      "c.txt": "charlie charlie",
      "d/e.txt": "echo",
      "d/f.txt": "x".repeat(40),
      "g.txt": "golf",
    };
    const limits: Limits = { maxFiles: 3, maxTotalSize: 30, maxFileSize: 20 };

    it("keeps totals consistent with stored content and within limits", () => {
      const root = project(files);

      const result = feed({ root, limits });
      const storedBytes = result.files.reduce((sum, f) => sum + Buffer.byteLength(f.content), 0);

      expect(result.totals.bytesAdmitted).toBe(storedBytes);
      expect(result.totals.filesAdmitted).toBe(result.files.length);
      expect(result.totals.filesAdmitted).toBeLessThanOrEqual(limits.maxFiles);
      expect(result.totals.bytesAdmitted).toBeLessThanOrEqual(limits.maxTotalSize);
      expect(result.files.every((f) => f.size <= limits.maxFileSize)).toBe(true);
    });

    it("accounts for every entry exactly once", () => {
      const root = project(files);
      let yielded = 0;
      const counting: Walker = (r, options) => {
        const entries = [...walkDirectory(r, options)];
        yielded = entries.length;
        return entries;
      };

      const result = feed({ root, limits, walker: counting });

      expect(1 + result.directories + result.files.length + result.binaryFiles.length + result.skipped.length).toBe(
        yielded
      );
    });

    it("admits the expected files in order", () => {
      const root = project(files);

      const result = feed({ root, limits });

      // a(5) + c(15) + e(4) fill the count; f and g hit the file count limit
      expect(result.files.map((f) => f.relativePath)).toEqual(["a.txt", "c.txt", path.join("d", "e.txt")]);
      expect(result.skipped.map((s) => s.reason)).toEqual(["file-count-limit", "file-count-limit"]);
    });

    it("produces identical output on repeated runs", () => {
      const root = project(files);

      const first = feed({ root, limits });
      const second = feed({ root, limits });

      expect(second.tree).toBe(first.tree);
      expect(second.files.map((f) => f.content)).toEqual(first.files.map((f) => f.content));
    });
  });
});
