import * as fs from "fs";
import * as path from "path";
import * as os from "os";
import type { Sink } from "./output/writer.js";

/**
 * Create a temporary directory for tests
 */
export function createTempDir(prefix: string = "test"): string {
  const dir = path.join(os.tmpdir(), `codefeed-${prefix}-${Date.now()}-${Math.random().toString(36).slice(2)}`);
  fs.mkdirSync(dir, { recursive: true });
  return dir;
}

/**
 * Clean up a temporary directory
 */
export function cleanupTempDir(dir: string): void {
  if (dir.startsWith(os.tmpdir())) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
}

/**
 * Create a project structure from a file tree specification.
 * String contents are written as UTF-8, buffers as raw bytes.
 *
 * @example
 * createProjectStructure(tmpDir, {
 *   "src/index.ts": "export const main = 1;",
 *   "assets/logo.bin": Buffer.from([0x00, 0x01]),
 *   ".gitignore": "dist/\n"
 * });
 */
export function createProjectStructure(
  baseDir: string,
  files: Record<string, string | Buffer>
): void {
  for (const [relativePath, content] of Object.entries(files)) {
    const fullPath = path.join(baseDir, relativePath);
    const dir = path.dirname(fullPath);

    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }

    if (typeof content === "string") {
      fs.writeFileSync(fullPath, content, "utf-8");
    } else {
      fs.writeFileSync(fullPath, content);
    }
  }
}

/**
 * A sink that records every line for assertions
 */
export interface MemorySink extends Sink {
  stdout: string[];
  stderr: string[];
}

export function createMemorySink(): MemorySink {
  const stdout: string[] = [];
  const stderr: string[] = [];
  return {
    stdout,
    stderr,
    out: (text) => {
      stdout.push(text);
    },
    err: (text) => {
      stderr.push(text);
    },
  };
}
