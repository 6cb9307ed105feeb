import * as fs from "fs";
import * as path from "path";
import { describeError, FatalError } from "../errors.js";
import { formatSize } from "../utils/format.js";
import { isTextFile } from "./classifier.js";
import { Limiter, type LimitReason, type Limits, type RunningTotals } from "./limiter.js";
import { walkDirectory, type Entry, type Walker } from "./traversal.js";
import { TreeRenderer } from "./tree.js";

export type SkipReason = LimitReason | "read-error" | "classification-error";

/**
 * A file that passed every check, with its content decoded as UTF-8.
 * `size` is the on-disk byte length used for admission.
 */
export interface AdmittedFile {
  path: string;
  relativePath: string;
  content: string;
  size: number;
}

export interface SkipRecord {
  path: string;
  reason: SkipReason;
  message: string;
}

export interface FeedOptions {
  root: string;
  limits: Limits;
  /** Entry source; defaults to the ignore-aware directory walker */
  walker?: Walker;
}

export interface FeedResult {
  root: string;
  /** Rendered tree, trailing whitespace trimmed */
  tree: string;
  /** Admitted files in traversal order */
  files: AdmittedFile[];
  /** Skipped files and unreadable directories in traversal order */
  skipped: SkipRecord[];
  /** Files classified as binary, listed in the tree but not stored */
  binaryFiles: string[];
  /** Directories rendered below the root */
  directories: number;
  totals: RunningTotals;
  /** performance.now() at the start of the run */
  startedAt: number;
}

const decoder = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

/**
 * Read a whole file as strict UTF-8. Invalid byte sequences throw.
 */
function readFileContent(filePath: string): string {
  return decoder.decode(fs.readFileSync(filePath));
}

function limitMessage(filePath: string, reason: LimitReason, limits: Limits): string {
  switch (reason) {
    case "file-count-limit":
      return `Skipping file ${filePath}: Maximum file limit (${limits.maxFiles}) reached`;
    case "total-size-limit":
      return `Skipping file ${filePath}: Total size limit (${formatSize(limits.maxTotalSize)}) reached`;
    case "per-file-size-limit":
      return `Skipping file ${filePath}: File exceeds maximum size (${formatSize(limits.maxFileSize)})`;
  }
}

/**
 * Path of an entry relative to the root. A path outside the root means the
 * walker broke its contract, which is fatal.
 */
function relativeToRoot(root: string, entry: Entry): string {
  const relative = path.relative(root, entry.path);
  const outside =
    relative === ".." || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative);
  if (relative === "" || outside) {
    throw new FatalError(`Failed to strip prefix for ${entry.kind}: ${entry.path}`);
  }
  return relative;
}

/**
 * Walk the root once and collect everything that fits the limits.
 *
 * Per file: stat, admit against the limits, classify, then read. Totals are
 * committed only after the content has been read and decoded, so a file that
 * fails late never counts toward them.
 */
export function feed(options: FeedOptions): FeedResult {
  const startedAt = performance.now();
  const root = path.resolve(options.root);
  const walker = options.walker ?? walkDirectory;

  const limiter = new Limiter(options.limits);
  const limits = limiter.getLimits();
  const tree = new TreeRenderer();

  const files: AdmittedFile[] = [];
  const skipped: SkipRecord[] = [];
  const binaryFiles: string[] = [];
  let directories = 0;

  const skip = (filePath: string, reason: SkipReason, message: string): void => {
    skipped.push({ path: filePath, reason, message });
  };

  const entries = walker(root, {
    onError: (entryPath, error) => {
      skip(entryPath, "read-error", `Error reading ${entryPath}: ${describeError(error)}`);
    },
  });

  for (const entry of entries) {
    if (path.resolve(entry.path) === root) {
      tree.root(root);
      continue;
    }

    const relativePath = relativeToRoot(root, entry);
    const name = path.basename(relativePath);

    if (entry.kind === "directory") {
      tree.directory(name, entry.depth);
      directories++;
      continue;
    }

    let size: number;
    try {
      size = fs.statSync(entry.path).size;
    } catch (error) {
      skip(entry.path, "read-error", `Failed to get metadata for file ${entry.path}: ${describeError(error)}`);
      continue;
    }

    const decision = limiter.admit(size);
    if (!decision.admitted) {
      skip(entry.path, decision.reason, limitMessage(entry.path, decision.reason, limits));
      continue;
    }

    let isText: boolean;
    try {
      isText = isTextFile(entry.path);
    } catch (error) {
      skip(
        entry.path,
        "classification-error",
        `Error checking if file is text ${entry.path}: ${describeError(error)}`
      );
      continue;
    }

    if (!isText) {
      tree.file(name, entry.depth, "binary");
      binaryFiles.push(entry.path);
      continue;
    }

    let content: string;
    try {
      content = readFileContent(entry.path);
    } catch (error) {
      skip(entry.path, "read-error", `Error reading file ${entry.path}: ${describeError(error)}`);
      continue;
    }

    limiter.commit(size);
    files.push({ path: entry.path, relativePath, content, size });
    tree.file(name, entry.depth, "text");
  }

  return {
    root,
    tree: tree.toString(),
    files,
    skipped,
    binaryFiles,
    directories,
    totals: limiter.getTotals(),
    startedAt,
  };
}
