import * as fs from "fs";
import * as path from "path";
import ignore, { type Ignore } from "ignore";
import { FatalError } from "../errors.js";

export type EntryKind = "directory" | "file";

/**
 * A filesystem entry yielded by the walker. Depth counts path segments
 * relative to the root, so the root itself is 0.
 */
export interface Entry {
  path: string;
  kind: EntryKind;
  depth: number;
}

export interface WalkOptions {
  /** Called for directories or ignore files that could not be read */
  onError: (entryPath: string, error: unknown) => void;
}

/**
 * A lazy, finite, single-pass sequence of entries below a root.
 */
export type Walker = (root: string, options: WalkOptions) => Iterable<Entry>;

/** Ignore files read in every visited directory, lowest precedence first */
const IGNORE_FILES = [".gitignore", ".ignore"];

/** Repository-wide excludes, applied below everything else */
const EXCLUDE_FILE = path.join(".git", "info", "exclude");

/**
 * Ignore rules loaded from one directory. Patterns match paths relative to `dir`.
 */
interface IgnoreScope {
  dir: string;
  matcher: Ignore;
}

/**
 * Walk `root` depth-first, directory before children, siblings sorted by name.
 *
 * Hidden entries are skipped, .gitignore and .ignore files apply to the
 * subtree they sit in, and symlinks are never descended (a symlink to a
 * file is yielded as a file). When the root lies inside a git repository,
 * the ignore files between the repository top and the root and the
 * repository's info/exclude apply as well.
 *
 * The root is checked eagerly: a missing or non-directory root throws
 * FatalError before any entry is produced.
 */
export const walkDirectory: Walker = (root, options) => {
  let stat: fs.Stats;
  try {
    stat = fs.statSync(root);
  } catch (error) {
    throw new FatalError(`Failed to read traversal root: ${root}`, { cause: error });
  }
  if (!stat.isDirectory()) {
    throw new FatalError(`Traversal root is not a directory: ${root}`);
  }

  return traverse(root, options);
};

function* traverse(root: string, options: WalkOptions): Generator<Entry> {
  yield { path: root, kind: "directory", depth: 0 };
  yield* visitDirectory(root, 0, repositoryScopes(root, options), options);
}

/**
 * Rules reaching the root from above: the enclosing repository's
 * info/exclude, then the ignore files of each directory from the repository
 * top down to the root's parent. Outside a repository there are none.
 */
function repositoryScopes(root: string, options: WalkOptions): IgnoreScope[] {
  const ancestors: string[] = [];
  let top = root;
  while (!fs.existsSync(path.join(top, ".git"))) {
    const parent = path.dirname(top);
    if (parent === top) return [];
    top = parent;
    ancestors.unshift(top);
  }

  const scopes: IgnoreScope[] = [];
  const exclude = loadIgnoreScope(top, [EXCLUDE_FILE], options);
  if (exclude) scopes.push(exclude);
  for (const dir of ancestors) {
    const scope = loadIgnoreScope(dir, IGNORE_FILES, options);
    if (scope) scopes.push(scope);
  }
  return scopes;
}

function* visitDirectory(
  dirPath: string,
  depth: number,
  inherited: IgnoreScope[],
  options: WalkOptions
): Generator<Entry> {
  const local = loadIgnoreScope(dirPath, IGNORE_FILES, options);
  const scopes = local ? [...inherited, local] : inherited;

  let dirents: fs.Dirent[];
  try {
    dirents = fs.readdirSync(dirPath, { withFileTypes: true });
  } catch (error) {
    options.onError(dirPath, error);
    return;
  }
  dirents.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  for (const dirent of dirents) {
    if (dirent.name.startsWith(".")) continue;

    const entryPath = path.join(dirPath, dirent.name);
    const kind = resolveKind(dirent, entryPath);
    if (!kind) continue;

    if (isIgnored(scopes, entryPath, kind === "directory")) continue;

    yield { path: entryPath, kind, depth: depth + 1 };

    if (kind === "directory") {
      yield* visitDirectory(entryPath, depth + 1, scopes, options);
    }
  }
}

/**
 * Directories and regular files pass through. Symlinks resolve to a file or
 * are dropped, as are broken links and special files.
 */
function resolveKind(dirent: fs.Dirent, entryPath: string): EntryKind | undefined {
  if (dirent.isDirectory()) return "directory";
  if (dirent.isFile()) return "file";
  if (dirent.isSymbolicLink()) {
    try {
      return fs.statSync(entryPath).isFile() ? "file" : undefined;
    } catch {
      // Dangling link
      return undefined;
    }
  }
  return undefined;
}

function loadIgnoreScope(
  dirPath: string,
  files: string[],
  options: WalkOptions
): IgnoreScope | undefined {
  let matcher: Ignore | undefined;

  for (const file of files) {
    const filePath = path.join(dirPath, file);
    if (!fs.existsSync(filePath)) continue;

    try {
      const rules = fs.readFileSync(filePath, "utf-8");
      matcher = matcher ?? ignore();
      matcher.add(rules);
    } catch (error) {
      options.onError(filePath, error);
    }
  }

  return matcher ? { dir: dirPath, matcher } : undefined;
}

/**
 * The deepest scope with an opinion wins, so a nested `!pattern` can
 * re-include what a parent ignored.
 */
function isIgnored(scopes: IgnoreScope[], entryPath: string, isDirectory: boolean): boolean {
  for (let i = scopes.length - 1; i >= 0; i--) {
    const { dir, matcher } = scopes[i];
    // ignore expects "/"-separated paths
    const local = path.relative(dir, entryPath).split(path.sep).join("/");
    const result = matcher.test(isDirectory ? `${local}/` : local);
    if (result.ignored) return true;
    if (result.unignored) return false;
  }
  return false;
}
