import * as path from "path";

export const NON_TEXT_ANNOTATION = " [Non-text file]";

const INDENT = "    ";

export type FileOutcome = "text" | "binary";

/**
 * Builds the indented tree shown above the file contents, one line per call.
 *
 * Only directories and classified files get a line. Files skipped by a limit
 * or an error are left out here and explained in the error list instead.
 */
export class TreeRenderer {
  private lines: string[] = [];

  /**
   * Render the traversal root. The name is the root's basename, or "." when
   * it has none (e.g. "/").
   */
  root(rootPath: string): string {
    return this.push(`└── ${path.basename(rootPath) || "."}`);
  }

  directory(name: string, depth: number): string {
    return this.push(`${indentFor(depth)}├── ${name}`);
  }

  file(name: string, depth: number, outcome: FileOutcome): string {
    const annotation = outcome === "binary" ? NON_TEXT_ANNOTATION : "";
    return this.push(`${indentFor(depth)}└── ${name}${annotation}`);
  }

  getLines(): readonly string[] {
    return this.lines;
  }

  /**
   * The full tree with trailing whitespace trimmed.
   */
  toString(): string {
    return this.lines.join("\n").trimEnd();
  }

  private push(line: string): string {
    this.lines.push(line);
    return line;
  }
}

function indentFor(depth: number): string {
  return INDENT.repeat(Math.max(0, depth - 1));
}
