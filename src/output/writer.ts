import type { AdmittedFile, FeedResult } from "../context/index.js";

export const SEPARATOR = "=".repeat(50);

/**
 * Where output lines go. Each call writes one line (or block) followed by a newline.
 */
export interface Sink {
  out(text: string): void;
  err(text: string): void;
}

export const consoleSink: Sink = {
  out: (text) => console.log(text),
  err: (text) => console.error(text),
};

/**
 * Header and trimmed content for one admitted file.
 */
export function formatFileBlock(file: AdmittedFile): string[] {
  return [SEPARATOR, `File: ${file.relativePath}`, SEPARATOR, file.content.trimEnd()];
}

/**
 * Write a finished run: the tree, then every admitted file in traversal
 * order on stdout, then one line per skipped file on stderr.
 */
export function writeFeed(result: FeedResult, sink: Sink): void {
  sink.out(result.tree);

  for (const file of result.files) {
    for (const line of formatFileBlock(file)) {
      sink.out(line);
    }
  }

  for (const record of result.skipped) {
    sink.err(record.message);
  }
}
