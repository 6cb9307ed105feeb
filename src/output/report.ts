/**
 * Summary printed after the file contents when --report is given.
 */
import type { FeedResult } from "../context/index.js";
import { formatDuration } from "../utils/format.js";
import type { Tokenizer } from "../utils/tokens.js";

export interface Report {
  root: string;
  filesAnalyzed: number;
  estimatedTokens: number;
  elapsedMs: number;
}

/**
 * Count tokens over every admitted file and measure the run time, from the
 * start of the walk to the end of tokenizing.
 *
 * Contents are joined with no separator before tokenizing, so a token may
 * straddle two files.
 */
export function summarize(result: FeedResult, tokenizer: Tokenizer, now?: number): Report {
  const combined = result.files.map((file) => file.content).join("");
  const estimatedTokens = tokenizer.countTokens(combined);
  // Clock stops after tokenizing
  const finishedAt = now ?? performance.now();

  return {
    root: result.root,
    filesAnalyzed: result.totals.filesAdmitted,
    estimatedTokens,
    elapsedMs: Math.max(0, finishedAt - result.startedAt),
  };
}

export function formatReport(report: Report): string[] {
  return [
    `Analyzing: ${report.root}`,
    `Files analyzed: ${report.filesAnalyzed}`,
    `Estimated tokens: ${report.estimatedTokens}`,
    `Time elapsed: ${formatDuration(report.elapsedMs)}`,
  ];
}
