import { z } from "zod";
import { ConfigError } from "./errors.js";

export const DEFAULT_MAX_FILE_SIZE = 1024 * 1024; // 1MB
export const DEFAULT_MAX_TOTAL_SIZE = 1024 * 1024 * 100; // 100MB
export const DEFAULT_MAX_FILES = 10000;

// Plain decimal digits only: "", "1e3" and "0x10" are not byte counts
const nonNegativeInt = z
  .union([z.number(), z.string().regex(/^\d+$/, "Expected a non-negative integer")])
  .pipe(z.coerce.number().int().nonnegative());

export const FeedConfigSchema = z.object({
  /** Print the summary report after the file contents */
  report: z.boolean().default(false),
  /** Maximum size of a single file, in bytes */
  maxFileSize: nonNegativeInt.default(DEFAULT_MAX_FILE_SIZE),
  /** Maximum cumulative size of admitted files, in bytes */
  maxTotalSize: nonNegativeInt.default(DEFAULT_MAX_TOTAL_SIZE),
  /** Maximum number of admitted files */
  maxFiles: nonNegativeInt.default(DEFAULT_MAX_FILES),
});

export type FeedConfig = z.infer<typeof FeedConfigSchema>;

/**
 * Raw values as they arrive from the command line (commander hands over strings).
 */
export type ConfigFlags = {
  report?: boolean;
  fileSize?: string;
  totalSize?: string;
  numFiles?: string;
};

function envFlag(value: string | undefined): boolean | undefined {
  if (!value) return undefined;
  return value === "1" || value.toLowerCase() === "true";
}

/**
 * Resolve the run configuration. Command-line flags win over
 * CODEFEED_* environment variables, which win over the defaults.
 */
export function loadConfig(flags: ConfigFlags = {}): FeedConfig {
  const result = FeedConfigSchema.safeParse({
    report: flags.report || envFlag(process.env.CODEFEED_REPORT),
    maxFileSize: flags.fileSize ?? (process.env.CODEFEED_MAX_FILE_SIZE || undefined),
    maxTotalSize: flags.totalSize ?? (process.env.CODEFEED_MAX_TOTAL_SIZE || undefined),
    maxFiles: flags.numFiles ?? (process.env.CODEFEED_MAX_FILES || undefined),
  });

  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue ? issue.path.join(".") : "configuration";
    const message = issue ? issue.message : result.error.message;
    throw new ConfigError(`Invalid ${field}: ${message}`, { cause: result.error });
  }

  return result.data;
}
