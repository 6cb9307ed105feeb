import { Command, CommanderError } from "commander";
import { loadConfig, type ConfigFlags } from "./config.js";
import { feed, type Walker } from "./context/index.js";
import { AppError, describeError, FatalError, UsageError } from "./errors.js";
import { formatReport, summarize } from "./output/report.js";
import { consoleSink, writeFeed, type Sink } from "./output/writer.js";
import { createTokenizer, type Tokenizer } from "./utils/tokens.js";

export const VERSION = "0.1.0";

export interface CliDeps {
  sink?: Sink;
  /** Resolves the traversal root; defaults to process.cwd */
  cwd?: () => string;
  tokenizer?: () => Tokenizer;
  walker?: Walker;
}

export function createProgram(): Command {
  return new Command()
    .name("codefeed")
    .description("Feed your codebase into any LLM.")
    .version(VERSION)
    .option("-r, --report", "Output the report")
    .option("-f, --file-size <bytes>", "Maximum file size to process (in bytes) (default: 1048576)")
    .option(
      "-t, --total-size <bytes>",
      "Maximum total size of files to process (in bytes) (default: 104857600)"
    )
    .option("-n, --num-files <count>", "Maximum number of files to process (default: 10000)");
}

function resolveRoot(cwd: () => string): string {
  try {
    return cwd();
  } catch (error) {
    throw new FatalError("Failed to get current directory", { cause: error });
  }
}

/**
 * Parse flags, feed the working directory and write the result.
 * Returns the process exit code instead of exiting.
 */
export function runCli(argv: string[], deps: CliDeps = {}): number {
  const sink = deps.sink ?? consoleSink;
  const program = createProgram()
    .exitOverride()
    .configureOutput({
      writeOut: (text) => sink.out(text.trimEnd()),
      writeErr: (text) => sink.err(text.trimEnd()),
    });

  try {
    try {
      program.parse(argv, { from: "user" });
    } catch (error) {
      if (error instanceof CommanderError) {
        if (error.exitCode === 0) return 0;
        throw new UsageError(error.message, { cause: error });
      }
      throw error;
    }

    const config = loadConfig(program.opts<ConfigFlags>());
    const root = resolveRoot(deps.cwd ?? (() => process.cwd()));

    const result = feed({
      root,
      limits: {
        maxFiles: config.maxFiles,
        maxTotalSize: config.maxTotalSize,
        maxFileSize: config.maxFileSize,
      },
      walker: deps.walker,
    });

    writeFeed(result, sink);

    if (config.report) {
      const tokenizer = (deps.tokenizer ?? createTokenizer)();
      for (const line of formatReport(summarize(result, tokenizer))) {
        sink.out(line);
      }
    }

    return 0;
  } catch (error) {
    // Commander already printed its own message for usage errors
    if (!(error instanceof UsageError)) {
      sink.err(`Error: ${describeError(error)}`);
    }
    return error instanceof AppError ? error.exitCode : 1;
  }
}
