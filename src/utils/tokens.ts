/**
 * Token counting for the summary report.
 *
 * The report counts with the cl100k_base BPE so the number matches what the
 * common chat models would see, rather than a chars-per-token guess.
 */
import { getEncoding, type Tiktoken } from "js-tiktoken";
import { FatalError } from "../errors.js";

export const DEFAULT_ENCODING = "cl100k_base";

/**
 * Pure text to token-count function. Anything implementing this can stand in
 * for the BPE tokenizer.
 */
export interface Tokenizer {
  countTokens(text: string): number;
}

class TiktokenTokenizer implements Tokenizer {
  constructor(private readonly encoding: Tiktoken) {}

  countTokens(text: string): number {
    // Special-token text is encoded as ordinary text instead of rejected
    return this.encoding.encode(text, [], []).length;
  }
}

/**
 * Load the cl100k_base tokenizer.
 * Throws FatalError when the encoding cannot be built.
 */
export function createTokenizer(): Tokenizer {
  try {
    return new TiktokenTokenizer(getEncoding(DEFAULT_ENCODING));
  } catch (error) {
    throw new FatalError("Failed to get BPE tokenizer", { cause: error });
  }
}
