import * as fs from "fs";

/** Number of leading bytes sampled when classifying a file */
export const SAMPLE_SIZE = 1024;

const TAB = 0x09;
const LINE_FEED = 0x0a;
const CARRIAGE_RETURN = 0x0d;
const FIRST_PRINTABLE = 0x20;

/**
 * Check whether a sample of bytes looks like text.
 *
 * Control characters other than tab, LF and CR mark the sample as binary.
 * Bytes at or above 0x80 pass, so UTF-8 multi-byte sequences count as text.
 */
export function isTextSample(sample: Uint8Array): boolean {
  for (const byte of sample) {
    if (
      byte < FIRST_PRINTABLE &&
      byte !== TAB &&
      byte !== LINE_FEED &&
      byte !== CARRIAGE_RETURN
    ) {
      return false;
    }
  }
  return true;
}

/**
 * Classify a file as text by sampling its first SAMPLE_SIZE bytes.
 * Empty files are text. Throws if the file cannot be opened or read.
 */
export function isTextFile(filePath: string): boolean {
  const fd = fs.openSync(filePath, "r");
  try {
    const buffer = Buffer.alloc(SAMPLE_SIZE);
    const bytesRead = fs.readSync(fd, buffer, 0, SAMPLE_SIZE, 0);
    return isTextSample(buffer.subarray(0, bytesRead));
  } finally {
    fs.closeSync(fd);
  }
}
