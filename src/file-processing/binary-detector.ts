import { openSync, readSync, closeSync } from 'fs';

/** Number of leading bytes sampled from a file */
export const BINARY_SAMPLE_SIZE = 512;

/** Fraction of non-text bytes above which a sample counts as binary */
export const BINARY_THRESHOLD = 0.3;

function isTextByte(byte: number): boolean {
  return byte === 9 || byte === 10 || byte === 13 || (byte >= 32 && byte <= 126);
}

/**
 * Heuristic binary check over a byte sample
 * Only tab, line feed, carriage return and printable ASCII count as text, so
 * UTF-8 text with many non-ASCII characters can be reported as binary.
 * @param sample Leading bytes of a file
 * @returns True if more than 30% of the bytes are not text bytes
 */
export function isBinaryContent(sample: Uint8Array): boolean {
  if (sample.length === 0) {
    return false;
  }

  let nonText = 0;
  for (const byte of sample) {
    if (!isTextByte(byte)) {
      nonText++;
    }
  }

  return nonText / sample.length > BINARY_THRESHOLD;
}

/**
 * Sample the start of a file and apply {@link isBinaryContent}
 * Errors opening or reading the file are thrown to the caller.
 */
export function isBinaryFile(filePath: string): boolean {
  const fd = openSync(filePath, 'r');
  try {
    const buffer = Buffer.alloc(BINARY_SAMPLE_SIZE);
    const bytesRead = readSync(fd, buffer, 0, BINARY_SAMPLE_SIZE, 0);
    return isBinaryContent(buffer.subarray(0, bytesRead));
  } finally {
    closeSync(fd);
  }
}
