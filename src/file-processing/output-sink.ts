import { openSync, writeSync, closeSync } from 'fs';
import type { OutputSink } from './types.js';

/**
 * Open a file for writing (truncating it) and return a synchronous sink over it
 * @param filePath Output file path
 * @returns OutputSink; call `close()` when done
 * @throws Error if the file cannot be created
 */
export function createFileSink(filePath: string): OutputSink {
  const fd = openSync(filePath, 'w');
  let closed = false;

  return {
    write(chunk: string | Uint8Array): void {
      const data = typeof chunk === 'string' ? Buffer.from(chunk, 'utf-8') : chunk;
      let offset = 0;
      while (offset < data.length) {
        offset += writeSync(fd, data, offset, data.length - offset);
      }
    },
    close(): void {
      if (!closed) {
        closed = true;
        closeSync(fd);
      }
    },
  };
}
