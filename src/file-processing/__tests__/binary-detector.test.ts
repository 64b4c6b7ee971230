import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import os from 'os';
import path from 'path';
import {
  isBinaryContent,
  isBinaryFile,
  BINARY_SAMPLE_SIZE,
} from '../binary-detector.js';

function sampleWith(nonTextBytes: number, size = BINARY_SAMPLE_SIZE): Uint8Array {
  const sample = new Uint8Array(size).fill(0x61);
  sample.fill(0, 0, nonTextBytes);
  return sample;
}

describe('binary-detector', () => {
  describe('isBinaryContent', () => {
    it('should treat an empty sample as text', () => {
      expect(isBinaryContent(new Uint8Array(0))).toBe(false);
    });

    it('should treat printable ASCII and whitespace as text', () => {
      expect(isBinaryContent(Buffer.from('const a = 1;\r\n\tconst b = 2;\n'))).toBe(false);
      expect(isBinaryContent(sampleWith(0))).toBe(false);
    });

    it('should flag samples with more than 30% non-text bytes', () => {
      // 160 / 512 = 31.25%
      expect(isBinaryContent(sampleWith(160))).toBe(true);
      // 154 / 512 = 30.08%
      expect(isBinaryContent(sampleWith(154))).toBe(true);
    });

    it('should accept samples at or below the threshold', () => {
      // 153 / 512 = 29.88%
      expect(isBinaryContent(sampleWith(153))).toBe(false);
      // exactly 30%
      expect(isBinaryContent(sampleWith(3, 10))).toBe(false);
      expect(isBinaryContent(sampleWith(4, 10))).toBe(true);
    });

    it('should count DEL and high bytes as non-text', () => {
      expect(isBinaryContent(Uint8Array.from([0x7f, 0x80, 0xff, 0x41]))).toBe(true);
    });
  });

  describe('isBinaryFile', () => {
    let tempDir: string;

    beforeEach(() => {
      tempDir = mkdtempSync(path.join(os.tmpdir(), 'binary-detector-'));
    });

    afterEach(() => {
      rmSync(tempDir, { recursive: true, force: true });
    });

    it('should report an empty file as text', () => {
      const file = path.join(tempDir, 'empty.txt');
      writeFileSync(file, '');

      expect(isBinaryFile(file)).toBe(false);
    });

    it('should detect binary content at the start of a file', () => {
      const file = path.join(tempDir, 'image.bin');
      writeFileSync(file, Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x00, 0x00, 0x00, 0x0d, 0x01, 0x02]));

      expect(isBinaryFile(file)).toBe(true);
    });

    it('should only sample the first 512 bytes', () => {
      const file = path.join(tempDir, 'mostly-text.dat');
      const content = Buffer.concat([
        Buffer.alloc(BINARY_SAMPLE_SIZE, 0x61),
        Buffer.alloc(BINARY_SAMPLE_SIZE * 4, 0x00),
      ]);
      writeFileSync(file, content);

      expect(isBinaryFile(file)).toBe(false);
    });

    it('should throw when the file cannot be opened', () => {
      expect(() => isBinaryFile(path.join(tempDir, 'missing.txt'))).toThrow();
    });
  });
});
