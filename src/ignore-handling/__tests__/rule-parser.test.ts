import { describe, it, expect, afterEach, vi } from 'vitest';
import { mkdtempSync, mkdirSync, rmSync, writeFileSync, realpathSync } from 'fs';
import os from 'os';
import path from 'path';
import { parseIgnoreLine, parseIgnoreContent, parseIgnoreFile } from '../rule-parser.js';

describe('rule-parser', () => {
  describe('parseIgnoreLine', () => {
    it('should skip blank and comment lines', () => {
      expect(parseIgnoreLine('')).toBeNull();
      expect(parseIgnoreLine('   \t')).toBeNull();
      expect(parseIgnoreLine('# comment')).toBeNull();
      expect(parseIgnoreLine('   # indented comment')).toBeNull();
    });

    it('should parse a plain pattern', () => {
      expect(parseIgnoreLine('*.log')).toEqual({
        pattern: '*.log',
        segments: ['*.log'],
        negate: false,
        directoryOnly: false,
        anchored: false,
        source: '*.log',
      });
    });

    it('should parse negation and re-trim after the bang', () => {
      const rule = parseIgnoreLine('!  important.log');

      expect(rule?.negate).toBe(true);
      expect(rule?.pattern).toBe('important.log');
      expect(rule?.source).toBe('!  important.log');
    });

    it('should parse directory-only patterns', () => {
      const rule = parseIgnoreLine('build/');

      expect(rule?.directoryOnly).toBe(true);
      expect(rule?.anchored).toBe(false);
      expect(rule?.segments).toEqual(['build']);
    });

    it('should parse anchored patterns', () => {
      const rule = parseIgnoreLine('/config/local.json');

      expect(rule?.anchored).toBe(true);
      expect(rule?.pattern).toBe('config/local.json');
      expect(rule?.segments).toEqual(['config', 'local.json']);
    });

    it('should combine all markers', () => {
      const rule = parseIgnoreLine('  !/dist/  ');

      expect(rule).toEqual({
        pattern: 'dist',
        segments: ['dist'],
        negate: true,
        directoryOnly: true,
        anchored: true,
        source: '!/dist/',
      });
    });

    it('should keep double-star segments', () => {
      expect(parseIgnoreLine('src/**/*.test.js')?.segments).toEqual(['src', '**', '*.test.js']);
    });

    it('should drop empty segments from repeated slashes', () => {
      expect(parseIgnoreLine('a//b')?.segments).toEqual(['a', 'b']);
    });

    it('should drop lines that leave no segments', () => {
      expect(parseIgnoreLine('/')).toBeNull();
      expect(parseIgnoreLine('!')).toBeNull();
      expect(parseIgnoreLine('!/')).toBeNull();
      expect(parseIgnoreLine('//')).toBeNull();
    });

    it('should take unsupported syntax literally', () => {
      expect(parseIgnoreLine('[abc].txt')?.segments).toEqual(['[abc].txt']);
      expect(parseIgnoreLine('\\#notes')?.segments).toEqual(['\\#notes']);
    });

    it('should attach the base directory when given', () => {
      expect(parseIgnoreLine('*.tmp', '/work/project')?.base).toBe('/work/project');
      expect(parseIgnoreLine('*.tmp')).not.toHaveProperty('base');
    });
  });

  describe('parseIgnoreContent', () => {
    it('should parse lines in order and skip comments', () => {
      const rules = parseIgnoreContent('# deps\nnode_modules/\r\n\n*.log\n!keep.log\n');

      expect(rules.map(rule => rule.source)).toEqual(['node_modules/', '*.log', '!keep.log']);
    });
  });

  describe('parseIgnoreFile', () => {
    let tempDir: string | undefined;

    afterEach(() => {
      vi.restoreAllMocks();
      if (tempDir) {
        rmSync(tempDir, { recursive: true, force: true });
        tempDir = undefined;
      }
    });

    it('should read rules with the file directory as base', () => {
      tempDir = realpathSync(mkdtempSync(path.join(os.tmpdir(), 'rule-parser-')));
      writeFileSync(path.join(tempDir, '.gitignore'), '*.tmp\n/out/\n');

      const rules = parseIgnoreFile(path.join(tempDir, '.gitignore'));

      expect(rules).toHaveLength(2);
      expect(rules[0].base).toBe(tempDir);
      expect(rules[1].anchored).toBe(true);
      expect(rules[1].directoryOnly).toBe(true);
    });

    it('should return no rules for a missing file', () => {
      expect(parseIgnoreFile('/non/existent/.gitignore')).toEqual([]);
    });

    it('should warn and return no rules when the file cannot be read', () => {
      tempDir = realpathSync(mkdtempSync(path.join(os.tmpdir(), 'rule-parser-')));
      mkdirSync(path.join(tempDir, '.gitignore'));
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

      expect(parseIgnoreFile(path.join(tempDir, '.gitignore'))).toEqual([]);
      expect(warn).toHaveBeenCalledTimes(1);
    });
  });
});
