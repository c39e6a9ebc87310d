import { mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { ConfigurationError } from '@avatar-studio/contracts';

import {
  loadEnvFiles,
  readBool,
  readEnum,
  readFloat,
  readInt,
  readList,
  readString,
} from '../src/env/loaders.js';

describe('env utilities', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  describe('readBool', () => {
    it('returns default when env var is not set', () => {
      expect(readBool('NONEXISTENT_VAR', true)).toBe(true);
      expect(readBool('NONEXISTENT_VAR', false)).toBe(false);
    });

    it('accepts 1, true, yes and on (case insensitive)', () => {
      for (const value of ['1', 'true', 'TRUE', 'yes', 'On']) {
        process.env.TEST_BOOL = value;
        expect(readBool('TEST_BOOL', false)).toBe(true);
      }
    });

    it('returns false for other values', () => {
      process.env.TEST_BOOL = '0';
      expect(readBool('TEST_BOOL', true)).toBe(false);
      process.env.TEST_BOOL = 'false';
      expect(readBool('TEST_BOOL', true)).toBe(false);
    });

    it('returns default for empty string', () => {
      process.env.TEST_BOOL = '';
      expect(readBool('TEST_BOOL', true)).toBe(true);
    });
  });

  describe('readInt / readFloat', () => {
    it('parses valid integers', () => {
      process.env.TEST_INT = '123';
      expect(readInt('TEST_INT', 0)).toBe(123);
    });

    it('falls back for non-integers', () => {
      process.env.TEST_INT = '1.5';
      expect(readInt('TEST_INT', 42)).toBe(42);
      process.env.TEST_INT = 'not a number';
      expect(readInt('TEST_INT', 42)).toBe(42);
    });

    it('parses floats', () => {
      process.env.TEST_FLOAT = '0.02';
      expect(readFloat('TEST_FLOAT', 1)).toBe(0.02);
      process.env.TEST_FLOAT = 'abc';
      expect(readFloat('TEST_FLOAT', 1)).toBe(1);
    });
  });

  describe('readString / readList', () => {
    it('returns default for missing or empty values', () => {
      expect(readString('NONEXISTENT_VAR', 'default')).toBe('default');
      process.env.TEST_STRING = '';
      expect(readString('TEST_STRING', 'default')).toBe('default');
      expect(readString('NONEXISTENT_VAR')).toBeUndefined();
    });

    it('splits comma-separated lists and drops blanks', () => {
      process.env.TEST_LIST = 'http://a, http://b,,';
      expect(readList('TEST_LIST')).toEqual(['http://a', 'http://b']);
      expect(readList('NONEXISTENT_VAR', ['x'])).toEqual(['x']);
    });
  });

  describe('readEnum', () => {
    it('normalizes case and returns the matching member', () => {
      process.env.TEST_ENUM = 'SVD';
      expect(readEnum('TEST_ENUM', ['mock', 'svd'] as const, 'mock')).toBe('svd');
    });

    it('returns default when unset', () => {
      expect(readEnum('NONEXISTENT_VAR', ['mock', 'svd'] as const, 'mock')).toBe('mock');
    });

    it('throws ConfigurationError for unknown values', () => {
      process.env.TEST_ENUM = 'wav2lip';
      expect(() => readEnum('TEST_ENUM', ['mock', 'svd'] as const, 'mock')).toThrow(
        ConfigurationError,
      );
    });
  });

  describe('loadEnvFiles', () => {
    let testDir: string;

    beforeEach(() => {
      testDir = join(tmpdir(), `test-env-${Date.now()}-${Math.random().toString(36).slice(2)}`);
      mkdirSync(testDir, { recursive: true });
    });

    afterEach(() => {
      rmSync(testDir, { recursive: true, force: true });
    });

    it('assigns variables to process.env and reports them', () => {
      writeFileSync(join(testDir, '.env'), 'AVATAR_TEST_A=one\nAVATAR_TEST_B=two');

      const summary = loadEnvFiles({ cwd: testDir });

      expect(process.env.AVATAR_TEST_A).toBe('one');
      expect(process.env.AVATAR_TEST_B).toBe('two');
      expect(summary.loadedFiles).toEqual([join(testDir, '.env')]);
      expect(summary.assignedKeys.sort()).toEqual(['AVATAR_TEST_A', 'AVATAR_TEST_B']);
    });

    it('does not override existing process.env vars by default', () => {
      process.env.EXISTING_VAR = 'original';
      writeFileSync(join(testDir, '.env'), 'EXISTING_VAR=new_value');

      loadEnvFiles({ cwd: testDir });

      expect(process.env.EXISTING_VAR).toBe('original');
    });

    it('overrides existing vars when override is true', () => {
      process.env.EXISTING_VAR = 'original';
      writeFileSync(join(testDir, '.env'), 'EXISTING_VAR=new_value');

      loadEnvFiles({ cwd: testDir, override: true });

      expect(process.env.EXISTING_VAR).toBe('new_value');
    });

    it('leaves process.env alone when assignToProcess is false', () => {
      writeFileSync(join(testDir, '.env'), 'AVATAR_TEST_UNASSIGNED=1');

      const summary = loadEnvFiles({ cwd: testDir, assignToProcess: false });

      expect(process.env.AVATAR_TEST_UNASSIGNED).toBeUndefined();
      expect(summary.assignedKeys).toEqual([]);
    });

    it('reports missing files', () => {
      const summary = loadEnvFiles({ cwd: testDir });
      expect(summary).toEqual({
        loadedFiles: [],
        missingFiles: [join(testDir, '.env')],
        assignedKeys: [],
      });
    });
  });
});
