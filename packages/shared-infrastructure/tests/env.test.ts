import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { loadEnvFiles, readEnum, readInt, readString } from '../src/env/loaders.js';

describe('env utilities', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  describe('readInt', () => {
    it('parses integers and falls back otherwise', () => {
      process.env.VOICESCRIPT_TEST_INT = '4';
      expect(readInt('VOICESCRIPT_TEST_INT', 1)).toBe(4);
      process.env.VOICESCRIPT_TEST_INT = '2.5';
      expect(readInt('VOICESCRIPT_TEST_INT', 1)).toBe(1);
      process.env.VOICESCRIPT_TEST_INT = 'many';
      expect(readInt('VOICESCRIPT_TEST_INT', 1)).toBe(1);
    });
  });

  describe('readString', () => {
    it('returns the value or the default', () => {
      expect(readString('VOICESCRIPT_TEST_STR', 'fallback')).toBe('fallback');
      expect(readString('VOICESCRIPT_TEST_STR')).toBeUndefined();
      process.env.VOICESCRIPT_TEST_STR = 'hello';
      expect(readString('VOICESCRIPT_TEST_STR', 'fallback')).toBe('hello');
    });
  });

  describe('readEnum', () => {
    it('matches allowed values case-insensitively', () => {
      process.env.VOICESCRIPT_TEST_ENUM = 'Azure';
      expect(readEnum('VOICESCRIPT_TEST_ENUM', ['elevenlabs', 'azure'] as const)).toBe('azure');
    });

    it('falls back to the default for unknown values', () => {
      process.env.VOICESCRIPT_TEST_ENUM = 'polly';
      expect(readEnum('VOICESCRIPT_TEST_ENUM', ['elevenlabs', 'azure'] as const, 'elevenlabs')).toBe(
        'elevenlabs',
      );
    });
  });

  describe('loadEnvFiles', () => {
    let testDir: string;

    beforeEach(() => {
      testDir = mkdtempSync(join(tmpdir(), 'voicescript-env-'));
    });

    afterEach(() => {
      rmSync(testDir, { recursive: true, force: true });
    });

    it('collects values without touching process.env when asked', () => {
      writeFileSync(join(testDir, '.env'), 'VS_ONE=first\nVS_TWO=second');

      const summary = loadEnvFiles({ cwd: testDir, assignToProcess: false });

      expect(summary.values).toEqual({ VS_ONE: 'first', VS_TWO: 'second' });
      expect(process.env.VS_ONE).toBeUndefined();
      expect(summary.assignedKeys).toEqual([]);
    });

    it('assigns new keys but keeps existing process values', () => {
      process.env.VS_EXISTING = 'original';
      writeFileSync(join(testDir, '.env'), 'VS_EXISTING=changed\nVS_FRESH=new');

      const summary = loadEnvFiles({ cwd: testDir });

      expect(process.env.VS_EXISTING).toBe('original');
      expect(process.env.VS_FRESH).toBe('new');
      expect(summary.assignedKeys).toEqual(['VS_FRESH']);
      expect(summary.overriddenKeys).toEqual([]);
    });

    it('overrides existing keys when override is set', () => {
      process.env.VS_EXISTING = 'original';
      writeFileSync(join(testDir, '.env'), 'VS_EXISTING=changed');

      const summary = loadEnvFiles({ cwd: testDir, override: true });

      expect(process.env.VS_EXISTING).toBe('changed');
      expect(summary.overriddenKeys).toEqual(['VS_EXISTING']);
    });

    it('gives earlier files precedence and reports missing ones', () => {
      writeFileSync(join(testDir, 'a.env'), 'VS_SHARED=from-a');
      writeFileSync(join(testDir, 'b.env'), 'VS_SHARED=from-b\nVS_ONLY_B=b');

      const summary = loadEnvFiles({
        cwd: testDir,
        files: ['a.env', 'missing.env', 'b.env'],
        assignToProcess: false,
      });

      expect(summary.values).toEqual({ VS_SHARED: 'from-a', VS_ONLY_B: 'b' });
      expect(summary.loadedFiles).toEqual([join(testDir, 'a.env'), join(testDir, 'b.env')]);
      expect(summary.missingFiles).toEqual([join(testDir, 'missing.env')]);
    });
  });
});
