import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { compareCodeUnits, normalizeContent, sortedUnique, writeFileAtomic } from '../src/utils/index.js';

let tempDir: string;

beforeEach(() => {
  tempDir = mkdtempSync(join(tmpdir(), 'utils-test-'));
});

afterEach(() => {
  rmSync(tempDir, { recursive: true, force: true });
});

describe('compareCodeUnits', () => {
  it('orders uppercase before lowercase', () => {
    expect(['b', 'B', 'a', 'A'].sort(compareCodeUnits)).toEqual(['A', 'B', 'a', 'b']);
    expect(compareCodeUnits('x', 'x')).toBe(0);
  });
});

describe('sortedUnique', () => {
  it('removes exact duplicates only', () => {
    expect(sortedUnique(['b', 'a', 'b', 'A'])).toEqual(['A', 'a', 'b']);
  });
});

describe('normalizeContent', () => {
  it('unifies line endings and trims', () => {
    expect(normalizeContent('\r\n  a\r\nb\rc\n\n')).toBe('a\nb\nc');
  });
});

describe('writeFileAtomic', () => {
  it('replaces the file content and leaves no temp file', () => {
    const path = join(tempDir, 'Core.psm1');
    writeFileSync(path, 'old');

    writeFileAtomic(path, 'new');

    expect(readFileSync(path, 'utf-8')).toBe('new');
    expect(readdirSync(tempDir)).toEqual(['Core.psm1']);
  });

  it('leaves the original untouched when the write fails', () => {
    const missingDir = join(tempDir, 'missing', 'Core.psm1');
    expect(() => writeFileAtomic(missingDir, 'new')).toThrow();
    expect(readdirSync(tempDir)).toEqual([]);
  });
});
