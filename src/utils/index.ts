import { renameSync, rmSync, writeFileSync } from 'node:fs';

/** Lexical, case-sensitive ordering by UTF-16 code units. */
export function compareCodeUnits(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/** Unique values in code-unit order; the first occurrence of each value wins. */
export function sortedUnique(values: Iterable<string>): string[] {
  return [...new Set(values)].sort(compareCodeUnits);
}

/** Normalize line endings to LF and trim surrounding whitespace. */
export function normalizeContent(text: string): string {
  return text.replace(/\r\n?/g, '\n').trim();
}

/**
 * Replace a file's content by writing a sibling temp file and renaming it
 * over the target, so readers see either the old or the complete new file.
 */
export function writeFileAtomic(path: string, content: string): void {
  const tmp = `${path}.${process.pid}.tmp`;
  try {
    writeFileSync(tmp, content, 'utf-8');
    renameSync(tmp, path);
  } catch (e) {
    rmSync(tmp, { force: true });
    throw e;
  }
}
