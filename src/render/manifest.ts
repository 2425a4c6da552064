/**
 * In-place rewriting of export fields in a module manifest (.psd1).
 */

import { renderPsArray } from './ps-array.js';

export const MANIFEST_FIELDS = ['FunctionsToExport', 'AliasesToExport'] as const;
export type ManifestField = (typeof MANIFEST_FIELDS)[number];

interface FieldLocation {
  /** Offset of the first character of the existing value. */
  valueStart: number;
  /** Offset just past the existing value. */
  valueEnd: number;
  indent: string;
}

function fieldPattern(field: string): RegExp {
  return new RegExp(`^([ \\t]*)${field}[ \\t]*=[ \\t]*`, 'gim');
}

function isQuote(c: string | undefined): boolean {
  return c === "'" || c === '"';
}

/** End of the quoted string opening at `start`, or -1 when unterminated. */
function quotedEnd(text: string, start: number): number {
  const quote = text[start];
  let i = start + 1;
  while (i < text.length) {
    const c = text[i];
    if (quote === '"' && c === '`') {
      i += 2;
      continue;
    }
    if (c === quote) {
      if (text[i + 1] === quote) {
        i += 2;
        continue;
      }
      return i + 1;
    }
    i++;
  }
  return -1;
}

/** End of the `@( ... )` expression opening at `start`, or -1 when unbalanced. */
function arrayEnd(text: string, start: number): number {
  let depth = 0;
  let i = start + 1;
  while (i < text.length) {
    const c = text[i];
    if (isQuote(c)) {
      i = quotedEnd(text, i);
      if (i < 0) return -1;
      continue;
    }
    if (text.startsWith('<#', i)) {
      const close = text.indexOf('#>', i + 2);
      if (close < 0) return -1;
      i = close + 2;
      continue;
    }
    if (c === '#') {
      const newline = text.indexOf('\n', i);
      if (newline < 0) return -1;
      i = newline;
      continue;
    }
    if (c === '(') depth++;
    if (c === ')' && --depth === 0) return i + 1;
    i++;
  }
  return -1;
}

/**
 * End of a comma-separated list of quoted strings opening at `start`. A list
 * may continue on the next line after a trailing comma.
 */
function stringListEnd(text: string, start: number): number {
  let end = quotedEnd(text, start);
  if (end < 0) return -1;
  for (;;) {
    const comma = /^[ \t]*,\s*/.exec(text.slice(end));
    if (!comma) return end;
    const next = end + comma[0].length;
    if (!isQuote(text[next])) return end;
    const itemEnd = quotedEnd(text, next);
    if (itemEnd < 0) return end;
    end = itemEnd;
  }
}

function valueEnd(text: string, start: number): number {
  if (text.startsWith('@(', start)) return arrayEnd(text, start);
  if (text.slice(start, start + 5).toLowerCase() === '$null') return start + 5;
  if (isQuote(text[start])) return stringListEnd(text, start);
  return -1;
}

/**
 * First assignment of `field` at the start of a line whose value is an array
 * expression, a list of quoted strings or `$null`.
 */
function locateField(content: string, field: ManifestField): FieldLocation | null {
  for (const match of content.matchAll(fieldPattern(field))) {
    const valueStart = (match.index ?? 0) + match[0].length;
    const end = valueEnd(content, valueStart);
    if (end >= 0) return { valueStart, valueEnd: end, indent: match[1] };
  }
  return null;
}

export function detectLineEnding(content: string): '\r\n' | '\n' {
  return content.includes('\r\n') ? '\r\n' : '\n';
}

export function hasManifestField(content: string, field: ManifestField): boolean {
  return locateField(content, field) !== null;
}

/**
 * Replace the whole value of `field` with an array literal of `values`.
 *
 * Only assignments at the start of a line are considered, so commented-out
 * assignments are left alone. Returns null when the field is absent or its
 * value cannot be delimited, leaving the content to the caller unchanged.
 */
export function replaceManifestField(content: string, field: ManifestField, values: readonly string[]): string | null {
  const location = locateField(content, field);
  if (!location) return null;

  const array = renderPsArray(values, { eol: detectLineEnding(content), baseIndent: location.indent });
  return content.slice(0, location.valueStart) + array + content.slice(location.valueEnd);
}
