/**
 * Rendering of string lists as PowerShell array literals.
 */

export interface PsArrayOptions {
  eol?: string;
  indent?: string;
  baseIndent?: string;
}

export function quotePsString(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

/** `@()` when empty, otherwise one single-quoted item per line. */
export function renderPsArray(values: readonly string[], options?: PsArrayOptions): string {
  if (values.length === 0) return '@()';
  const eol = options?.eol ?? '\n';
  const base = options?.baseIndent ?? '';
  const indent = base + (options?.indent ?? '    ');
  const items = values.map((v) => indent + quotePsString(v)).join(',' + eol);
  return `@(${eol}${items}${eol}${base})`;
}
