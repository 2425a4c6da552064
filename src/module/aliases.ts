/**
 * Alias annotation scanning.
 *
 * Recognizes `[Alias('a', "b", c)]` anywhere in a function's source text.
 * The keyword is case-insensitive and whitespace may appear around every
 * token. Every annotation in the text contributes its aliases.
 */

const ALIAS_ANNOTATION = /\[\s*Alias\s*\(([^)]*)\)\s*\]/gi;

const ALIAS_TOKEN = /'((?:[^']|'')*)'|"([^"]*)"|([^,\s'"]+)/g;

function tokenValue(token: RegExpMatchArray): string {
  if (token[1] !== undefined) return token[1].replace(/''/g, "'").trim();
  return (token[2] ?? token[3] ?? '').trim();
}

/** Aliases in order of appearance; duplicates are kept. */
export function extractAliases(text: string): string[] {
  const aliases: string[] = [];
  for (const match of text.matchAll(ALIAS_ANNOTATION)) {
    for (const token of match[1].matchAll(ALIAS_TOKEN)) {
      const alias = tokenValue(token);
      if (alias) aliases.push(alias);
    }
  }
  return aliases;
}
