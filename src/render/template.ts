/**
 * Minimal named-placeholder templating.
 */

import { TemplateError } from '../errors.js';

const PLACEHOLDER = /\{\{\s*([A-Za-z][A-Za-z0-9_]*)\s*\}\}/g;

/**
 * Substitute `{{name}}` placeholders in `skeleton`.
 *
 * Values are inserted literally. A placeholder with no value throws
 * TemplateError.
 */
export function renderTemplate(skeleton: string, values: Readonly<Record<string, string>>): string {
  return skeleton.replace(PLACEHOLDER, (_match, key: string) => {
    if (!Object.prototype.hasOwnProperty.call(values, key)) {
      throw new TemplateError(key);
    }
    return values[key];
  });
}

/** Names of the placeholders a skeleton uses, in order of first appearance. */
export function templatePlaceholders(skeleton: string): string[] {
  const names: string[] = [];
  for (const match of skeleton.matchAll(PLACEHOLDER)) {
    if (!names.includes(match[1])) names.push(match[1]);
  }
  return names;
}
