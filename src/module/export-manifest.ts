/**
 * Derivation of the exported function and alias lists for a module.
 */

import { sortedUnique } from '../utils/index.js';
import type { ExportManifest, FunctionRecord } from './types.js';

/**
 * Build the export lists from discovered function records.
 *
 * WIP records are dropped. Function names and aliases are de-duplicated
 * case-sensitively across the whole module and sorted by code unit, so the
 * result does not depend on the order the records were discovered in.
 */
export function buildExportManifest(records: readonly FunctionRecord[]): ExportManifest {
  const exported = records.filter((r) => !r.isWip);
  return {
    functions: sortedUnique(exported.map((r) => r.name)),
    aliases: sortedUnique(exported.flatMap((r) => r.aliases)),
  };
}

/** Function names that more than one record claims. */
export function findDuplicateNames(records: readonly FunctionRecord[]): string[] {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const r of records) {
    if (r.isWip) continue;
    if (seen.has(r.name)) duplicates.add(r.name);
    seen.add(r.name);
  }
  return sortedUnique(duplicates);
}
