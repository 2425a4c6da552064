/**
 * Directory scanner for discovering function source files in a module.
 */

import { readdirSync, statSync } from 'node:fs';
import { resolve, join, extname, basename } from 'node:path';
import { DEFAULT_LAYOUT, type LayoutSettings } from '../config.js';
import { PublicDirNotFoundError } from '../errors.js';
import type { ContextLogger } from '../observability/context-logger.js';
import { compareCodeUnits } from '../utils/index.js';
import type { FunctionFile } from './types.js';

export interface ScanOptions extends Partial<Pick<LayoutSettings, 'extension' | 'wipSuffix'>> {
  logger?: ContextLogger;
  maxDepth?: number;
}

function existsAndIsDir(p: string): boolean {
  try {
    return statSync(p).isDirectory();
  } catch {
    return false;
  }
}

export function isWipName(baseName: string, wipSuffix: string): boolean {
  return baseName.toLowerCase().endsWith(wipSuffix.toLowerCase());
}

/**
 * Recursively enumerate function files under `dir`.
 *
 * Work-in-progress files are returned with `isWip` set so callers can count
 * them; they are never exported.
 */
export function scanFunctionFiles(dir: string, options?: ScanOptions): FunctionFile[] {
  const extension = (options?.extension ?? DEFAULT_LAYOUT.extension).toLowerCase();
  const wipSuffix = options?.wipSuffix ?? DEFAULT_LAYOUT.wipSuffix;
  const maxDepth = options?.maxDepth ?? 16;
  const logger = options?.logger;

  const rootResolved = resolve(dir);
  if (!existsAndIsDir(rootResolved)) {
    throw new PublicDirNotFoundError(rootResolved);
  }

  const results: FunctionFile[] = [];

  function scanDir(dirPath: string, depth: number): void {
    if (depth > maxDepth) {
      logger?.warn(`Max depth ${maxDepth} exceeded, not descending`, { path: dirPath });
      return;
    }

    let entries: string[];
    try {
      entries = readdirSync(dirPath);
    } catch {
      logger?.warn('Cannot read directory', { path: dirPath });
      return;
    }

    for (const name of entries) {
      if (name.startsWith('.')) continue;

      const entryPath = join(dirPath, name);
      let stat;
      try {
        stat = statSync(entryPath);
      } catch {
        logger?.warn('Cannot stat entry', { path: entryPath });
        continue;
      }

      if (stat.isDirectory()) {
        scanDir(entryPath, depth + 1);
      } else if (stat.isFile()) {
        const ext = extname(name);
        if (ext.toLowerCase() !== extension) continue;
        const baseName = basename(name, ext);
        results.push({ filePath: entryPath, baseName, isWip: isWipName(baseName, wipSuffix) });
      }
    }
  }

  scanDir(rootResolved, 1);
  return results.sort((a, b) => compareCodeUnits(a.filePath, b.filePath));
}
