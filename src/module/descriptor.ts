/**
 * Module descriptors and discovery of module directories under a root.
 */

import { existsSync, readdirSync, statSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { DEFAULT_LAYOUT, type LayoutSettings } from '../config.js';
import { ConfigError, ModuleDirNotFoundError } from '../errors.js';
import { compareCodeUnits } from '../utils/index.js';
import type { ModuleDescriptor } from './types.js';

type DirLayout = Pick<LayoutSettings, 'publicDir' | 'privateDir'>;

const MODULE_NAME = /^[A-Za-z0-9_][A-Za-z0-9_.-]*$/;

function isDir(p: string): boolean {
  try {
    return statSync(p).isDirectory();
  } catch {
    return false;
  }
}

export function createModuleDescriptor(root: string, name: string, layout: DirLayout = DEFAULT_LAYOUT): ModuleDescriptor {
  if (!MODULE_NAME.test(name) || name.includes('..')) {
    throw new ConfigError(`Invalid module name: '${name}'`, { moduleName: name });
  }
  const rootPath = resolve(root, name);
  return {
    name,
    rootPath,
    publicDir: join(rootPath, layout.publicDir),
    privateDir: join(rootPath, layout.privateDir),
    loaderPath: join(rootPath, `${name}.psm1`),
    manifestPath: join(rootPath, `${name}.psd1`),
  };
}

/**
 * List module names under `root`: sub-directories holding a manifest named
 * after the directory or a public function directory.
 */
export function discoverModules(root: string, layout: DirLayout = DEFAULT_LAYOUT): string[] {
  const rootResolved = resolve(root);
  if (!isDir(rootResolved)) {
    throw new ModuleDirNotFoundError(rootResolved);
  }

  const names: string[] = [];
  for (const entry of readdirSync(rootResolved, { withFileTypes: true })) {
    if (!entry.isDirectory() || entry.name.startsWith('.')) continue;
    if (!MODULE_NAME.test(entry.name)) continue;
    const dir = join(rootResolved, entry.name);
    if (existsSync(join(dir, `${entry.name}.psd1`)) || isDir(join(dir, layout.publicDir))) {
      names.push(entry.name);
    }
  }
  return names.sort(compareCodeUnits);
}

