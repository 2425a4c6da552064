/**
 * Module version bumping.
 */

import { existsSync, readFileSync } from 'node:fs';
import { InvalidVersionError, ManifestFieldNotFoundError, ManifestNotFoundError } from './errors.js';
import type { ModuleDescriptor } from './module/types.js';
import { type ContextLogger, silentLogger } from './observability/context-logger.js';
import { writeFileAtomic } from './utils/index.js';

export type VersionPart = 'major' | 'minor' | 'patch';

export const VERSION_PARTS: readonly VersionPart[] = ['major', 'minor', 'patch'];

export interface VersionBump {
  moduleName: string;
  previous: string;
  next: string;
}

const VERSION = /^(\d+)\.(\d+)\.(\d+)(?:\.(\d+))?$/;
const MODULE_VERSION_FIELD = /^([ \t]*ModuleVersion[ \t]*=[ \t]*)(['"])([^'"]*)\2/im;

export function isVersionPart(value: string): value is VersionPart {
  return VERSION_PARTS.some((part) => part === value);
}

function parseVersion(version: string): bigint[] {
  const match = VERSION.exec(version.trim());
  if (!match) throw new InvalidVersionError(version);
  return match
    .slice(1)
    .filter((p): p is string => p !== undefined)
    .map((p) => BigInt(p));
}

/**
 * Increment one part of a MAJOR.MINOR.PATCH version, resetting the parts
 * after it. A fourth revision component is dropped.
 */
export function bumpVersion(version: string, part: VersionPart): string {
  const [major, minor, patch] = parseVersion(version);
  switch (part) {
    case 'major':
      return `${major + 1n}.0.0`;
    case 'minor':
      return `${major}.${minor + 1n}.0`;
    case 'patch':
      return `${major}.${minor}.${patch + 1n}`;
  }
}

/** Numeric comparison per component at any length; missing components count as 0. */
export function compareVersions(a: string, b: string): number {
  const pa = parseVersion(a);
  const pb = parseVersion(b);
  for (let i = 0; i < Math.max(pa.length, pb.length); i++) {
    const x = pa[i] ?? 0n;
    const y = pb[i] ?? 0n;
    if (x !== y) return x < y ? -1 : 1;
  }
  return 0;
}

export function readModuleVersion(manifestText: string): string | null {
  const match = MODULE_VERSION_FIELD.exec(manifestText);
  return match ? match[3] : null;
}

/** Version declared by a module's manifest, or null when there is none. */
export function readModuleVersionFile(descriptor: ModuleDescriptor): string | null {
  if (!existsSync(descriptor.manifestPath)) return null;
  return readModuleVersion(readFileSync(descriptor.manifestPath, 'utf-8'));
}

export function updateModuleVersion(
  descriptor: ModuleDescriptor,
  part: VersionPart,
  options?: { logger?: ContextLogger; dryRun?: boolean },
): VersionBump {
  const logger = (options?.logger ?? silentLogger()).child({ moduleName: descriptor.name });
  const path = descriptor.manifestPath;
  if (!existsSync(path)) {
    throw new ManifestNotFoundError(path);
  }

  const content = readFileSync(path, 'utf-8');
  const match = MODULE_VERSION_FIELD.exec(content);
  if (!match) {
    throw new ManifestFieldNotFoundError('ModuleVersion', path);
  }

  const [whole, prefix, quote, previous] = match;
  const next = bumpVersion(previous, part);
  const updated =
    content.slice(0, match.index) + prefix + quote + next + quote + content.slice(match.index + whole.length);

  if (!options?.dryRun) {
    writeFileAtomic(path, updated);
  }
  logger.info('Module version bumped', { previous, next, part });
  return { moduleName: descriptor.name, previous, next };
}
