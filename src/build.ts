/**
 * Build cycle: regenerate a module's artifacts, then optionally bump its version.
 */

import type { ModuleDescriptor } from './module/types.js';
import { regenerate, type RegenerateOptions, type RegenerationResult } from './regenerator.js';
import { updateModuleVersion, type VersionBump, type VersionPart } from './version.js';

export interface BuildOptions extends RegenerateOptions {
  bump?: VersionPart;
}

export interface BuildResult {
  regeneration: RegenerationResult;
  version: VersionBump | null;
}

/**
 * The version is only bumped once regeneration has completed, so a module
 * whose public directory is missing keeps its version.
 */
export function buildModule(descriptor: ModuleDescriptor, options?: BuildOptions): BuildResult {
  const regeneration = regenerate(descriptor, options);
  const version = options?.bump
    ? updateModuleVersion(descriptor, options.bump, { logger: options.logger, dryRun: options.dryRun })
    : null;
  return { regeneration, version };
}
