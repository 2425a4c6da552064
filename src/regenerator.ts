/**
 * Regeneration of a module's loader script and manifest export lists.
 */

import { existsSync, readFileSync } from 'node:fs';
import { relative } from 'node:path';
import { v4 as uuidv4 } from 'uuid';
import { DEFAULT_LAYOUT, type LayoutSettings } from './config.js';
import { ManifestFieldNotFoundError, ManifestNotFoundError, SourceReadError } from './errors.js';
import { extractAliases } from './module/aliases.js';
import { createModuleDescriptor } from './module/descriptor.js';
import { buildExportManifest, findDuplicateNames } from './module/export-manifest.js';
import { scanFunctionFiles } from './module/scanner.js';
import type { ExportManifest, FunctionRecord, ModuleDescriptor } from './module/types.js';
import { type ContextLogger, silentLogger } from './observability/context-logger.js';
import { renderLoaderScript } from './render/loader-script.js';
import { MANIFEST_FIELDS, replaceManifestField } from './render/manifest.js';
import { normalizeContent, writeFileAtomic } from './utils/index.js';

export type ArtifactKind = 'loader' | 'manifest';
export type ArtifactStatus = 'updated' | 'unchanged' | 'skipped';

export interface ArtifactOutcome {
  kind: ArtifactKind;
  path: string;
  status: ArtifactStatus;
  reason?: string;
}

export interface RegenerationResult {
  moduleName: string;
  filesScanned: number;
  wipExcluded: number;
  filesSkipped: number;
  functions: string[];
  aliases: string[];
  artifacts: ArtifactOutcome[];
  warnings: string[];
  updatedCount: number;
  dryRun: boolean;
}

export interface RegenerateOptions extends Partial<Pick<LayoutSettings, 'extension' | 'wipSuffix' | 'lineEnding'>> {
  logger?: ContextLogger;
  /** Reads a function source file; defaults to a UTF-8 read from disk. */
  readFile?: (path: string) => string;
  /** Render and compare without writing. */
  dryRun?: boolean;
}

export interface BatchOptions extends RegenerateOptions, Partial<Pick<LayoutSettings, 'publicDir' | 'privateDir'>> {
  runId?: string;
}

export interface ModuleFailure {
  moduleName: string;
  error: Error;
}

export interface BatchResult {
  runId: string;
  results: RegenerationResult[];
  failures: ModuleFailure[];
}

const defaultReadFile = (path: string): string => readFileSync(path, 'utf-8');

function toError(e: unknown): Error {
  return e instanceof Error ? e : new Error(String(e));
}

class ArtifactWriter {
  readonly outcomes: ArtifactOutcome[] = [];

  constructor(
    private readonly _logger: ContextLogger,
    private readonly _dryRun: boolean,
  ) {}

  /** Write `next` unless it matches `previous` after normalization. */
  sync(kind: ArtifactKind, path: string, previous: string | null, next: string): void {
    if (previous !== null && normalizeContent(previous) === normalizeContent(next)) {
      this.outcomes.push({ kind, path, status: 'unchanged' });
      this._logger.info(`${kind} unchanged`, { path });
      return;
    }
    if (!this._dryRun) {
      writeFileAtomic(path, next);
    }
    this.outcomes.push({ kind, path, status: 'updated' });
    this._logger.info(this._dryRun ? `${kind} would be updated` : `${kind} updated`, { path });
  }

  skip(kind: ArtifactKind, path: string, reason: string): void {
    this.outcomes.push({ kind, path, status: 'skipped', reason });
    this._logger.info(`${kind} skipped`, { path, reason });
  }
}

/**
 * Bring a module's loader script and manifest export lists in line with its
 * public function files.
 *
 * Throws PublicDirNotFoundError before writing anything when the public
 * directory is missing. Unreadable function files and a missing manifest or
 * manifest field are reported as warnings.
 */
export function regenerate(descriptor: ModuleDescriptor, options?: RegenerateOptions): RegenerationResult {
  const logger = (options?.logger ?? silentLogger()).child({ moduleName: descriptor.name });
  const readFile = options?.readFile ?? defaultReadFile;
  const dryRun = options?.dryRun ?? false;
  const warnings: string[] = [];
  const warn = (message: string, extra?: Record<string, unknown>): void => {
    warnings.push(message);
    logger.warn(message, extra);
  };

  const files = scanFunctionFiles(descriptor.publicDir, {
    extension: options?.extension,
    wipSuffix: options?.wipSuffix,
    logger,
  });
  logger.debug('Scanned public directory', { path: descriptor.publicDir, files: files.length });

  const records: FunctionRecord[] = [];
  let wipExcluded = 0;
  let filesSkipped = 0;
  for (const file of files) {
    if (file.isWip) {
      wipExcluded++;
      logger.debug('Excluding work-in-progress file', { path: file.filePath });
      continue;
    }
    let text: string;
    try {
      text = readFile(file.filePath);
    } catch (e) {
      filesSkipped++;
      warn(new SourceReadError(file.filePath, { cause: toError(e) }).message, { path: file.filePath });
      continue;
    }
    records.push({ name: file.baseName, filePath: file.filePath, aliases: extractAliases(text), isWip: false });
  }

  for (const name of findDuplicateNames(records)) {
    warn(`Function '${name}' is defined by more than one file; exported once`);
  }

  const manifest = buildExportManifest(records);
  const writer = new ArtifactWriter(logger, dryRun);

  writer.sync(
    'loader',
    descriptor.loaderPath,
    existsSync(descriptor.loaderPath) ? readFileSync(descriptor.loaderPath, 'utf-8') : null,
    renderLoaderScript(manifest, {
      publicDir: relative(descriptor.rootPath, descriptor.publicDir),
      privateDir: relative(descriptor.rootPath, descriptor.privateDir),
      extension: options?.extension ?? DEFAULT_LAYOUT.extension,
      lineEnding: options?.lineEnding ?? DEFAULT_LAYOUT.lineEnding,
    }),
  );

  syncManifest(descriptor, manifest, writer, warn);

  const artifacts = writer.outcomes;
  const result: RegenerationResult = {
    moduleName: descriptor.name,
    filesScanned: files.length,
    wipExcluded,
    filesSkipped,
    functions: manifest.functions,
    aliases: manifest.aliases,
    artifacts,
    warnings,
    updatedCount: artifacts.filter((a) => a.status === 'updated').length,
    dryRun,
  };
  logger.info('Regeneration finished', {
    functions: result.functions.length,
    aliases: result.aliases.length,
    updated: result.updatedCount,
  });
  return result;
}

function syncManifest(
  descriptor: ModuleDescriptor,
  manifest: ExportManifest,
  writer: ArtifactWriter,
  warn: (message: string, extra?: Record<string, unknown>) => void,
): void {
  const path = descriptor.manifestPath;
  if (!existsSync(path)) {
    const message = new ManifestNotFoundError(path).message;
    warn(message, { path });
    writer.skip('manifest', path, message);
    return;
  }

  let current: string;
  try {
    current = readFileSync(path, 'utf-8');
  } catch (e) {
    const message = `Cannot read manifest: ${path} (${toError(e).message})`;
    warn(message, { path });
    writer.skip('manifest', path, message);
    return;
  }

  let next = current;
  let replaced = 0;
  for (const field of MANIFEST_FIELDS) {
    const values = field === 'FunctionsToExport' ? manifest.functions : manifest.aliases;
    const updated = replaceManifestField(next, field, values);
    if (updated === null) {
      warn(new ManifestFieldNotFoundError(field, path).message, { path, field });
      continue;
    }
    next = updated;
    replaced++;
  }

  if (replaced === 0) {
    writer.skip('manifest', path, 'No export fields found');
    return;
  }
  writer.sync('manifest', path, current, next);
}

/**
 * Regenerate several modules one after another.
 *
 * A module that throws is recorded in `failures` and the batch moves on.
 */
export function regenerateAll(root: string, moduleNames: readonly string[], options?: BatchOptions): BatchResult {
  const runId = options?.runId ?? uuidv4();
  const logger = (options?.logger ?? silentLogger()).child({ runId });
  const layout = {
    publicDir: options?.publicDir ?? DEFAULT_LAYOUT.publicDir,
    privateDir: options?.privateDir ?? DEFAULT_LAYOUT.privateDir,
  };

  const results: RegenerationResult[] = [];
  const failures: ModuleFailure[] = [];
  logger.info('Regenerating modules', { count: moduleNames.length, modules: [...moduleNames] });

  for (const moduleName of moduleNames) {
    try {
      const descriptor = createModuleDescriptor(root, moduleName, layout);
      results.push(regenerate(descriptor, { ...options, logger }));
    } catch (e) {
      const error = toError(e);
      failures.push({ moduleName, error });
      logger.child({ moduleName }).error('Regeneration failed', { error: String(error) });
    }
  }

  logger.info('Batch finished', {
    succeeded: results.length,
    failed: failures.length,
    updated: results.reduce((n, r) => n + r.updatedCount, 0),
  });
  return { runId, results, failures };
}
