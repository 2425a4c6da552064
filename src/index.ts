/**
 * psmanifest - keeps PowerShell module loader scripts and manifests in sync
 * with their function files.
 */

// Regeneration
export { regenerate, regenerateAll } from './regenerator.js';
export type {
  ArtifactKind,
  ArtifactStatus,
  ArtifactOutcome,
  RegenerationResult,
  RegenerateOptions,
  BatchOptions,
  BatchResult,
  ModuleFailure,
} from './regenerator.js';
export { buildModule } from './build.js';
export type { BuildOptions, BuildResult } from './build.js';

// Versions
export {
  bumpVersion,
  compareVersions,
  readModuleVersion,
  readModuleVersionFile,
  updateModuleVersion,
  isVersionPart,
  VERSION_PARTS,
} from './version.js';
export type { VersionPart, VersionBump } from './version.js';

// Modules
export {
  createModuleDescriptor,
  discoverModules,
  scanFunctionFiles,
  isWipName,
  extractAliases,
  buildExportManifest,
  findDuplicateNames,
} from './module/index.js';
export type { ModuleDescriptor, FunctionFile, FunctionRecord, ExportManifest, ScanOptions } from './module/index.js';

// Rendering
export {
  renderTemplate,
  templatePlaceholders,
  renderPsArray,
  quotePsString,
  LOADER_TEMPLATE,
  renderLoaderScript,
  MANIFEST_FIELDS,
  replaceManifestField,
  hasManifestField,
  detectLineEnding,
} from './render/index.js';
export type { PsArrayOptions, LoaderLayout, ManifestField } from './render/index.js';

// Config
export { DEFAULT_CONFIG_FILE, DEFAULT_LAYOUT, SettingsSchema, loadSettings, resolveSettings } from './config.js';
export type { ToolSettings, LayoutSettings } from './config.js';

// Errors
export {
  ToolError,
  ConfigError,
  ConfigNotFoundError,
  ModuleDirNotFoundError,
  PublicDirNotFoundError,
  ManifestNotFoundError,
  ManifestFieldNotFoundError,
  SourceReadError,
  TemplateError,
  InvalidVersionError,
  ErrorCodes,
} from './errors.js';
export type { ErrorOptions, ErrorCode } from './errors.js';

// Observability
export { ContextLogger, silentLogger } from './observability/context-logger.js';
export type { LogLevel, LogFormat, WritableOutput, ContextLoggerOptions } from './observability/context-logger.js';

// Utils
export { compareCodeUnits, sortedUnique, normalizeContent, writeFileAtomic } from './utils/index.js';

export const VERSION = '0.1.0';
