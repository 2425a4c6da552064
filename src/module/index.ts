export type { ModuleDescriptor, FunctionFile, FunctionRecord, ExportManifest } from './types.js';
export { createModuleDescriptor, discoverModules } from './descriptor.js';
export { scanFunctionFiles, isWipName } from './scanner.js';
export type { ScanOptions } from './scanner.js';
export { extractAliases } from './aliases.js';
export { buildExportManifest, findDuplicateNames } from './export-manifest.js';
