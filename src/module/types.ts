/**
 * Module types: ModuleDescriptor, FunctionFile, FunctionRecord, ExportManifest.
 */

export interface ModuleDescriptor {
  name: string;
  rootPath: string;
  publicDir: string;
  privateDir: string;
  loaderPath: string;
  manifestPath: string;
}

export interface FunctionFile {
  filePath: string;
  baseName: string;
  isWip: boolean;
}

export interface FunctionRecord {
  name: string;
  filePath: string;
  aliases: string[];
  isWip: boolean;
}

export interface ExportManifest {
  functions: string[];
  aliases: string[];
}
