/**
 * Shared test fixtures and helpers.
 */

import { mkdirSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { ContextLogger } from '../src/observability/context-logger.js';

export const SAMPLE_MANIFEST = `@{
    RootModule = 'Sample.psm1'
    ModuleVersion = '1.2.3'
    GUID = '00000000-0000-0000-0000-000000000000'
    Author = 'Test Author'
    FunctionsToExport = @()
    CmdletsToExport = @()
    VariablesToExport = @()
    AliasesToExport = @()
    PrivateData = @{
        PSData = @{
            Tags = @('test')
        }
    }
}
`;

export function writeFile(root: string, relativePath: string, content = ''): string {
  const full = join(root, relativePath);
  mkdirSync(dirname(full), { recursive: true });
  writeFileSync(full, content);
  return full;
}

export function functionSource(name: string, aliases: string[] = []): string {
  const annotation = aliases.length > 0 ? `    [Alias(${aliases.map((a) => `'${a}'`).join(', ')})]\n` : '';
  return `function ${name} {\n    [CmdletBinding()]\n${annotation}    param()\n}\n`;
}

/**
 * Create `<root>/<name>/` with the given public files and, unless `manifest`
 * is null, a manifest.
 */
export function createModuleFixture(
  root: string,
  name: string,
  options?: {
    publicFiles?: Record<string, string>;
    privateFiles?: Record<string, string>;
    manifest?: string | null;
  },
): string {
  const moduleDir = join(root, name);
  mkdirSync(join(moduleDir, 'Public'), { recursive: true });
  for (const [file, content] of Object.entries(options?.publicFiles ?? {})) {
    writeFile(moduleDir, join('Public', file), content);
  }
  for (const [file, content] of Object.entries(options?.privateFiles ?? {})) {
    writeFile(moduleDir, join('Private', file), content);
  }
  const manifest = options?.manifest === undefined ? SAMPLE_MANIFEST : options.manifest;
  if (manifest !== null) {
    writeFileSync(join(moduleDir, `${name}.psd1`), manifest);
  }
  return moduleDir;
}

export function createBufferOutput() {
  const lines: string[] = [];
  return {
    output: { write: (s: string) => lines.push(s) },
    lines,
  };
}

export function createBufferLogger(level: 'debug' | 'info' | 'warn' = 'info') {
  const { output, lines } = createBufferOutput();
  return { logger: new ContextLogger({ format: 'json', level, output }), lines };
}
