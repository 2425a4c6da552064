/**
 * Loader script (.psm1) rendering.
 */

import { DEFAULT_LAYOUT, type LayoutSettings } from '../config.js';
import type { ExportManifest } from '../module/types.js';
import { renderPsArray, quotePsString } from './ps-array.js';
import { renderTemplate } from './template.js';

/**
 * Skeleton of the generated loader script.
 *
 * Both loader stanzas dot-source every matching file, work-in-progress files
 * included; only the two lists decide what the module exports.
 */
export const LOADER_TEMPLATE = `# Generated by psmanifest. Edit the function files, not this file.

# Private functions
foreach ($file in Get-ChildItem -Path (Join-Path $PSScriptRoot {{privateDir}}) -Filter {{filter}} -Recurse -ErrorAction SilentlyContinue) {
    try {
        . $file.FullName
    } catch {
        Write-Error "Failed to load private function $($file.FullName): $_"
    }
}

# Public functions
foreach ($file in Get-ChildItem -Path (Join-Path $PSScriptRoot {{publicDir}}) -Filter {{filter}} -Recurse -ErrorAction SilentlyContinue) {
    try {
        . $file.FullName
    } catch {
        Write-Error "Failed to load public function $($file.FullName): $_"
    }
}

$FunctionsToExport = {{functions}}

$AliasesToExport = {{aliases}}

Export-ModuleMember -Function $FunctionsToExport -Alias $AliasesToExport
`;

export type LoaderLayout = Pick<LayoutSettings, 'publicDir' | 'privateDir' | 'extension' | 'lineEnding'>;

export function renderLoaderScript(manifest: ExportManifest, layout: LoaderLayout = DEFAULT_LAYOUT): string {
  const rendered = renderTemplate(LOADER_TEMPLATE, {
    privateDir: quotePsString(layout.privateDir),
    publicDir: quotePsString(layout.publicDir),
    filter: quotePsString(`*${layout.extension}`),
    functions: renderPsArray(manifest.functions),
    aliases: renderPsArray(manifest.aliases),
  });
  return layout.lineEnding === 'crlf' ? rendered.replace(/\n/g, '\r\n') : rendered;
}
