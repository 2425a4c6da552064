export { renderTemplate, templatePlaceholders } from './template.js';
export { renderPsArray, quotePsString } from './ps-array.js';
export type { PsArrayOptions } from './ps-array.js';
export { LOADER_TEMPLATE, renderLoaderScript } from './loader-script.js';
export type { LoaderLayout } from './loader-script.js';
export { MANIFEST_FIELDS, replaceManifestField, hasManifestField, detectLineEnding } from './manifest.js';
export type { ManifestField } from './manifest.js';
