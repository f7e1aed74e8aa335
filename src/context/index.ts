export { bundle, bundleFromText, bundleFromFile } from './gather.js';
export type { BundleOptions, BundleResult } from './gather.js';

// File selection
export { collectFiles } from './reader.js';
export type { SelectedFile, SkippedFile, SkipReason, CollectResult, CollectOptions } from './reader.js';

// Rendering
export { renderDocument, headingFor } from './render.js';
export type { RenderOptions } from './render.js';

// Binary sniffing
export { isBinaryFile, isBinaryContent, SAMPLE_SIZE } from './binary.js';

// Filtering
export {
    createPathFilter,
    createGlobMatcher,
    matchesAnyPattern,
    isExcludedFolder,
    isExcludedExtension,
    isExcludedFile,
    isExcludedByGlob,
    isFileExcluded,
    hasFolderRules,
    toPosix,
} from './filter.js';
export type { PathFilter, GlobMatcher } from './filter.js';
