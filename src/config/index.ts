export { parseConfig, normalizeExtension, normalizeSlashes, hasGlobChars } from './parse.js';
export { validateConfig, classifyInclude } from './validate.js';
export type { ValidateOptions } from './validate.js';
export { loadConfig } from './load.js';
export {
    DEFAULT_HEADING,
    DEFAULT_INPUT_FILE,
    DEFAULT_OUTPUT_FILE,
    HEADING_STYLES,
} from './types.js';
export type {
    ConfigScheme,
    ExclusionKind,
    ExclusionRule,
    HeadingStyle,
    IncludeEntry,
    ScanConfig,
    ValidatedConfig,
} from './types.js';
