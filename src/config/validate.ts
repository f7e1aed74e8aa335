import { existsSync, statSync } from 'fs';
import { isAbsolute, resolve } from 'path';
import { ConfigError } from '../errors.js';
import { hasGlobChars } from './parse.js';
import {
    DEFAULT_HEADING,
    HEADING_STYLES,
    type ConfigScheme,
    type HeadingStyle,
    type IncludeEntry,
    type ScanConfig,
    type ValidatedConfig,
} from './types.js';

export interface ValidateOptions {
    /** Directory a relative basedir resolves against (default: process.cwd()) */
    cwd?: string;
    /** Heading style chosen on the command line; wins over the file */
    heading?: string;
}

function isHeadingStyle(value: string): value is HeadingStyle {
    return HEADING_STYLES.some(style => style === value);
}

function resolveHeading(value: string | undefined, source: string): HeadingStyle | undefined {
    if (value === undefined) return undefined;
    if (isHeadingStyle(value)) return value;
    throw new ConfigError(
        'InvalidHeadingStyle',
        `Invalid heading style "${value}" from ${source}. Use ${HEADING_STYLES.join(' or ')}.`,
    );
}

/**
 * An include is a glob only when it has glob characters, no directory
 * separator, and does not name something that exists under `baseDir`.
 * `app/[id]/page.tsx` and an existing `[slug].ts` stay paths.
 */
export function classifyInclude(entry: string, baseDir: string): IncludeEntry {
    if (hasGlobChars(entry) && !/[\/\\]/.test(entry) && !existsSync(resolve(baseDir, entry))) {
        return { kind: 'glob', pattern: entry };
    }
    return { kind: 'path', path: entry };
}

/**
 * Check a parsed config, resolve its base directory and classify its includes.
 *
 * A relative basedir is resolved against `cwd` for path includes, but rejected
 * once any include is a glob, since the whole tree is then scanned.
 */
export function validateConfig(config: ScanConfig, options: ValidateOptions = {}): ValidatedConfig {
    const cwd = options.cwd ?? process.cwd();

    if (!config.baseDir) {
        throw new ConfigError('MissingBaseDir', 'basedir is required');
    }

    const baseDir = resolve(cwd, config.baseDir);

    if (!existsSync(baseDir)) {
        throw new ConfigError('BaseDirNotFound', `basedir does not exist: ${config.baseDir}\nResolved to: ${baseDir}`);
    }

    if (!statSync(baseDir).isDirectory()) {
        throw new ConfigError('BaseDirNotDirectory', `basedir is not a directory: ${baseDir}`);
    }

    if (config.includes.length === 0) {
        throw new ConfigError('NoIncludesSpecified', 'at least one include is required');
    }

    const includes = config.includes.map(entry => classifyInclude(entry, baseDir));
    const scheme: ConfigScheme = includes.some(entry => entry.kind === 'glob') ? 'glob' : 'structured';

    if (scheme === 'glob' && !isAbsolute(config.baseDir)) {
        throw new ConfigError(
            'RelativeBaseDirNotAllowed',
            `basedir must be an absolute path when includes are glob patterns: ${config.baseDir}`,
        );
    }

    const heading =
        resolveHeading(options.heading, '--heading') ??
        resolveHeading(config.heading, 'the heading directive') ??
        DEFAULT_HEADING[scheme];

    return {
        headerText: config.headerText,
        baseDir,
        includes,
        exclusions: [...config.exclusions],
        scheme,
        heading,
        unknownKeys: [...config.unknownKeys],
    };
}
