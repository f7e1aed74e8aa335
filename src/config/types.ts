// ── Exclusion rules ─────────────────────────────────────────────────────────

export type ExclusionRule =
    /** Directory name; matching subtrees are pruned */
    | { kind: 'folder'; name: string }
    /** Normalized `*.ext` pattern, compared case-sensitively */
    | { kind: 'extension'; pattern: string }
    /** Path relative to the base directory, or a bare filename */
    | { kind: 'path'; path: string }
    /** Single-level glob matched against the file's base name */
    | { kind: 'glob'; pattern: string };

export type ExclusionKind = ExclusionRule['kind'];

/**
 * How one include is read. A path names a file or directory under the base
 * directory; a glob is tested against the base name of every file in the tree.
 */
export type IncludeEntry =
    | { kind: 'path'; path: string }
    | { kind: 'glob'; pattern: string };

/**
 * `structured`: every include is a path.
 * `glob`: at least one include is a base-name glob, so the whole tree is walked.
 */
export type ConfigScheme = 'structured' | 'glob';

/** What the heading above each file shows. */
export type HeadingStyle = 'absolute' | 'relative';

export const HEADING_STYLES: readonly HeadingStyle[] = ['absolute', 'relative'];

// ── Config ──────────────────────────────────────────────────────────────────

export interface ScanConfig {
    headerText: string;
    /** As written in the file; resolved by validateConfig */
    baseDir: string;
    includes: string[];
    exclusions: ExclusionRule[];
    /** Raw `heading` directive value, if present */
    heading?: string;
    /** Directive keys that were not recognized */
    unknownKeys: string[];
}

export interface ValidatedConfig extends Omit<ScanConfig, 'heading' | 'includes'> {
    /** Absolute path of an existing directory */
    baseDir: string;
    /** Includes in config order, each classified against the base directory */
    includes: IncludeEntry[];
    scheme: ConfigScheme;
    heading: HeadingStyle;
}

export const DEFAULT_INPUT_FILE = 'input.txt';
export const DEFAULT_OUTPUT_FILE = 'output.txt';

/** Heading used when neither the config nor the CLI chooses one. */
export const DEFAULT_HEADING: Record<ConfigScheme, HeadingStyle> = {
    structured: 'absolute',
    glob: 'relative',
};
