/**
 * Path Filter - exclusion rules applied while walking:
 * 1. folder: directory name equality, prunes the whole subtree
 * 2. extension: `*.ext` glob against the file's base name, case-sensitive
 * 3. path: relative path from the base directory, or bare filename
 * 4. glob: single-level glob against the file's base name
 *
 * Globs go through `ignore` in case-sensitive mode. Only base names are ever
 * tested, so a pattern containing `/` never matches and `**` acts like `*`.
 */

import ignore from 'ignore';
import { basename, relative, sep } from 'path';
import type { ExclusionKind, ExclusionRule } from '../config/types.js';

export type GlobMatcher = (baseName: string) => boolean;

/** Convert a native relative path to forward slashes. */
export function toPosix(path: string): string {
    return sep === '/' ? path : path.split(sep).join('/');
}

export function createGlobMatcher(patterns: string[]): GlobMatcher {
    if (patterns.length === 0) return () => false;
    const ig = ignore({ ignorecase: false }).add(patterns);
    // ignore() rejects names like `..`; those never match
    return (baseName: string) => ignore.isPathValid(baseName) && ig.ignores(baseName);
}

/** True if `baseName` matches any of the glob patterns. */
export function matchesAnyPattern(baseName: string, patterns: string[]): boolean {
    return createGlobMatcher(patterns)(baseName);
}

// ── Single-rule checks ──────────────────────────────────────────────────────

export function isExcludedFolder(dirPath: string, rules: ExclusionRule[]): boolean {
    const name = basename(dirPath);
    return rules.some(rule => rule.kind === 'folder' && rule.name === name);
}

function extensionPatterns(rules: ExclusionRule[]): string[] {
    return rules.flatMap(rule => (rule.kind === 'extension' ? [rule.pattern] : []));
}

function globPatterns(rules: ExclusionRule[]): string[] {
    return rules.flatMap(rule => (rule.kind === 'glob' ? [rule.pattern] : []));
}

/** `*.json`, `*.min.js` and `*.ts*` all match against the base name. */
export function isExcludedExtension(filePath: string, rules: ExclusionRule[]): boolean {
    return matchesAnyPattern(basename(filePath), extensionPatterns(rules));
}

export function isExcludedFile(filePath: string, baseDir: string, rules: ExclusionRule[]): boolean {
    const relPath = toPosix(relative(baseDir, filePath));
    const name = basename(filePath);
    return rules.some(rule => rule.kind === 'path' && (rule.path === relPath || rule.path === name));
}

export function isExcludedByGlob(baseName: string, rules: ExclusionRule[]): boolean {
    return matchesAnyPattern(baseName, globPatterns(rules));
}

/**
 * True if any file-level rule (extension, path or glob) excludes `filePath`.
 * Folder rules are left to the walker, which prunes on them.
 */
export function isFileExcluded(filePath: string, baseDir: string, rules: ExclusionRule[]): boolean {
    return createPathFilter(rules, baseDir).excludedBy(filePath) !== undefined;
}

export function hasFolderRules(rules: ExclusionRule[]): boolean {
    return rules.some(rule => rule.kind === 'folder');
}

// ── Compiled filter ─────────────────────────────────────────────────────────

export interface PathFilter {
    /** Should the walker skip this directory and everything below it? */
    prunes(dirPath: string): boolean;
    /** Which rule kind excludes this file, if any */
    excludedBy(filePath: string): Exclude<ExclusionKind, 'folder'> | undefined;
}

/**
 * Build a filter for one run. Glob patterns are compiled once instead of per
 * file.
 */
export function createPathFilter(rules: ExclusionRule[], baseDir: string): PathFilter {
    const matchesExtension = createGlobMatcher(extensionPatterns(rules));
    const matchesGlob = createGlobMatcher(globPatterns(rules));
    const pruning = hasFolderRules(rules);

    return {
        prunes(dirPath: string): boolean {
            return pruning && isExcludedFolder(dirPath, rules);
        },
        excludedBy(filePath: string) {
            const name = basename(filePath);
            if (matchesExtension(name)) return 'extension';
            if (isExcludedFile(filePath, baseDir, rules)) return 'path';
            if (matchesGlob(name)) return 'glob';
            return undefined;
        },
    };
}
