/**
 * File Reader - walks the configured includes and selects text files.
 *
 * Includes are handled in config order. A path include is walked on its own;
 * a run of consecutive glob includes walks the whole base directory once and
 * keeps files whose base name matches any of them. Either way, children are
 * visited in sorted name order, folder rules prune whole subtrees and every
 * selected file is sniffed for binary content.
 */

import { readdirSync, statSync, type Dirent, type Stats } from 'fs';
import { basename, join, posix, resolve } from 'path';
import type { IncludeEntry, ValidatedConfig } from '../config/types.js';
import { TraversalError, describeCause } from '../errors.js';
import { isBinaryFile } from './binary.js';
import { createGlobMatcher, createPathFilter, toPosix, type GlobMatcher, type PathFilter } from './filter.js';

export interface SelectedFile {
    /** Path shown for relative headings, forward slashes */
    relativePath: string;
    absolutePath: string;
}

export type SkipReason =
    | 'excluded-folder'
    | 'excluded-extension'
    | 'excluded-file'
    | 'excluded-glob'
    | 'binary'
    | 'unreadable'
    | 'missing-include';

export interface SkippedFile {
    path: string;
    reason: SkipReason;
    /** Underlying error message for unreadable paths */
    detail?: string;
}

export interface CollectResult {
    files: SelectedFile[];
    skipped: SkippedFile[];
}

export interface CollectOptions {
    /** Absolute paths never selected, such as the file the output goes to */
    ignorePaths?: string[];
}

interface WalkContext {
    filter: PathFilter;
    /** Set while walking for glob includes; files must match it to be candidates */
    includeMatcher?: GlobMatcher;
    ignored: Set<string>;
    files: SelectedFile[];
    skipped: SkippedFile[];
    seen: Set<string>;
}

const EXCLUSION_REASONS: Record<'extension' | 'path' | 'glob', SkipReason> = {
    extension: 'excluded-extension',
    path: 'excluded-file',
    glob: 'excluded-glob',
};

function byName(a: Dirent, b: Dirent): number {
    if (a.name < b.name) return -1;
    if (a.name > b.name) return 1;
    return 0;
}

function joinRelative(prefix: string, name: string): string {
    return prefix ? `${prefix}/${name}` : name;
}

/** `./src/` -> `src`, `.` -> `` */
function includePrefix(entry: string): string {
    const normalized = posix.normalize(toPosix(entry)).replace(/\/+$/, '');
    return normalized === '.' ? '' : normalized;
}

/** `[path a, glob x, glob y, path b]` -> `[a], [x, y], [b]` */
function groupIncludes(includes: IncludeEntry[]): Array<string | string[]> {
    const groups: Array<string | string[]> = [];
    for (const entry of includes) {
        if (entry.kind === 'path') {
            groups.push(entry.path);
            continue;
        }
        const last = groups[groups.length - 1];
        if (Array.isArray(last)) last.push(entry.pattern);
        else groups.push([entry.pattern]);
    }
    return groups;
}

/**
 * Select the files a config describes, in output order.
 */
export function collectFiles(config: ValidatedConfig, options: CollectOptions = {}): CollectResult {
    const ctx: WalkContext = {
        filter: createPathFilter(config.exclusions, config.baseDir),
        ignored: new Set((options.ignorePaths ?? []).map(path => resolve(path))),
        files: [],
        skipped: [],
        seen: new Set(),
    };

    for (const group of groupIncludes(config.includes)) {
        if (typeof group === 'string') {
            ctx.includeMatcher = undefined;
            collectInclude(config.baseDir, group, ctx);
        } else {
            ctx.includeMatcher = createGlobMatcher(group);
            walkDir(config.baseDir, '', ctx);
        }
    }

    return { files: ctx.files, skipped: ctx.skipped };
}

function collectInclude(baseDir: string, entry: string, ctx: WalkContext): void {
    const absolutePath = resolve(baseDir, entry);
    const relativePath = includePrefix(entry);

    let stats: Stats;
    try {
        stats = statSync(absolutePath);
    } catch (error) {
        ctx.skipped.push({ path: entry, reason: 'missing-include', detail: describeCause(error) });
        return;
    }

    if (stats.isDirectory()) {
        walkDir(absolutePath, relativePath, ctx);
    } else if (stats.isFile()) {
        considerFile(absolutePath, relativePath, ctx);
    } else {
        ctx.skipped.push({ path: entry, reason: 'missing-include', detail: 'not a regular file or directory' });
    }
}

/**
 * Walk `dirPath`, emitting files as `relPrefix/<path inside dirPath>`.
 * The directory passed in is always walked; folder rules apply to what is
 * found beneath it.
 */
function walkDir(dirPath: string, relPrefix: string, ctx: WalkContext): void {
    let entries: Dirent[];
    try {
        entries = readdirSync(dirPath, { withFileTypes: true });
    } catch (error) {
        throw new TraversalError(dirPath, error);
    }

    entries.sort(byName);

    for (const entry of entries) {
        const fullPath = join(dirPath, entry.name);
        const relPath = joinRelative(relPrefix, entry.name);

        if (entry.isDirectory()) {
            if (ctx.filter.prunes(fullPath)) {
                ctx.skipped.push({ path: relPath, reason: 'excluded-folder' });
                continue;
            }
            walkDir(fullPath, relPath, ctx);
            continue;
        }

        if (entry.isSymbolicLink()) {
            // Linked files are read through the link; linked directories are not followed
            let target: Stats;
            try {
                target = statSync(fullPath);
            } catch (error) {
                ctx.skipped.push({ path: relPath, reason: 'unreadable', detail: describeCause(error) });
                continue;
            }
            if (target.isFile()) considerFile(fullPath, relPath, ctx);
            continue;
        }

        if (entry.isFile()) {
            considerFile(fullPath, relPath, ctx);
        }
    }
}

function considerFile(absolutePath: string, relativePath: string, ctx: WalkContext): void {
    if (ctx.ignored.has(absolutePath)) return;
    if (ctx.includeMatcher && !ctx.includeMatcher(basename(absolutePath))) return;

    const excludedBy = ctx.filter.excludedBy(absolutePath);
    if (excludedBy) {
        ctx.skipped.push({ path: relativePath, reason: EXCLUSION_REASONS[excludedBy] });
        return;
    }

    if (ctx.seen.has(absolutePath)) return;

    let binary: boolean;
    try {
        binary = isBinaryFile(absolutePath);
    } catch (error) {
        ctx.skipped.push({ path: relativePath, reason: 'unreadable', detail: describeCause(error) });
        return;
    }

    if (binary) {
        ctx.skipped.push({ path: relativePath, reason: 'binary' });
        return;
    }

    ctx.seen.add(absolutePath);
    ctx.files.push({ relativePath, absolutePath });
}
