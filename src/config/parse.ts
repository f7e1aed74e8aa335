/**
 * Input file parser.
 *
 * Format:
 *   <free-form header lines, copied to the top of the output>
 *   ---
 *   basedir=/path/to/project
 *   include=src
 *   excludefolder=node_modules
 *
 * Keys are case-insensitive. Blank lines, lines without `=` and unknown keys
 * are skipped; unknown keys are reported back so the CLI can warn about them.
 */

import type { ExclusionRule, ScanConfig } from './types.js';

const SEPARATOR = '---';

const KNOWN_KEYS = new Set<string>([
    'basedir',
    'include',
    'exclude',
    'excludefolder',
    'excludeextension',
    'excludefile',
    'heading',
]);

const GLOB_CHARS = /[*?[]/;

export function hasGlobChars(value: string): boolean {
    return GLOB_CHARS.test(value);
}

/** `json`, `.json` and `*.json` all become `*.json`. */
export function normalizeExtension(value: string): string {
    if (value.startsWith('*')) return value;
    return `*.${value.replace(/^\.+/, '')}`;
}

export function normalizeSlashes(value: string): string {
    return value.replace(/\\/g, '/');
}

export function parseConfig(text: string): ScanConfig {
    const lines = text.split('\n').map(line => (line.endsWith('\r') ? line.slice(0, -1) : line));

    const separatorIdx = lines.indexOf(SEPARATOR);
    const headerText = separatorIdx === -1 ? '' : lines.slice(0, separatorIdx).join('\n');
    const directives = separatorIdx === -1 ? [] : lines.slice(separatorIdx + 1);

    let baseDir = '';
    let heading: string | undefined;
    const includes: string[] = [];
    const exclusions: ExclusionRule[] = [];
    const unknownKeys: string[] = [];

    for (const line of directives) {
        if (line === '') continue;

        const eq = line.indexOf('=');
        if (eq === -1) continue;

        const key = line.slice(0, eq).trim().toLowerCase();
        const value = line.slice(eq + 1).trim();

        if (!KNOWN_KEYS.has(key)) {
            if (!unknownKeys.includes(key)) unknownKeys.push(key);
            continue;
        }

        if (key === 'basedir') {
            baseDir = value;
            continue;
        }

        if (!value) continue;

        switch (key) {
            case 'include':
                includes.push(value);
                break;
            case 'exclude':
                exclusions.push({ kind: 'glob', pattern: value });
                break;
            case 'excludefolder':
                exclusions.push({ kind: 'folder', name: value });
                break;
            case 'excludeextension':
                exclusions.push({ kind: 'extension', pattern: normalizeExtension(value) });
                break;
            case 'excludefile':
                exclusions.push({ kind: 'path', path: normalizeSlashes(value) });
                break;
            case 'heading':
                heading = value.toLowerCase();
                break;
        }
    }

    return { headerText, baseDir, includes, exclusions, heading, unknownKeys };
}
