/**
 * Bundle pipeline:
 *
 * 1. Parse the input file (header + directives)
 * 2. Validate it and resolve the base directory
 * 3. Walk the includes, applying exclusion rules and binary sniffing
 * 4. Render the markdown document
 *
 * Nothing here writes the output file or exits the process; the CLI does.
 */

import { loadConfig } from '../config/load.js';
import { parseConfig } from '../config/parse.js';
import type { ScanConfig, ValidatedConfig } from '../config/types.js';
import { validateConfig } from '../config/validate.js';
import { collectFiles, type SelectedFile, type SkippedFile } from './reader.js';
import { renderDocument } from './render.js';

export interface BundleOptions {
    /** Directory relative paths resolve against (default: process.cwd()) */
    cwd?: string;
    /** Heading style override: 'absolute' or 'relative' */
    heading?: string;
    /** Collect and report files without rendering */
    dryRun?: boolean;
    /** Verbose logging */
    verbose?: boolean;
    /** Absolute paths never selected, such as the output file */
    ignorePaths?: string[];
}

export interface BundleResult {
    config: ValidatedConfig;
    /** Rendered document; empty when dryRun is set */
    document: Buffer;
    files: SelectedFile[];
    skipped: SkippedFile[];
    /** Directive keys the parser did not recognize */
    unknownKeys: string[];
    timing: {
        collectMs: number;
        renderMs: number;
        totalMs: number;
    };
}

export function bundle(parsed: ScanConfig, options: BundleOptions = {}): BundleResult {
    const totalStart = Date.now();
    const { verbose = false } = options;

    const config = validateConfig(parsed, { cwd: options.cwd, heading: options.heading });

    if (verbose) {
        console.log(`  Base directory: ${config.baseDir}`);
        const globs = config.includes.filter(entry => entry.kind === 'glob').length;
        const mode = globs === 0 ? 'paths' : globs === config.includes.length ? 'glob patterns' : 'paths and glob patterns';
        console.log(`  Include mode: ${mode}`);
        console.log(`  Includes: ${config.includes.map(entry => (entry.kind === 'glob' ? entry.pattern : entry.path)).join(', ')}`);
        if (config.exclusions.length > 0) {
            const rules = config.exclusions.map(rule => {
                switch (rule.kind) {
                    case 'folder': return `folder ${rule.name}`;
                    case 'extension': return `extension ${rule.pattern}`;
                    case 'path': return `file ${rule.path}`;
                    case 'glob': return `glob ${rule.pattern}`;
                }
            });
            console.log(`  Exclusions: ${rules.join(', ')}`);
        }
    }

    // ── Walk ────────────────────────────────────────────────────────────────
    const collectStart = Date.now();
    const { files, skipped } = collectFiles(config, { ignorePaths: options.ignorePaths });
    const collectMs = Date.now() - collectStart;

    if (verbose) {
        console.log(`  Selected ${files.length} file(s), skipped ${skipped.length} in ${collectMs}ms`);
    }

    // ── Render ──────────────────────────────────────────────────────────────
    let renderMs = 0;
    let document: Buffer = Buffer.alloc(0);

    if (!options.dryRun) {
        const renderStart = Date.now();
        document = renderDocument(files, { headerText: config.headerText, heading: config.heading });
        renderMs = Date.now() - renderStart;

        if (verbose) {
            console.log(`  Rendered ${(document.length / 1024).toFixed(1)}KB in ${renderMs}ms`);
        }
    }

    return {
        config,
        document,
        files,
        skipped,
        unknownKeys: config.unknownKeys,
        timing: { collectMs, renderMs, totalMs: Date.now() - totalStart },
    };
}

export function bundleFromText(text: string, options: BundleOptions = {}): BundleResult {
    return bundle(parseConfig(text), options);
}

export function bundleFromFile(inputPath: string, options: BundleOptions = {}): BundleResult {
    return bundle(loadConfig(inputPath, options.cwd), options);
}
