/**
 * One CLI run: read the input file, bundle, write the output file.
 * Everything the run depends on arrives through RunOptions.
 */

import { writeFileSync } from 'fs';
import { resolve } from 'path';
import { DEFAULT_INPUT_FILE, DEFAULT_OUTPUT_FILE } from './config/types.js';
import { bundleFromFile } from './context/gather.js';
import type { SkippedFile } from './context/reader.js';
import { OutputWriteError, describeCause } from './errors.js';

export interface RunOptions {
    input?: string;
    output?: string;
    heading?: string;
    dryRun?: boolean;
    verbose?: boolean;
    /** Directory relative paths resolve against (default: process.cwd()) */
    cwd?: string;
}

function reportSkipped(skipped: SkippedFile[], verbose: boolean): void {
    for (const entry of skipped) {
        switch (entry.reason) {
            case 'binary':
                console.warn(`Skipping binary file: ${entry.path}`);
                break;
            case 'unreadable':
                console.warn(`Warning: Could not read ${entry.path}: ${entry.detail ?? 'unknown error'}`);
                break;
            case 'missing-include':
                console.warn(`Warning: Include not found: ${entry.path} (${entry.detail ?? 'unknown error'})`);
                break;
            default:
                if (verbose) console.log(`  Excluded (${entry.reason.replace('excluded-', '')}): ${entry.path}`);
        }
    }
}

/**
 * Returns the process exit code: 0 on success (even with zero files), 1 on
 * any fatal error.
 */
export function run(options: RunOptions = {}): number {
    const cwd = options.cwd ?? process.cwd();
    const input = options.input ?? DEFAULT_INPUT_FILE;
    const output = options.output ?? DEFAULT_OUTPUT_FILE;
    const verbose = options.verbose ?? false;
    const outputPath = resolve(cwd, output);

    try {
        // Never read the previous run's output back in
        const result = bundleFromFile(input, {
            cwd,
            heading: options.heading,
            dryRun: options.dryRun,
            verbose,
            ignorePaths: [outputPath],
        });

        if (result.unknownKeys.length > 0) {
            console.warn(`Warning: Unknown config keys ignored: ${result.unknownKeys.join(', ')}`);
        }

        reportSkipped(result.skipped, verbose);

        if (result.files.length === 0) {
            console.warn('Warning: No files found matching the include/exclude patterns');
        }

        if (options.dryRun) {
            for (const file of result.files) console.log(file.relativePath);
            console.log(`${result.files.length} file(s) would be written to: ${output}`);
            return 0;
        }

        try {
            writeFileSync(outputPath, result.document);
        } catch (error) {
            throw new OutputWriteError(outputPath, error);
        }

        console.log(`Successfully processed ${result.files.length} files`);
        console.log(`Output written to: ${output}`);
        return 0;
    } catch (error) {
        console.error(`Error: ${describeCause(error)}`);
        return 1;
    }
}
