#!/usr/bin/env node

/**
 * ctxcat CLI
 *
 * Concatenate selected source files into one markdown document.
 */

import { Command } from 'commander';
import { createRequire } from 'module';
import { DEFAULT_INPUT_FILE, DEFAULT_OUTPUT_FILE, HEADING_STYLES } from './config/types.js';
import { run } from './run.js';

interface CliOptions {
    input: string;
    output: string;
    heading?: string;
    dryRun?: boolean;
    verbose?: boolean;
}

const require = createRequire(import.meta.url);
const pkg = require('../package.json') as { version: string };

const program = new Command();

program
    .name('ctxcat')
    .description('Concatenate source files into a single markdown document')
    .version(pkg.version)
    .option('-i, --input <file>', 'Config file path', DEFAULT_INPUT_FILE)
    .option('-o, --output <file>', 'Output file path', DEFAULT_OUTPUT_FILE)
    .option('--heading <style>', `File heading: ${HEADING_STYLES.join(' or ')} path`)
    .option('--dry-run', 'List the selected files without writing output')
    .option('--verbose', 'Verbose output')
    .action(() => {
        const options = program.opts<CliOptions>();
        process.exit(run(options));
    });

// Parse arguments and run
program.parse();
