import { readFileSync } from 'fs';
import { resolve } from 'path';
import { InputFileError } from '../errors.js';
import { parseConfig } from './parse.js';
import type { ScanConfig } from './types.js';

/**
 * Read and parse an input file. Relative paths resolve from `cwd`.
 * Validation is left to the caller.
 */
export function loadConfig(inputPath: string, cwd: string = process.cwd()): ScanConfig {
    const absolutePath = resolve(cwd, inputPath);

    let raw: string;
    try {
        raw = readFileSync(absolutePath, 'utf-8');
    } catch (error) {
        throw new InputFileError(absolutePath, error);
    }

    return parseConfig(raw);
}
