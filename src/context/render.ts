/**
 * Markdown output: header text, then one section per file.
 *
 *   # <heading>
 *   ```
 *   <file bytes, unchanged>
 *   ```
 *
 * Fences inside file content are not escaped.
 */

import { readFileSync } from 'fs';
import type { HeadingStyle } from '../config/types.js';
import { describeCause } from '../errors.js';
import type { SelectedFile } from './reader.js';

export interface RenderOptions {
    headerText: string;
    heading: HeadingStyle;
    /** Content source; defaults to reading the file from disk */
    readContent?: (file: SelectedFile) => Buffer;
}

const FENCE = '```';

export function headingFor(file: SelectedFile, style: HeadingStyle): string {
    return style === 'absolute' ? file.absolutePath : file.relativePath;
}

function readFromDisk(file: SelectedFile): Buffer {
    try {
        return readFileSync(file.absolutePath);
    } catch (error) {
        throw new Error(`Failed to read file: ${file.absolutePath} (${describeCause(error)})`);
    }
}

/**
 * Render the document. Files are read one at a time, in order.
 */
export function renderDocument(files: SelectedFile[], options: RenderOptions): Buffer {
    const readContent = options.readContent ?? readFromDisk;
    const chunks: Buffer[] = [];

    if (options.headerText) {
        chunks.push(Buffer.from(`${options.headerText}\n\n`, 'utf-8'));
    }

    for (const file of files) {
        chunks.push(Buffer.from(`# ${headingFor(file, options.heading)}\n${FENCE}\n`, 'utf-8'));
        chunks.push(readContent(file));
        chunks.push(Buffer.from(`\n${FENCE}\n\n`, 'utf-8'));
    }

    return Buffer.concat(chunks);
}
