/**
 * Binary sniffing: looks at the first 512 bytes of a file.
 *
 * A file is binary when the sample contains a NUL byte or is not valid UTF-8.
 * When the file is longer than the sample, a multi-byte sequence cut off by the
 * end of the sample is not counted against it.
 */

import { closeSync, fstatSync, openSync, readSync } from 'fs';
import { TextDecoder } from 'util';

export const SAMPLE_SIZE = 512;

/**
 * Classify a sample of raw bytes.
 * @param truncated - the file continues past the end of `sample`
 */
export function isBinaryContent(sample: Uint8Array, truncated: boolean = false): boolean {
    if (sample.includes(0)) return true;

    const decoder = new TextDecoder('utf-8', { fatal: true });
    try {
        decoder.decode(sample, { stream: truncated });
        return false;
    } catch {
        return true;
    }
}

/** Read the first bytes of `path` and classify them. I/O errors propagate. */
export function isBinaryFile(path: string): boolean {
    const fd = openSync(path, 'r');
    try {
        const buffer = Buffer.alloc(SAMPLE_SIZE);
        const bytesRead = readSync(fd, buffer, 0, SAMPLE_SIZE, 0);
        const truncated = fstatSync(fd).size > bytesRead;
        return isBinaryContent(buffer.subarray(0, bytesRead), truncated);
    } finally {
        closeSync(fd);
    }
}
