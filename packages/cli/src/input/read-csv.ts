import { readFile } from 'node:fs/promises';
import { decodeCsv, parseCsvRows } from '@casetree/core';

/**
 * Read an input CSV into rows of raw cell strings.
 * The CLI owns the file access; decoding and parsing happen in core.
 */
export async function readCsvRows(path: string, encoding: string): Promise<string[][]> {
    const buffer = await readFile(path);
    return parseCsvRows(decodeCsv(buffer, encoding));
}
