/**
 * CSV parsing utilities.
 *
 * ARCHITECTURAL NOTE: Receives raw bytes from the CLI. No file access here.
 */

import { parse } from 'csv-parse/sync';
import { z } from 'zod';

const RowsSchema = z.array(z.array(z.string()));

/**
 * Strip UTF-8 Byte Order Mark (BOM) from a string if present.
 * BOM (\uFEFF) would otherwise become part of the first identifier.
 */
export function stripBom(value: string): string {
    if (value.startsWith('\uFEFF')) {
        return value.slice(1);
    }
    return value;
}

/**
 * True for cells that carry no value (empty or whitespace only).
 */
export function isBlank(value: string): boolean {
    return value.trim() === '';
}

/**
 * Decode file contents with a WHATWG encoding label (utf-8, windows-1252, ...).
 *
 * Bytes not valid in the encoding throw instead of becoming U+FFFD.
 *
 * @throws RangeError if the label is not a supported encoding
 * @throws TypeError if the data is not valid in that encoding
 */
export function decodeCsv(data: Uint8Array, encoding: string): string {
    return stripBom(new TextDecoder(encoding, { fatal: true }).decode(data));
}

/**
 * Split CSV text into rows of raw cell strings.
 *
 * Rows may have any number of columns. Blank lines are dropped; cell values
 * are returned untrimmed. A quote inside an unquoted cell is kept as a literal
 * character.
 */
export function parseCsvRows(text: string): string[][] {
    const records: unknown = parse(text, {
        relax_column_count: true,
        relax_quotes: true,
        skip_empty_lines: true,
    });
    return RowsSchema.parse(records);
}

/**
 * Check that an encoding label is supported by this runtime.
 */
export function isSupportedEncoding(encoding: string): boolean {
    try {
        new TextDecoder(encoding);
        return true;
    } catch {
        return false;
    }
}
