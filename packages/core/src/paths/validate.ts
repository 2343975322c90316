/**
 * Segment validation for values read from input rows.
 *
 * Identifiers and sub-identifiers become folder names verbatim, so anything
 * that would not stay a single folder under the work root is rejected here.
 */

import { isAbsolute, relative, sep } from 'node:path';

/**
 * Returns the reason a value cannot be used as one path segment, or null.
 */
export function validateSegment(value: string): string | null {
    if (value === '') {
        return 'empty value';
    }
    if (value === '.' || value === '..') {
        return `"${value}" is a relative path reference`;
    }
    if (value.includes('\0')) {
        return 'contains a NUL character';
    }
    if (/[\\/]/.test(value)) {
        return 'contains a path separator';
    }
    return null;
}

/**
 * True if `candidate` is `root` itself or lies beneath it.
 */
export function isWithinRoot(root: string, candidate: string): boolean {
    const rel = relative(root, candidate);
    if (rel === '') {
        return true;
    }
    return !isAbsolute(rel) && rel !== '..' && !rel.startsWith(`..${sep}`);
}
