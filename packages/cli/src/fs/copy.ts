import fs from 'fs-extra';
import { errorMessage } from '../utils/errors.js';

export type CopyOutcome =
    | { status: 'copied' }
    | { status: 'source-missing' }
    | { status: 'copy-failed'; detail: string };

/**
 * Recursively copy `src` into `dst`, merging into whatever already exists at
 * `dst` (files with the same name are overwritten).
 *
 * A missing source is reported before `dst` is touched. Every other failure is
 * returned as copy-failed with the underlying message. Never throws, never
 * retries.
 */
export async function copyTree(src: string, dst: string): Promise<CopyOutcome> {
    try {
        if (!(await fs.pathExists(src))) {
            return { status: 'source-missing' };
        }

        await fs.copy(src, dst, { overwrite: true, errorOnExist: false });
        return { status: 'copied' };
    } catch (err) {
        return { status: 'copy-failed', detail: errorMessage(err) };
    }
}
