import { mkdir, stat } from 'node:fs/promises';
import { errorCode } from '../utils/errors.js';

export const MATERIALIZE = {
    CREATED: 'created',
    ALREADY_EXISTS: 'already-exists',
    PARENT_MISSING: 'parent-missing',
} as const;

export type MaterializeOutcome = (typeof MATERIALIZE)[keyof typeof MATERIALIZE];

/**
 * Create a directory, reporting what happened instead of throwing for the
 * expected cases.
 *
 * - created: the directory (and, with createParents, its ancestors) now exists
 * - already-exists: nothing to do
 * - parent-missing: createParents is false and an ancestor is absent
 *
 * Anything else (a file in the way, permissions) is thrown.
 */
export async function ensureDir(path: string, createParents: boolean): Promise<MaterializeOutcome> {
    try {
        await mkdir(path);
        return MATERIALIZE.CREATED;
    } catch (err) {
        const code = errorCode(err);

        if (code === 'EEXIST') {
            const existing = await stat(path);
            if (!existing.isDirectory()) {
                throw new Error(`Cannot create directory ${path}: a file with that name exists`);
            }
            return MATERIALIZE.ALREADY_EXISTS;
        }

        if (code === 'ENOENT') {
            if (!createParents) {
                return MATERIALIZE.PARENT_MISSING;
            }
            await mkdir(path, { recursive: true });
            return MATERIALIZE.CREATED;
        }

        throw err;
    }
}
