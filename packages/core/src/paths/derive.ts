/**
 * Target path derivation.
 *
 * ARCHITECTURAL NOTE: Pure joins only. No normalization, no symlink
 * resolution, no existence checks. Callers validate segments first.
 */

import { join } from 'node:path';
import type { SlotPaths, SubdirNames } from './types.js';

/**
 * Derive `workRoot/identifier[/...segments][/subIdentifier]`.
 *
 * @param workRoot - Root of the materialized tree
 * @param identifier - Top-level folder name
 * @param segments - Configured sub-folder names, in order
 * @param subIdentifier - Optional trailing folder name
 */
export function deriveTargetPath(
    workRoot: string,
    identifier: string,
    segments: readonly string[] = [],
    subIdentifier?: string
): string {
    const parts = [workRoot, identifier, ...segments];
    if (subIdentifier !== undefined) {
        parts.push(subIdentifier);
    }
    return join(...parts);
}

/**
 * The two canonical slots created under every accepted identifier.
 */
export function deriveSlotPaths(workRoot: string, identifier: string, subdirs: SubdirNames): SlotPaths {
    return {
        homepage: deriveTargetPath(workRoot, identifier, [subdirs.homepage]),
        individualGate: deriveTargetPath(workRoot, identifier, [subdirs.individualGate]),
    };
}

/**
 * Folder searched for under a copy-source root.
 */
export function deriveSourcePath(sourceRoot: string, key: string): string {
    return join(sourceRoot, key);
}
