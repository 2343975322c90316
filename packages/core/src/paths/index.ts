/**
 * Paths module: target path derivation and segment validation.
 */

export { deriveTargetPath, deriveSlotPaths, deriveSourcePath } from './derive.js';
export { validateSegment, isWithinRoot } from './validate.js';
export type { SubdirNames, SlotPaths } from './types.js';
