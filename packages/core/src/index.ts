// Types (re-exported from shared)
export type { ErrorKind, ErrorRecord, Stage } from './types/index.js';

// Registry
export { IdentifierRegistry } from './registry/index.js';

// Paths
export {
    deriveTargetPath,
    deriveSlotPaths,
    deriveSourcePath,
    validateSegment,
    isWithinRoot,
} from './paths/index.js';
export type { SubdirNames, SlotPaths } from './paths/index.js';

// Stages
export { decideFirstRow, decideNestedRow, decideCheckRow } from './stages/index.js';
export type {
    StageContext,
    NestedStageContext,
    CheckStageContext,
    FirstRowDecision,
    SubIdentifierDecision,
    NestedRowDecision,
    CheckRowDecision,
} from './stages/index.js';

// Utils
export { stripBom, isBlank, decodeCsv, parseCsvRows, isSupportedEncoding } from './utils/index.js';
