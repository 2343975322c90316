/**
 * Stages module: per-row decisions for each input CSV.
 *
 * ARCHITECTURAL NOTE: Decisions only. The CLI performs the directory
 * creation, copies and error-sink writes they call for.
 */

export { decideFirstRow } from './first.js';
export { decideNestedRow } from './second.js';
export { decideCheckRow } from './check.js';
export type {
    StageContext,
    NestedStageContext,
    CheckStageContext,
    Rejected,
    FirstRowDecision,
    SubIdentifierDecision,
    NestedRowDecision,
    CheckRowDecision,
} from './types.js';
