import type { ErrorRecord } from '../types/index.js';

/**
 * Names used in error record details.
 */
export interface StageContext {
    /** Basename of the CSV being read */
    document: string;
}

export interface NestedStageContext extends StageContext {
    /** Basename of the primary CSV, reported on referential-integrity failures */
    firstDocument: string;
}

export interface CheckStageContext {
    workRoot: string;
    recordMalformed: boolean;
}

export type Rejected = { outcome: 'rejected'; record: ErrorRecord };

export type FirstRowDecision =
    | { outcome: 'accepted'; identifier: string }
    | Rejected;

export type SubIdentifierDecision =
    | { outcome: 'accepted'; subIdentifier: string }
    | Rejected;

export type NestedRowDecision =
    | { outcome: 'accepted'; identifier: string; subIdentifiers: SubIdentifierDecision[] }
    | Rejected;

export type CheckRowDecision =
    | { outcome: 'check'; identifier: string; expectedPath: string }
    | { outcome: 'malformed'; reason: string; record?: ErrorRecord }
    | Rejected;
