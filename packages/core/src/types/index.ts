/**
 * Re-export types from shared package.
 * Core package uses these types but doesn't define them.
 */
export type {
    ErrorKind,
    ErrorRecord,
    Stage,
} from '@casetree/shared';

export {
    ERROR_KIND,
    STAGE,
    CHECK_ROW_COLUMNS,
} from '@casetree/shared';
