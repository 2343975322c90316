import { CHECK_ROW_COLUMNS, ERROR_KIND } from '../types/index.js';
import { deriveTargetPath, isWithinRoot, validateSegment } from '../paths/index.js';
import type { CheckRowDecision, CheckStageContext } from './types.js';

/**
 * Decide what to verify for one data row of the existence-check CSV.
 *
 * Rows are `(id, subdir, filename)`. Short rows are malformed: by default they
 * are only reported back as a reason, with `recordMalformed` they also carry a
 * NO_ENTRIES record. The subdir and filename may name nested paths, as long
 * as the result stays under the work root.
 */
export function decideCheckRow(row: readonly string[], context: CheckStageContext): CheckRowDecision {
    if (row.length < CHECK_ROW_COLUMNS) {
        const reason = `expected ${CHECK_ROW_COLUMNS} columns, got ${row.length}`;
        if (!context.recordMalformed) {
            return { outcome: 'malformed', reason };
        }
        return {
            outcome: 'malformed',
            reason,
            record: { subject: row[0] ?? '', kind: ERROR_KIND.NO_ENTRIES, detail: reason },
        };
    }

    const [identifier, subdir, filename] = row;

    const invalid = validateSegment(identifier);
    if (invalid) {
        return {
            outcome: 'rejected',
            record: { subject: identifier, kind: ERROR_KIND.INVALID_IDENTIFIER, detail: invalid },
        };
    }

    const expectedPath = deriveTargetPath(context.workRoot, identifier, [subdir, filename]);
    if (!isWithinRoot(context.workRoot, expectedPath)) {
        return {
            outcome: 'rejected',
            record: {
                subject: identifier,
                kind: ERROR_KIND.INVALID_IDENTIFIER,
                detail: `${expectedPath} is outside ${context.workRoot}`,
            },
        };
    }

    return { outcome: 'check', identifier, expectedPath };
}
