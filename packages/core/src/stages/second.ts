import { ERROR_KIND, STAGE } from '../types/index.js';
import type { IdentifierRegistry } from '../registry/index.js';
import { validateSegment } from '../paths/index.js';
import { isBlank } from '../utils/csv.js';
import type { NestedRowDecision, NestedStageContext, SubIdentifierDecision } from './types.js';

/**
 * Decide what happens to one row of the nested CSV.
 *
 * Order of checks:
 * 1. the identifier must have been accepted by the primary stage
 * 2. at least one non-blank sub-identifier column
 * 3. the identifier must not repeat within this stage
 *
 * Sub-identifiers are then deduplicated against the run-wide sub-identifier
 * set, in column order. Blank cells (e.g. trailing commas) are ignored.
 */
export function decideNestedRow(
    row: readonly string[],
    registry: IdentifierRegistry,
    context: NestedStageContext
): NestedRowDecision {
    const identifier = row[0] ?? '';

    if (!registry.seen(STAGE.FIRST, identifier)) {
        return {
            outcome: 'rejected',
            record: {
                subject: identifier,
                kind: ERROR_KIND.ENTRY_MISSING_FROM_FIRST_CSV,
                detail: context.firstDocument,
            },
        };
    }

    const cells = row.slice(1).filter((cell) => !isBlank(cell));
    if (cells.length === 0) {
        return {
            outcome: 'rejected',
            record: { subject: identifier, kind: ERROR_KIND.NO_ENTRIES, detail: context.document },
        };
    }

    if (registry.seen(STAGE.SECOND, identifier)) {
        return {
            outcome: 'rejected',
            record: { subject: identifier, kind: ERROR_KIND.DUPLICATE_ENTRY, detail: context.document },
        };
    }

    registry.mark(STAGE.SECOND, identifier);

    const subIdentifiers: SubIdentifierDecision[] = cells.map((subIdentifier): SubIdentifierDecision => {
        const invalid = validateSegment(subIdentifier);
        if (invalid) {
            return {
                outcome: 'rejected',
                record: { subject: subIdentifier, kind: ERROR_KIND.INVALID_IDENTIFIER, detail: invalid },
            };
        }
        if (registry.seenSub(subIdentifier)) {
            return {
                outcome: 'rejected',
                record: { subject: subIdentifier, kind: ERROR_KIND.DUPLICATE_SUBID, detail: identifier },
            };
        }
        registry.markSub(subIdentifier);
        return { outcome: 'accepted', subIdentifier };
    });

    return { outcome: 'accepted', identifier, subIdentifiers };
}
