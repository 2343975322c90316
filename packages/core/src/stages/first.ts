import { ERROR_KIND, STAGE } from '../types/index.js';
import type { IdentifierRegistry } from '../registry/index.js';
import { validateSegment } from '../paths/index.js';
import { isBlank } from '../utils/csv.js';
import type { FirstRowDecision, StageContext } from './types.js';

/**
 * Decide what happens to one row of the primary CSV.
 *
 * Column 0 is the identifier. The first sighting is accepted and registered;
 * later sightings are DUPLICATE_ENTRY and must not touch the filesystem.
 *
 * Mutates the registry on acceptance only.
 */
export function decideFirstRow(
    row: readonly string[],
    registry: IdentifierRegistry,
    context: StageContext
): FirstRowDecision {
    const identifier = row[0] ?? '';

    if (isBlank(identifier)) {
        return {
            outcome: 'rejected',
            record: { subject: identifier, kind: ERROR_KIND.NO_ENTRIES, detail: context.document },
        };
    }

    const invalid = validateSegment(identifier);
    if (invalid) {
        return {
            outcome: 'rejected',
            record: { subject: identifier, kind: ERROR_KIND.INVALID_IDENTIFIER, detail: invalid },
        };
    }

    if (registry.seen(STAGE.FIRST, identifier)) {
        return {
            outcome: 'rejected',
            record: { subject: identifier, kind: ERROR_KIND.DUPLICATE_ENTRY, detail: context.document },
        };
    }

    registry.mark(STAGE.FIRST, identifier);
    return { outcome: 'accepted', identifier };
}
