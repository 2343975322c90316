import fs from 'fs-extra';
import { ERROR_KIND, STAGE } from '@casetree/shared';
import { decideCheckRow } from '@casetree/core';
import type { PipelineStep } from '../types.js';
import { runStage } from '../stage.js';

/**
 * Step 4: Existence Check
 * Verifies that every (id, subdir, filename) in the third CSV exists under
 * the work root. Reads only; creates nothing.
 */
export const runExistenceCheck: PipelineStep = async (state) => {
    const { config, logger } = state;
    const input = config.inputs.third;

    if (input === undefined) {
        logger.info('No existence-check CSV configured; skipping.');
        return state;
    }
    if (state.options.skipCheck) {
        state.warnings.push('Existence check skipped (--skip-check).');
        return state;
    }

    const context = { workRoot: config.target, recordMalformed: config.check.recordMalformed };

    await runStage(
        state,
        {
            stage: STAGE.CHECK,
            input,
            errorFile: config.errors.third,
            encoding: config.encoding.third,
            skipHeader: true,
        },
        async (row, ctx) => {
            const decision = decideCheckRow(row, context);

            switch (decision.outcome) {
                case 'malformed':
                    logger.warn(`Skipping malformed row [${row.join(', ')}]: ${decision.reason}`, {
                        stage: STAGE.CHECK,
                    });
                    if (decision.record) {
                        await ctx.emit(decision.record);
                    }
                    return;
                case 'rejected':
                    await ctx.emit(decision.record);
                    return;
                case 'check':
                    if (await fs.pathExists(decision.expectedPath)) {
                        ctx.accepted();
                        return;
                    }
                    await ctx.emit({
                        subject: decision.identifier,
                        kind: ERROR_KIND.ERROR_MISSING_FILE,
                        detail: decision.expectedPath,
                    });
                    return;
            }
        }
    );

    return state;
};
