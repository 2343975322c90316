import { basename } from 'node:path';
import { STAGE } from '@casetree/shared';
import { decideNestedRow, deriveSourcePath, deriveTargetPath } from '@casetree/core';
import type { PipelineStep } from '../types.js';
import { copyInto, runStage } from '../stage.js';

/**
 * Step 3: Second Stage
 * Copies each sub-identifier's source folder under its parent's individual
 * gate folder. Parents must have been accepted by the first stage.
 */
export const runSecondStage: PipelineStep = async (state) => {
    const { config, registry } = state;
    const context = {
        document: basename(config.inputs.second),
        firstDocument: basename(config.inputs.first),
    };

    await runStage(
        state,
        {
            stage: STAGE.SECOND,
            input: config.inputs.second,
            errorFile: config.errors.second,
            encoding: config.encoding.input,
        },
        async (row, ctx) => {
            const decision = decideNestedRow(row, registry, context);
            if (decision.outcome === 'rejected') {
                await ctx.emit(decision.record);
                return;
            }

            const { identifier } = decision;
            ctx.accepted();

            for (const sub of decision.subIdentifiers) {
                if (sub.outcome === 'rejected') {
                    await ctx.emit(sub.record);
                    continue;
                }

                await copyInto(
                    state,
                    ctx,
                    sub.subIdentifier,
                    deriveSourcePath(config.sources.individualGate, sub.subIdentifier),
                    deriveTargetPath(config.target, identifier, [config.subdirs.individualGate], sub.subIdentifier)
                );
            }
        }
    );

    return state;
};
