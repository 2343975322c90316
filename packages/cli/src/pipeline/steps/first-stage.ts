import { basename } from 'node:path';
import { STAGE } from '@casetree/shared';
import { decideFirstRow, deriveSlotPaths, deriveSourcePath, deriveTargetPath } from '@casetree/core';
import type { PipelineStep } from '../types.js';
import { copyInto, materialize, runStage } from '../stage.js';

/**
 * Step 2: First Stage
 * One top-level folder per identifier in the primary CSV, each with both
 * configured sub-folders, and the homepage source copied into its slot.
 */
export const runFirstStage: PipelineStep = async (state) => {
    const { config, registry } = state;
    const context = { document: basename(config.inputs.first) };

    await runStage(
        state,
        {
            stage: STAGE.FIRST,
            input: config.inputs.first,
            errorFile: config.errors.first,
            encoding: config.encoding.input,
        },
        async (row, ctx) => {
            const decision = decideFirstRow(row, registry, context);
            if (decision.outcome === 'rejected') {
                await ctx.emit(decision.record);
                return;
            }

            const { identifier } = decision;
            ctx.accepted();

            await materialize(state, ctx, identifier, deriveTargetPath(config.target, identifier), true);

            const slots = deriveSlotPaths(config.target, identifier, config.subdirs);
            const homepageReady = await materialize(state, ctx, identifier, slots.homepage, false);
            await materialize(state, ctx, identifier, slots.individualGate, false);

            if (homepageReady) {
                await copyInto(
                    state,
                    ctx,
                    identifier,
                    deriveSourcePath(config.sources.homepage, identifier),
                    slots.homepage
                );
            }
        }
    );

    return state;
};
