import { basename } from 'node:path';
import { STAGE } from '@casetree/shared';
import type { Stage } from '@casetree/shared';
import type { PipelineStep, InputFile } from '../types.js';
import { hashFile } from '../../utils/hash.js';
import { errorMessage } from '../../utils/errors.js';

/**
 * Step 1: Input Detection
 * Hashes every input CSV taking part in the run, for the run manifest.
 */
export const detectInputs: PipelineStep = async (state) => {
    const { inputs } = state.config;
    const planned: { stage: Stage; path: string }[] = [
        { stage: STAGE.FIRST, path: inputs.first },
        { stage: STAGE.SECOND, path: inputs.second },
    ];
    if (inputs.third !== undefined && !state.options.skipCheck) {
        planned.push({ stage: STAGE.CHECK, path: inputs.third });
    }

    const files: InputFile[] = [];
    for (const { stage, path } of planned) {
        try {
            files.push({ stage, path, filename: basename(path), hash: await hashFile(path) });
        } catch (err) {
            state.errors.push({
                step: 'inputs',
                message: `Cannot read input CSV ${path}: ${errorMessage(err)}`,
                fatal: true,
                error: err,
            });
        }
    }

    state.files = files;
    return state;
};
