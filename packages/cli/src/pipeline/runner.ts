import { IdentifierRegistry } from '@casetree/core';
import type { PipelineState, PipelineStep } from './types.js';
import { detectInputs } from './steps/inputs.js';
import { runFirstStage } from './steps/first-stage.js';
import { runSecondStage } from './steps/second-stage.js';
import { runExistenceCheck } from './steps/existence-check.js';
import { exportReports } from './steps/export.js';
import type { RunConfig, RunOptions } from '../types.js';
import type { Logger } from '../utils/logger.js';

/**
 * Orchestrates one batch run.
 * Runs each step sequentially, stopping if a fatal error occurs.
 */
export async function runPipeline(
    config: RunConfig,
    options: RunOptions,
    logger: Logger,
    runId: string
): Promise<PipelineState> {
    let state: PipelineState = {
        runId,
        config,
        options,
        logger,
        registry: new IdentifierRegistry(),
        files: [],
        stages: [],
        records: [],
        warnings: [],
        errors: [],
    };

    const steps: { name: string; fn: PipelineStep }[] = [
        { name: 'Input Detection', fn: detectInputs },
        { name: 'First Stage', fn: runFirstStage },
        { name: 'Second Stage', fn: runSecondStage },
        { name: 'Existence Check', fn: runExistenceCheck },
        { name: 'Export Reports', fn: exportReports },
    ];

    for (let i = 0; i < steps.length; i++) {
        const step = steps[i];
        logger.info(`Step ${i + 1}/${steps.length}: ${step.name}...`);

        state = await step.fn(state);

        if (state.errors.some(e => e.fatal)) {
            logger.error(`Fatal error in step "${step.name}". Stopping.`);
            break;
        }
    }

    return state;
}
