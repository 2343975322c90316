import type { ErrorRecord, Stage, StageSummary } from '@casetree/shared';
import type { IdentifierRegistry } from '@casetree/core';
import type { RunConfig, RunOptions } from '../types.js';
import type { Logger } from '../utils/logger.js';

/**
 * An input CSV taking part in the run.
 */
export interface InputFile {
    stage: Stage;
    path: string;
    filename: string;
    hash: string;
}

/**
 * Representation of an error occurring within a pipeline step.
 * Row-level problems never become PipelineErrors; they go to the error sinks.
 */
export interface PipelineError {
    step: string;
    message: string;
    fatal: boolean;
    error?: unknown;
}

/**
 * An error record together with the stage whose sink received it.
 */
export interface StageErrorRecord extends ErrorRecord {
    stage: Stage;
}

/**
 * Central state object passed through the pipeline steps.
 */
export interface PipelineState {
    runId: string;
    config: RunConfig;
    options: RunOptions;
    logger: Logger;

    // Owned by the run, shared by every stage
    registry: IdentifierRegistry;

    // Accumulated during pipeline execution
    files: InputFile[];
    stages: StageSummary[];
    records: StageErrorRecord[];

    warnings: string[];
    errors: PipelineError[];
}

/**
 * Function signature for a discrete pipeline step.
 */
export type PipelineStep = (state: PipelineState) => Promise<PipelineState>;
