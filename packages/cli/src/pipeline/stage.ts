import { basename } from 'node:path';
import { ERROR_KIND } from '@casetree/shared';
import type { ErrorRecord, Stage, StageSummary } from '@casetree/shared';
import { ErrorSink } from '../sink/error-sink.js';
import { readCsvRows } from '../input/read-csv.js';
import { ensureDir, MATERIALIZE } from '../fs/materialize.js';
import { copyTree } from '../fs/copy.js';
import { errorMessage } from '../utils/errors.js';
import type { PipelineState } from './types.js';

export interface StageDefinition {
    stage: Stage;
    input: string;
    errorFile: string;
    encoding: string;
    /** Drop the first row before processing */
    skipHeader?: boolean;
}

/**
 * What a row handler can do besides deciding: record errors, count outcomes.
 */
export interface RowContext {
    emit(record: ErrorRecord): Promise<void>;
    accepted(): void;
    copied(): void;
}

export type RowHandler = (row: string[], ctx: RowContext) => Promise<void>;

/**
 * Runs one stage: opens its error sink, reads its CSV once and hands each row
 * to `handleRow`, strictly in file order.
 *
 * A row handler that throws produces one OS_ERROR record for that row and the
 * stage moves on. Only an unreadable input or sink is fatal.
 */
export async function runStage(
    state: PipelineState,
    definition: StageDefinition,
    handleRow: RowHandler
): Promise<void> {
    const { logger } = state;
    const { stage } = definition;

    const summary: StageSummary = {
        stage,
        input: definition.input,
        errorFile: definition.errorFile,
        rows: 0,
        accepted: 0,
        errors: 0,
        copies: 0,
    };

    let sink: ErrorSink;
    try {
        sink = await ErrorSink.open(definition.errorFile);
    } catch (err) {
        state.errors.push({
            step: stage,
            message: `Failed to open error file ${definition.errorFile}: ${errorMessage(err)}`,
            fatal: true,
            error: err,
        });
        return;
    }

    try {
        logger.info(`Handling input CSV ${definition.input}`, { stage });

        let rows: string[][];
        try {
            rows = await readCsvRows(definition.input, definition.encoding);
        } catch (err) {
            state.errors.push({
                step: stage,
                message: `Failed to read ${definition.input}: ${errorMessage(err)}`,
                fatal: true,
                error: err,
            });
            return;
        }

        if (definition.skipHeader) {
            rows = rows.slice(1);
        }

        const ctx: RowContext = {
            emit: async (record) => {
                await sink.record(record.subject, record.kind, record.detail);
                state.records.push({ stage, ...record });
                summary.errors++;
                const log = record.kind === ERROR_KIND.OS_ERROR ? logger.error : logger.warn;
                log(`${record.kind} ${record.subject}: ${record.detail}`, { stage });
            },
            accepted: () => {
                summary.accepted++;
            },
            copied: () => {
                summary.copies++;
            },
        };

        for (const row of rows) {
            summary.rows++;
            try {
                await handleRow(row, ctx);
            } catch (err) {
                await ctx.emit({
                    subject: row[0] ?? '',
                    kind: ERROR_KIND.OS_ERROR,
                    detail: errorMessage(err),
                });
            }
        }
    } finally {
        sink.close();
        state.stages.push(summary);
    }

    logger.info(
        `Finished ${basename(definition.input)}: ${summary.rows} rows, ` +
        `${summary.accepted} accepted, ${summary.errors} error record(s)`,
        { stage }
    );
}

/**
 * Create one directory for a row. parent-missing is recorded as FILE_NOT_EXIST
 * against `subject`; an existing directory is only a warning.
 *
 * @returns true if the directory exists afterwards
 */
export async function materialize(
    state: PipelineState,
    ctx: RowContext,
    subject: string,
    path: string,
    createParents: boolean
): Promise<boolean> {
    const outcome = await ensureDir(path, createParents);

    switch (outcome) {
        case MATERIALIZE.CREATED:
            state.logger.info(`Creating path: ${path}`);
            return true;
        case MATERIALIZE.ALREADY_EXISTS:
            state.logger.warn(`Attempted to create ${path}, but it already exists`);
            return true;
        case MATERIALIZE.PARENT_MISSING:
            await ctx.emit({ subject, kind: ERROR_KIND.FILE_NOT_EXIST, detail: path });
            return false;
    }
}

/**
 * Copy a source folder into its slot, recording any outcome other than a copy.
 */
export async function copyInto(
    state: PipelineState,
    ctx: RowContext,
    subject: string,
    src: string,
    dst: string
): Promise<void> {
    const outcome = await copyTree(src, dst);

    switch (outcome.status) {
        case 'copied':
            state.logger.info(`Copied ${src} to ${dst}`);
            ctx.copied();
            return;
        case 'source-missing':
            await ctx.emit({ subject, kind: ERROR_KIND.FILE_NOT_EXIST, detail: src });
            return;
        case 'copy-failed':
            await ctx.emit({ subject, kind: ERROR_KIND.OS_ERROR, detail: outcome.detail });
            return;
    }
}
