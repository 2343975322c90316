/**
 * Zod schemas for casetree data structures.
 *
 * The configuration file schema fills in every missing key from CONFIG_DEFAULTS,
 * so a parsed config is always complete.
 */

import { z } from 'zod';
import { CONFIG_DEFAULTS, ERROR_KIND, STAGE } from './constants.js';

// ============================================================================
// Enumerations
// ============================================================================

export const ErrorKindSchema = z.enum([
    ERROR_KIND.DUPLICATE_ENTRY,
    ERROR_KIND.DUPLICATE_SUBID,
    ERROR_KIND.NO_ENTRIES,
    ERROR_KIND.ENTRY_MISSING_FROM_FIRST_CSV,
    ERROR_KIND.FILE_NOT_EXIST,
    ERROR_KIND.OS_ERROR,
    ERROR_KIND.ERROR_MISSING_FILE,
    ERROR_KIND.INVALID_IDENTIFIER,
]);

export type ErrorKind = z.infer<typeof ErrorKindSchema>;

export const StageSchema = z.enum([STAGE.FIRST, STAGE.SECOND, STAGE.CHECK]);

export type Stage = z.infer<typeof StageSchema>;

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

export type LogLevel = z.infer<typeof LogLevelSchema>;

// ============================================================================
// Error Records
// ============================================================================

/**
 * One rejected or failed record: (subject, kind, detail).
 * The subject is the identifier or sub-identifier the record is about.
 */
export const ErrorRecordSchema = z.object({
    subject: z.string(),
    kind: ErrorKindSchema,
    detail: z.string(),
});

export type ErrorRecord = z.infer<typeof ErrorRecordSchema>;

// ============================================================================
// Configuration File
// ============================================================================

const pathString = z.string().min(1, 'Path must not be empty');

const segmentString = z.string()
    .min(1, 'Folder name must not be empty')
    .refine((s) => !/[\\/]/.test(s) && s !== '.' && s !== '..', 'Folder name must be a single path segment');

/**
 * casetree.config.yaml, as written by the user.
 */
export const RunConfigFileSchema = z.object({
    inputs: z.object({
        first: pathString.default(CONFIG_DEFAULTS.INPUT_FIRST),
        second: pathString.default(CONFIG_DEFAULTS.INPUT_SECOND),
        third: pathString.optional(),
    }).default({}),
    errors: z.object({
        first: pathString.default(CONFIG_DEFAULTS.ERROR_FIRST),
        second: pathString.default(CONFIG_DEFAULTS.ERROR_SECOND),
        third: pathString.default(CONFIG_DEFAULTS.ERROR_THIRD),
    }).default({}),
    target: pathString.default(CONFIG_DEFAULTS.TARGET),
    sources: z.object({
        homepage: pathString.default(CONFIG_DEFAULTS.SOURCE_HOMEPAGE),
        individualGate: pathString.default(CONFIG_DEFAULTS.SOURCE_INDIVIDUAL_GATE),
    }).default({}),
    subdirs: z.object({
        homepage: segmentString.default(CONFIG_DEFAULTS.SUBDIR_HOMEPAGE),
        individualGate: segmentString.default(CONFIG_DEFAULTS.SUBDIR_INDIVIDUAL_GATE),
    }).default({}),
    encoding: z.object({
        input: z.string().default(CONFIG_DEFAULTS.INPUT_ENCODING),
        third: z.string().default(CONFIG_DEFAULTS.THIRD_ENCODING),
    }).default({}),
    check: z.object({
        recordMalformed: z.boolean().default(false),
    }).default({}),
    logging: z.object({
        level: LogLevelSchema.default(CONFIG_DEFAULTS.LOG_LEVEL),
        file: pathString.default(CONFIG_DEFAULTS.LOG_FILE),
        console: z.boolean().default(true),
    }).default({}),
    reports: z.object({
        dir: pathString.default(CONFIG_DEFAULTS.REPORTS_DIR),
        enabled: z.boolean().default(true),
    }).default({}),
}).strict();

export type RunConfigFile = z.infer<typeof RunConfigFileSchema>;

// ============================================================================
// Run Manifest
// ============================================================================

export const StageSummarySchema = z.object({
    stage: StageSchema,
    input: z.string(),
    errorFile: z.string(),
    rows: z.number().int().nonnegative(),
    accepted: z.number().int().nonnegative(),
    errors: z.number().int().nonnegative(),
    copies: z.number().int().nonnegative(),
});

export type StageSummary = z.infer<typeof StageSummarySchema>;

/**
 * Written to reports/run_manifest.json at the end of each run.
 */
export const RunManifestSchema = z.object({
    run_id: z.string(),
    run_timestamp: z.string().datetime(),
    config_path: z.string(),
    input_files: z.record(z.string().regex(/^sha256:[0-9a-f]{64}$/)),
    stages: z.array(StageSummarySchema),
    error_counts: z.record(z.number().int().nonnegative()),
    version: z.string(),
});

export type RunManifest = z.infer<typeof RunManifestSchema>;
