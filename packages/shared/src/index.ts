// Schemas
export {
    ErrorKindSchema,
    StageSchema,
    LogLevelSchema,
    ErrorRecordSchema,
    RunConfigFileSchema,
    StageSummarySchema,
    RunManifestSchema,
} from './schemas.js';

// Types
export type {
    ErrorKind,
    Stage,
    LogLevel,
    ErrorRecord,
    RunConfigFile,
    StageSummary,
    RunManifest,
} from './schemas.js';

// Constants
export {
    ERROR_KIND,
    STAGE,
    CONFIG_FILENAME,
    CONFIG_DEFAULTS,
    CHECK_ROW_COLUMNS,
    MANIFEST_VERSION,
} from './constants.js';
