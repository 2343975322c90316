/**
 * Constants for casetree.
 */

/**
 * Closed set of error kinds written to the per-stage error CSVs.
 * INVALID_IDENTIFIER covers identifiers that cannot be used as a single path segment.
 */
export const ERROR_KIND = {
    DUPLICATE_ENTRY: 'DUPLICATE_ENTRY',
    DUPLICATE_SUBID: 'DUPLICATE_SUBID',
    NO_ENTRIES: 'NO_ENTRIES',
    ENTRY_MISSING_FROM_FIRST_CSV: 'ENTRY_MISSING_FROM_FIRST_CSV',
    FILE_NOT_EXIST: 'FILE_NOT_EXIST',
    OS_ERROR: 'OS_ERROR',
    ERROR_MISSING_FILE: 'ERROR_MISSING_FILE',
    INVALID_IDENTIFIER: 'INVALID_IDENTIFIER',
} as const;

/**
 * Logical stage names. Each stage reads one input CSV and owns one error sink.
 */
export const STAGE = {
    FIRST: 'first',
    SECOND: 'second',
    CHECK: 'check',
} as const;

/**
 * Name of the configuration file looked up from the working directory upwards.
 */
export const CONFIG_FILENAME = 'casetree.config.yaml';

/**
 * Defaults substituted for keys missing from the configuration file.
 * Paths are relative to the directory holding the configuration file.
 */
export const CONFIG_DEFAULTS = {
    INPUT_FIRST: 'input/first.csv',
    INPUT_SECOND: 'input/second.csv',
    ERROR_FIRST: 'errors/first_errors.csv',
    ERROR_SECOND: 'errors/second_errors.csv',
    ERROR_THIRD: 'errors/third_errors.csv',
    TARGET: 'work',
    SOURCE_HOMEPAGE: 'source/homepage',
    SOURCE_INDIVIDUAL_GATE: 'source/individual_gate',
    SUBDIR_HOMEPAGE: 'Homepage',
    SUBDIR_INDIVIDUAL_GATE: 'Individual Gate',
    INPUT_ENCODING: 'utf-8',
    // The existence-check CSV comes from a legacy export.
    THIRD_ENCODING: 'windows-1252',
    LOG_LEVEL: 'info',
    LOG_FILE: 'debug.log',
    REPORTS_DIR: 'reports',
} as const;

/**
 * Minimum number of columns in an existence-check row: id, subdir, filename.
 */
export const CHECK_ROW_COLUMNS = 3;

export const MANIFEST_VERSION = '1.0.0';
