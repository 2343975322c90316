/**
 * casetree CLI - Core Types
 */

import type { LogLevel } from '@casetree/shared';
import type { SubdirNames } from '@casetree/core';

export interface RunOptions {
    /** Explicit config file; otherwise looked up from the working directory */
    configPath?: string;
    /** Skip the existence check even when a third CSV is configured */
    skipCheck: boolean;
}

export interface CheckConfigOptions {
    configPath?: string;
}

/**
 * Configuration with defaults applied and every path made absolute.
 */
export interface RunConfig {
    configPath: string;
    baseDir: string;
    inputs: {
        first: string;
        second: string;
        third?: string;
    };
    errors: {
        first: string;
        second: string;
        third: string;
    };
    target: string;
    sources: {
        homepage: string;
        individualGate: string;
    };
    subdirs: SubdirNames;
    encoding: {
        input: string;
        third: string;
    };
    check: {
        recordMalformed: boolean;
    };
    logging: {
        level: LogLevel;
        file: string;
        console: boolean;
    };
    reports: {
        dir: string;
        enabled: boolean;
    };
}
