/**
 * Run log.
 * Writes to the console and appends to the configured log file, each entry
 * stamped with time, level and run ID.
 */

import { appendFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import type { LogLevel } from '@casetree/shared';

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
};

export interface LoggerOptions {
    runId: string;
    /** Minimum level written */
    level: LogLevel;
    /** Log file path; omitted means console only */
    file?: string;
    console: boolean;
}

export type LogContext = Record<string, unknown>;

export interface Logger {
    debug(message: string, context?: LogContext): void;
    info(message: string, context?: LogContext): void;
    warn(message: string, context?: LogContext): void;
    error(message: string, context?: LogContext): void;
}

export function formatLogEntry(
    level: LogLevel,
    runId: string,
    message: string,
    context?: LogContext,
    now: Date = new Date()
): string {
    const levelStr = level.toUpperCase().padEnd(5);
    let entry = `[${now.toISOString()}] [${levelStr}] [${runId}] ${message}`;

    if (context && Object.keys(context).length > 0) {
        entry += ` ${JSON.stringify(context)}`;
    }

    return entry;
}

function getConsoleMethod(level: LogLevel): typeof console.log {
    switch (level) {
        case 'debug':
            return console.debug;
        case 'info':
            return console.info;
        case 'warn':
            return console.warn;
        case 'error':
            return console.error;
    }
}

export function createLogger(options: LoggerOptions): Logger {
    const { file } = options;

    if (file) {
        mkdirSync(dirname(file), { recursive: true });
    }

    function write(level: LogLevel, message: string, context?: LogContext): void {
        if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[options.level]) {
            return;
        }

        const entry = formatLogEntry(level, options.runId, message, context);

        if (options.console) {
            getConsoleMethod(level)(entry);
        }

        if (file) {
            try {
                appendFileSync(file, `${entry}\n`);
            } catch (err) {
                // The run continues without its log file.
                console.error(`Failed to write to log file ${file}: ${err}`);
            }
        }
    }

    return {
        debug: (message, context) => write('debug', message, context),
        info: (message, context) => write('info', message, context),
        warn: (message, context) => write('warn', message, context),
        error: (message, context) => write('error', message, context),
    };
}

