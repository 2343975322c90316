import { existsSync, readFileSync, statSync } from 'node:fs';
import { parse } from 'yaml';
import type { ZodIssue } from 'zod';
import { RunConfigFileSchema } from '@casetree/shared';
import { isSupportedEncoding } from '@casetree/core';
import { resolveRunConfig } from './paths.js';
import { errorMessage } from '../utils/errors.js';
import type { RunConfig } from '../types.js';

/**
 * Individual configuration problem.
 */
export interface ConfigIssue {
    /** Key path inside the config file, empty for file-level problems */
    path: (string | number)[];
    message: string;
}

/**
 * Any problem that must stop the run before a stage starts.
 */
export class ConfigError extends Error {
    public readonly issues: ConfigIssue[];

    constructor(message: string, issues: ConfigIssue[] = []) {
        super(message);
        this.name = 'ConfigError';
        this.issues = issues;
    }

    format(): string {
        const lines = [this.message];
        for (const issue of this.issues) {
            const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
            lines.push(`  - ${path}: ${issue.message}`);
        }
        return lines.join('\n');
    }
}

function formatZodIssues(zodIssues: ZodIssue[]): ConfigIssue[] {
    return zodIssues.map((issue) => ({
        path: issue.path,
        message: issue.message,
    }));
}

function deepFreeze<T extends object>(obj: T): Readonly<T> {
    const values: unknown[] = Object.values(obj);
    for (const value of values) {
        if (value && typeof value === 'object' && !Object.isFrozen(value)) {
            deepFreeze(value);
        }
    }
    return Object.freeze(obj);
}

function isFile(path: string): boolean {
    return existsSync(path) && statSync(path).isFile();
}

function isDirectory(path: string): boolean {
    return existsSync(path) && statSync(path).isDirectory();
}

/**
 * Checks the filesystem preconditions of a run: inputs readable, work root present.
 */
export function validateRunPaths(config: RunConfig): ConfigIssue[] {
    const issues: ConfigIssue[] = [];

    if (!isFile(config.inputs.first)) {
        issues.push({ path: ['inputs', 'first'], message: `File does not exist: ${config.inputs.first}` });
    }
    if (!isFile(config.inputs.second)) {
        issues.push({ path: ['inputs', 'second'], message: `File does not exist: ${config.inputs.second}` });
    }
    if (config.inputs.third !== undefined && !isFile(config.inputs.third)) {
        issues.push({ path: ['inputs', 'third'], message: `File does not exist: ${config.inputs.third}` });
    }
    if (!isDirectory(config.target)) {
        issues.push({ path: ['target'], message: `Directory does not exist: ${config.target}` });
    }
    if (!isSupportedEncoding(config.encoding.input)) {
        issues.push({ path: ['encoding', 'input'], message: `Unsupported encoding: ${config.encoding.input}` });
    }
    if (!isSupportedEncoding(config.encoding.third)) {
        issues.push({ path: ['encoding', 'third'], message: `Unsupported encoding: ${config.encoding.third}` });
    }

    return issues;
}

/**
 * Copy-source roots are allowed to be missing; every copy from them will then
 * be recorded as FILE_NOT_EXIST.
 */
export function findMissingSourceRoots(config: RunConfig): string[] {
    return [config.sources.homepage, config.sources.individualGate].filter((p) => !isDirectory(p));
}

/**
 * Loads casetree.config.yaml, fills defaults, resolves paths and checks them.
 *
 * @throws ConfigError on any problem
 */
export function loadRunConfig(configPath: string): Readonly<RunConfig> {
    if (!existsSync(configPath)) {
        throw new ConfigError(`Config file not found: ${configPath}`);
    }

    let data: unknown;
    try {
        data = parse(readFileSync(configPath, 'utf-8'));
    } catch (err) {
        throw new ConfigError(`Config file is not valid YAML: ${configPath}: ${errorMessage(err)}`);
    }

    // An empty file means "all defaults".
    const result = RunConfigFileSchema.safeParse(data ?? {});
    if (!result.success) {
        const issues = formatZodIssues(result.error.issues);
        throw new ConfigError(
            `Invalid configuration in ${configPath}: ${issues.length} validation error(s)`,
            issues
        );
    }

    const config = resolveRunConfig(result.data, configPath);

    const pathIssues = validateRunPaths(config);
    if (pathIssues.length > 0) {
        throw new ConfigError(
            `Configuration in ${configPath} refers to missing paths: ${pathIssues.length} problem(s)`,
            pathIssues
        );
    }

    return deepFreeze(config);
}
