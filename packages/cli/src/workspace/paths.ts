import { dirname, join, resolve } from 'node:path';
import type { RunConfigFile } from '@casetree/shared';
import type { RunConfig } from '../types.js';

/**
 * Makes every configured path absolute, relative to the config file's directory.
 */
export function resolveRunConfig(file: RunConfigFile, configPath: string): RunConfig {
    const absoluteConfigPath = resolve(configPath);
    const baseDir = dirname(absoluteConfigPath);
    const at = (p: string): string => resolve(baseDir, p);

    return {
        configPath: absoluteConfigPath,
        baseDir,
        inputs: {
            first: at(file.inputs.first),
            second: at(file.inputs.second),
            third: file.inputs.third === undefined ? undefined : at(file.inputs.third),
        },
        errors: {
            first: at(file.errors.first),
            second: at(file.errors.second),
            third: at(file.errors.third),
        },
        target: at(file.target),
        sources: {
            homepage: at(file.sources.homepage),
            individualGate: at(file.sources.individualGate),
        },
        subdirs: { ...file.subdirs },
        encoding: { ...file.encoding },
        check: { ...file.check },
        logging: {
            level: file.logging.level,
            file: at(file.logging.file),
            console: file.logging.console,
        },
        reports: {
            dir: at(file.reports.dir),
            enabled: file.reports.enabled,
        },
    };
}

export function getManifestPath(config: RunConfig): string {
    return join(config.reports.dir, 'run_manifest.json');
}

export function getReportWorkbookPath(config: RunConfig): string {
    return join(config.reports.dir, 'run_report.xlsx');
}
