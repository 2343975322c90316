import { loadConfigOrExit } from './run.js';
import { findMissingSourceRoots } from '../workspace/config.js';
import { log, success, warn, arrow } from '../utils/console.js';
import type { CheckConfigOptions } from '../types.js';

/**
 * Loads and validates the configuration without running any stage.
 */
export async function checkConfig(options: CheckConfigOptions): Promise<void> {
    const config = loadConfigOrExit(options.configPath);

    success(`Configuration is valid: ${config.configPath}`);
    log('');
    arrow(`First CSV:        ${config.inputs.first}`);
    arrow(`Second CSV:       ${config.inputs.second}`);
    arrow(`Check CSV:        ${config.inputs.third ?? '(none)'}`);
    arrow(`Work root:        ${config.target}`);
    arrow(`Homepage source:  ${config.sources.homepage} -> ${config.subdirs.homepage}`);
    arrow(`Gate source:      ${config.sources.individualGate} -> ${config.subdirs.individualGate}`);
    arrow(`Error CSVs:       ${config.errors.first}, ${config.errors.second}, ${config.errors.third}`);
    arrow(`Log:              ${config.logging.file} (${config.logging.level})`);

    for (const missing of findMissingSourceRoots(config)) {
        warn(`Copy-source root does not exist: ${missing}`);
    }
}
