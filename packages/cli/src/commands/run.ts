import { detectConfigPath } from '../workspace/detect.js';
import { ConfigError, findMissingSourceRoots, loadRunConfig } from '../workspace/config.js';
import { runPipeline } from '../pipeline/runner.js';
import { createLogger } from '../utils/logger.js';
import { generateRunId } from '../utils/run-id.js';
import { errorMessage } from '../utils/errors.js';
import { log, success, warn, fail, arrow } from '../utils/console.js';
import type { RunConfig, RunOptions } from '../types.js';

/**
 * Finds and loads the configuration, exiting the process on any problem.
 */
export function loadConfigOrExit(configPath: string | undefined): Readonly<RunConfig> {
    const path = configPath ?? detectConfigPath();
    if (!path) {
        fail('Error: Configuration not found. Expected "casetree.config.yaml" here or in a parent directory.');
        process.exit(1);
    }

    try {
        return loadRunConfig(path);
    } catch (err) {
        if (err instanceof ConfigError) {
            fail(err.format());
        } else {
            fail(`Error: Failed to load configuration. ${errorMessage(err)}`);
        }
        process.exit(1);
    }
}

export async function runBatch(options: RunOptions): Promise<void> {
    log('\ncasetree - batch run');

    arrow('Loading configuration...');
    const config = loadConfigOrExit(options.configPath);
    success(`Configuration: ${config.configPath}`);

    const runId = generateRunId();
    const logger = createLogger({
        runId,
        level: config.logging.level,
        file: config.logging.file,
        console: config.logging.console,
    });

    logger.info(`Program started. Working directory: ${process.cwd()}`);
    for (const missing of findMissingSourceRoots(config)) {
        logger.warn(`Copy-source root does not exist: ${missing}`);
    }

    const state = await runPipeline(config, options, logger, runId);

    log('\n--- Run Summary ---');

    for (const w of state.warnings) {
        warn(w);
    }

    for (const s of state.stages) {
        arrow(`${s.stage}: ${s.rows} rows, ${s.accepted} accepted, ${s.copies} copied, ${s.errors} error record(s) -> ${s.errorFile}`);
    }

    if (state.errors.length > 0) {
        for (const e of state.errors) {
            fail(`ERROR [${e.step}]: ${e.message}`);
        }
        if (state.errors.some(e => e.fatal)) {
            log('\n✖ Run failed with fatal errors.');
            process.exit(1);
        }
    }

    success(`Run ${runId} complete. Work tree: ${config.target}`);
    if (state.records.length > 0) {
        warn(`${state.records.length} record(s) written to the error CSVs.`);
    }
}
