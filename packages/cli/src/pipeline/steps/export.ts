import { mkdir, writeFile } from 'node:fs/promises';
import { MANIFEST_VERSION, RunManifestSchema } from '@casetree/shared';
import type { RunManifest } from '@casetree/shared';
import type { PipelineState, PipelineStep } from '../types.js';
import { getManifestPath, getReportWorkbookPath } from '../../workspace/paths.js';
import { generateRunReportExcel } from '../../excel/report.js';
import { errorMessage } from '../../utils/errors.js';

export function buildRunManifest(state: PipelineState, now: Date = new Date()): RunManifest {
    const errorCounts: Record<string, number> = {};
    for (const record of state.records) {
        errorCounts[record.kind] = (errorCounts[record.kind] ?? 0) + 1;
    }

    return RunManifestSchema.parse({
        run_id: state.runId,
        run_timestamp: now.toISOString(),
        config_path: state.config.configPath,
        input_files: Object.fromEntries(state.files.map(f => [f.filename, f.hash])),
        stages: state.stages,
        error_counts: errorCounts,
        version: MANIFEST_VERSION,
    });
}

/**
 * Step 5: Export Reports
 * Writes the run manifest and the Excel run report.
 * The materialized tree and error CSVs are already complete, so failures here are not fatal.
 */
export const exportReports: PipelineStep = async (state) => {
    const { config } = state;

    if (!config.reports.enabled) {
        state.logger.info('Reports disabled; skipping export.');
        return state;
    }

    try {
        await mkdir(config.reports.dir, { recursive: true });

        const manifest = buildRunManifest(state);
        await writeFile(getManifestPath(config), JSON.stringify(manifest, null, 2));

        const workbook = generateRunReportExcel(state.stages, state.records);
        await workbook.xlsx.writeFile(getReportWorkbookPath(config));

        state.logger.info(`Reports written to ${config.reports.dir}`);
    } catch (err) {
        state.errors.push({
            step: 'export',
            message: `Failed to export reports to ${config.reports.dir}: ${errorMessage(err)}`,
            fatal: false,
            error: err,
        });
    }

    return state;
};
