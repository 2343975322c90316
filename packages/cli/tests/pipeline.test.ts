import { describe, it, expect } from 'vitest';
import fs from 'fs-extra';
import { join } from 'node:path';
import { RunConfigFileSchema, RunManifestSchema } from '@casetree/shared';
import { runPipeline } from '../src/pipeline/runner.js';
import { resolveRunConfig } from '../src/workspace/paths.js';
import { createLogger } from '../src/utils/logger.js';
import type { PipelineState } from '../src/pipeline/types.js';
import type { RunOptions } from '../src/types.js';
import { withTempDir, writeFixtureFile } from './helpers/temp.js';

const RUN_ID = '20260115-000000';

async function runBatch(
    root: string,
    overrides: Record<string, unknown> = {},
    options: RunOptions = { skipCheck: false }
): Promise<PipelineState> {
    await fs.ensureDir(join(root, 'work'));
    const file = RunConfigFileSchema.parse({
        logging: { console: false },
        reports: { enabled: false },
        ...overrides,
    });
    const config = resolveRunConfig(file, join(root, 'casetree.config.yaml'));
    const logger = createLogger({ runId: RUN_ID, level: 'debug', console: false });
    return runPipeline(config, options, logger, RUN_ID);
}

function readErrors(root: string, stage: 'first' | 'second' | 'third'): Promise<string> {
    return fs.readFile(join(root, 'errors', `${stage}_errors.csv`), 'utf8');
}

describe('runPipeline', () => {
    it('creates each identifier once and records the duplicate', async () => {
        await withTempDir('casetree-pipe-', async (root) => {
            await writeFixtureFile(root, 'input/first.csv', 'A\nB\nA\n');
            await writeFixtureFile(root, 'input/second.csv', '');
            await writeFixtureFile(root, 'source/homepage/A/index.html', '<p>A</p>');
            await writeFixtureFile(root, 'source/homepage/B/index.html', '<p>B</p>');

            const state = await runBatch(root);

            expect(state.errors).toEqual([]);
            expect(await readErrors(root, 'first')).toBe('A,DUPLICATE_ENTRY,first.csv\n');
            expect(await fs.readFile(join(root, 'work', 'A', 'Homepage', 'index.html'), 'utf8')).toBe('<p>A</p>');
            expect(await fs.readFile(join(root, 'work', 'B', 'Homepage', 'index.html'), 'utf8')).toBe('<p>B</p>');
            expect(await fs.pathExists(join(root, 'work', 'A', 'Individual Gate'))).toBe(true);
            expect(state.stages[0]).toMatchObject({ stage: 'first', rows: 3, accepted: 2, errors: 1, copies: 2 });
        });
    });

    it('copies sub-identifiers under their parent and records missing sources', async () => {
        await withTempDir('casetree-pipe-', async (root) => {
            await writeFixtureFile(root, 'input/first.csv', 'X\n');
            await writeFixtureFile(root, 'input/second.csv', 'X,s1,s2\n');
            await writeFixtureFile(root, 'source/homepage/X/index.html', '<p>X</p>');
            await writeFixtureFile(root, 'source/individual_gate/s1/gate.txt', 'gate s1');

            await runBatch(root);

            const src2 = join(root, 'source', 'individual_gate');
            expect(await fs.readFile(join(root, 'work', 'X', 'Individual Gate', 's1', 'gate.txt'), 'utf8')).toBe(
                'gate s1'
            );
            expect(await readErrors(root, 'second')).toBe(`s2,FILE_NOT_EXIST,${join(src2, 's2')}\n`);
        });
    });

    it('reports files missing from the materialized tree', async () => {
        await withTempDir('casetree-pipe-', async (root) => {
            await writeFixtureFile(root, 'input/first.csv', 'A\n');
            await writeFixtureFile(root, 'input/second.csv', '');
            await writeFixtureFile(root, 'input/third.csv', 'id,subdir,filename\nA,Homepage,index.html\nA,Homepage,report.pdf\n');
            await writeFixtureFile(root, 'source/homepage/A/index.html', '<p>A</p>');

            const state = await runBatch(root, { inputs: { third: 'input/third.csv' } });

            const work = join(root, 'work');
            expect(await readErrors(root, 'third')).toBe(
                `A,ERROR_MISSING_FILE,${join(work, 'A', 'Homepage', 'report.pdf')}\n`
            );
            expect(state.stages[2]).toMatchObject({ stage: 'check', rows: 2, accepted: 1, errors: 1 });
        });
    });

    it('skips short existence-check rows without recording them', async () => {
        await withTempDir('casetree-pipe-', async (root) => {
            await writeFixtureFile(root, 'input/first.csv', 'A\n');
            await writeFixtureFile(root, 'input/second.csv', '');
            await writeFixtureFile(root, 'input/third.csv', 'id,subdir,filename\nA,Homepage\n');
            await writeFixtureFile(root, 'source/homepage/A/index.html', '<p>A</p>');

            const state = await runBatch(root, { inputs: { third: 'input/third.csv' } });

            expect(await readErrors(root, 'third')).toBe('');
            expect(state.stages[2]).toMatchObject({ rows: 1, accepted: 0, errors: 0 });
        });
    });

    it('never materializes identifiers absent from the primary CSV', async () => {
        await withTempDir('casetree-pipe-', async (root) => {
            await writeFixtureFile(root, 'input/first.csv', 'A\n');
            await writeFixtureFile(root, 'input/second.csv', 'Z,s9\n');
            await writeFixtureFile(root, 'source/homepage/A/index.html', '<p>A</p>');
            await writeFixtureFile(root, 'source/individual_gate/s9/gate.txt', 'gate s9');

            await runBatch(root);

            expect(await readErrors(root, 'second')).toBe('Z,ENTRY_MISSING_FROM_FIRST_CSV,first.csv\n');
            expect(await fs.pathExists(join(root, 'work', 'Z'))).toBe(false);
        });
    });

    it('truncates error files left by a previous run', async () => {
        await withTempDir('casetree-pipe-', async (root) => {
            await writeFixtureFile(root, 'input/first.csv', 'A\nA\n');
            await writeFixtureFile(root, 'input/second.csv', '');
            await writeFixtureFile(root, 'source/homepage/A/index.html', '<p>A</p>');

            await runBatch(root);
            await runBatch(root);

            expect(await readErrors(root, 'first')).toBe('A,DUPLICATE_ENTRY,first.csv\n');
        });
    });

    it('records a failing row and carries on with the next one', async () => {
        await withTempDir('casetree-pipe-', async (root) => {
            await writeFixtureFile(root, 'input/first.csv', 'C\nD\n');
            await writeFixtureFile(root, 'input/second.csv', '');
            await writeFixtureFile(root, 'work/C', 'not a directory');
            await writeFixtureFile(root, 'source/homepage/D/index.html', '<p>D</p>');

            const state = await runBatch(root);

            const blocked = join(root, 'work', 'C');
            expect(await readErrors(root, 'first')).toBe(
                `C,OS_ERROR,Cannot create directory ${blocked}: a file with that name exists\n`
            );
            expect(await fs.pathExists(join(root, 'work', 'D', 'Homepage', 'index.html'))).toBe(true);
            expect(state.errors).toEqual([]);
        });
    });

    it('records a copy that cannot complete as OS_ERROR', async () => {
        await withTempDir('casetree-pipe-', async (root) => {
            await writeFixtureFile(root, 'input/first.csv', 'X\n');
            await writeFixtureFile(root, 'input/second.csv', 'X,s1\n');
            await writeFixtureFile(root, 'source/homepage/X/index.html', '<p>X</p>');
            await writeFixtureFile(root, 'source/individual_gate/s1/gate.txt', 'gate s1');
            await writeFixtureFile(root, 'work/X/Individual Gate/s1', 'in the way');

            const state = await runBatch(root);

            expect(state.records).toHaveLength(1);
            expect(state.records[0].subject).toBe('s1');
            expect(state.records[0].kind).toBe('OS_ERROR');
            expect(state.records[0].detail).toContain('Cannot overwrite non-directory');
        });
    });

    it('treats a quote inside an unquoted cell as part of the identifier', async () => {
        await withTempDir('casetree-pipe-', async (root) => {
            await writeFixtureFile(root, 'input/first.csv', 'A\n12"B\nC\n');
            await writeFixtureFile(root, 'input/second.csv', '');

            const state = await runBatch(root);

            expect(state.errors).toEqual([]);
            expect(await fs.pathExists(join(root, 'work', 'A', 'Homepage'))).toBe(true);
            expect(await fs.pathExists(join(root, 'work', '12"B', 'Homepage'))).toBe(true);
            expect(await fs.pathExists(join(root, 'work', 'C', 'Homepage'))).toBe(true);
            expect(state.stages[0]).toMatchObject({ rows: 3, accepted: 3 });
        });
    });

    it('fails the run on an input that is not valid in its encoding', async () => {
        await withTempDir('casetree-pipe-', async (root) => {
            // latin-1 "Caf\xE9" and "Caf\xE8" in a file read as utf-8
            await fs.outputFile(
                join(root, 'input', 'first.csv'),
                Buffer.from([0x43, 0x61, 0x66, 0xe9, 0x0a, 0x43, 0x61, 0x66, 0xe8, 0x0a])
            );
            await writeFixtureFile(root, 'input/second.csv', '');

            const state = await runBatch(root);

            expect(state.errors).toHaveLength(1);
            expect(state.errors[0].fatal).toBe(true);
            expect(state.errors[0].message).toContain(`Failed to read ${join(root, 'input', 'first.csv')}`);
            expect(await fs.readdir(join(root, 'work'))).toEqual([]);
        });
    });

    it('stops before any stage when an input cannot be read', async () => {
        await withTempDir('casetree-pipe-', async (root) => {
            await writeFixtureFile(root, 'input/first.csv', 'A\n');

            const state = await runBatch(root);

            expect(state.errors).toHaveLength(1);
            expect(state.errors[0].fatal).toBe(true);
            expect(state.stages).toEqual([]);
            expect(await fs.pathExists(join(root, 'errors', 'first_errors.csv'))).toBe(false);
        });
    });

    it('leaves the existence check out with --skip-check', async () => {
        await withTempDir('casetree-pipe-', async (root) => {
            await writeFixtureFile(root, 'input/first.csv', 'A\n');
            await writeFixtureFile(root, 'input/second.csv', '');
            await writeFixtureFile(root, 'input/third.csv', 'id,subdir,filename\nA,Homepage,report.pdf\n');

            const state = await runBatch(root, { inputs: { third: 'input/third.csv' } }, { skipCheck: true });

            expect(state.stages.map(s => s.stage)).toEqual(['first', 'second']);
            expect(state.warnings).toContain('Existence check skipped (--skip-check).');
            expect(await fs.pathExists(join(root, 'errors', 'third_errors.csv'))).toBe(false);
        });
    });

    it('writes the run manifest and report workbook', async () => {
        await withTempDir('casetree-pipe-', async (root) => {
            await writeFixtureFile(root, 'input/first.csv', 'A\nA\n');
            await writeFixtureFile(root, 'input/second.csv', '');
            await writeFixtureFile(root, 'source/homepage/A/index.html', '<p>A</p>');

            await runBatch(root, { reports: { enabled: true } });

            const manifest = RunManifestSchema.parse(await fs.readJson(join(root, 'reports', 'run_manifest.json')));
            expect(manifest.run_id).toBe(RUN_ID);
            expect(Object.keys(manifest.input_files)).toEqual(['first.csv', 'second.csv']);
            expect(manifest.error_counts).toEqual({ DUPLICATE_ENTRY: 1 });
            expect(await fs.pathExists(join(root, 'reports', 'run_report.xlsx'))).toBe(true);
        });
    });
});
