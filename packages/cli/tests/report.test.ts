import { describe, it, expect } from 'vitest';
import { generateRunReportExcel } from '../src/excel/report.js';
import type { StageSummary } from '@casetree/shared';
import type { StageErrorRecord } from '../src/pipeline/types.js';

describe('generateRunReportExcel', () => {
    const stages: StageSummary[] = [
        {
            stage: 'first',
            input: '/batch/input/first.csv',
            errorFile: '/batch/errors/first_errors.csv',
            rows: 3,
            accepted: 2,
            errors: 1,
            copies: 2,
        },
    ];
    const records: StageErrorRecord[] = [
        { stage: 'first', subject: 'A', kind: 'DUPLICATE_ENTRY', detail: 'first.csv' },
    ];

    it('writes one summary row per stage', () => {
        const workbook = generateRunReportExcel(stages, records);
        const sheet = workbook.getWorksheet('Summary');

        expect(sheet?.rowCount).toBe(2);
        expect(sheet?.getRow(1).getCell(1).value).toBe('stage');
        expect(sheet?.getRow(2).getCell(1).value).toBe('first');
        expect(sheet?.getRow(2).getCell(4).value).toBe(3);
        expect(sheet?.getRow(2).getCell(7).value).toBe(2);
    });

    it('lists every error record', () => {
        const workbook = generateRunReportExcel(stages, records);
        const sheet = workbook.getWorksheet('Errors');

        expect(sheet?.rowCount).toBe(2);
        expect(sheet?.getRow(2).getCell(2).value).toBe('A');
        expect(sheet?.getRow(2).getCell(3).value).toBe('DUPLICATE_ENTRY');
        expect(sheet?.getRow(2).getCell(4).value).toBe('first.csv');
    });

    it('styles the header row', () => {
        const workbook = generateRunReportExcel(stages, records);
        const sheet = workbook.getWorksheet('Errors');

        expect(sheet?.getRow(1).font?.bold).toBe(true);
        expect(sheet?.views[0]?.state).toBe('frozen');
    });

    it('sizes columns to their longest value', () => {
        const workbook = generateRunReportExcel(stages, records);
        const sheet = workbook.getWorksheet('Errors');

        // 'first.csv' is longer than the 'detail' header
        expect(sheet?.getColumn(4).width).toBe(11);
        // 'stage' and 'first' fall back to the minimum width
        expect(sheet?.getColumn(1).width).toBe(10);
    });
});
