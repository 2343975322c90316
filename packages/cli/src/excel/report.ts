import exceljs from 'exceljs';
import type { Workbook, Worksheet } from 'exceljs';
import type { StageSummary } from '@casetree/shared';
import type { StageErrorRecord } from '../pipeline/types.js';

const MAX_COLUMN_WIDTH = 100;

type Cell = string | number;

/**
 * Adds a sheet whose first row names the columns, then one row per entry.
 * The header is bold on blue and frozen; columns fit their longest value.
 */
function addTableSheet(workbook: Workbook, name: string, headers: readonly string[], rows: readonly Cell[][]): Worksheet {
    const sheet = workbook.addWorksheet(name, {
        views: [{ state: 'frozen', xSplit: 0, ySplit: 1 }],
    });

    sheet.addRow([...headers]);
    for (const row of rows) {
        sheet.addRow(row);
    }

    const header = sheet.getRow(1);
    header.font = { bold: true, color: { argb: 'FFFFFFFF' }, size: 11 };
    header.fill = { type: 'pattern', pattern: 'solid', fgColor: { argb: 'FF4472C4' } };
    header.alignment = { vertical: 'middle', horizontal: 'center' };

    headers.forEach((title, i) => {
        const longest = rows.reduce((max, row) => Math.max(max, String(row[i] ?? '').length), title.length);
        sheet.getColumn(i + 1).width = Math.min(Math.max(longest, 8) + 2, MAX_COLUMN_WIDTH);
    });

    return sheet;
}

/**
 * Builds the run report: one Summary row per stage, then every error record
 * in the order it was written.
 */
export function generateRunReportExcel(
    stages: readonly StageSummary[],
    records: readonly StageErrorRecord[]
): Workbook {
    const workbook = new exceljs.Workbook();
    workbook.creator = 'casetree';
    workbook.created = new Date();

    addTableSheet(
        workbook,
        'Summary',
        ['stage', 'input', 'error_file', 'rows', 'accepted', 'errors', 'copies'],
        stages.map(s => [s.stage, s.input, s.errorFile, s.rows, s.accepted, s.errors, s.copies])
    );

    addTableSheet(
        workbook,
        'Errors',
        ['stage', 'subject', 'kind', 'detail'],
        records.map(r => [r.stage, r.subject, r.kind, r.detail])
    );

    return workbook;
}
