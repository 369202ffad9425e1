import type { Workbook } from 'exceljs';
import { NUMERIC_COLUMNS, type SummaryResult } from '@gst-summarizer/shared';
import { createWorkbook, formatHeaderRow, formatSubtotalRow, autoFitColumns, formatAmountColumn } from './utils.js';

export const SUMMARY_SHEET_NAME = 'Summary';

/**
 * Builds the output workbook: one sheet, header then rows in table order.
 * Subtotal rows are bold; amount columns use a 2-decimal format.
 */
export function generateSummaryExcel(result: SummaryResult): Workbook {
    const workbook = createWorkbook();
    const sheet = workbook.addWorksheet(SUMMARY_SHEET_NAME);

    sheet.columns = result.table.columns.map((col) => ({ header: col, key: col }));

    for (const row of result.table.rows) {
        sheet.addRow(result.table.columns.map((col) => row[col] ?? ''));
    }

    formatHeaderRow(sheet);
    for (const col of NUMERIC_COLUMNS) {
        if (result.table.columns.includes(col)) {
            formatAmountColumn(sheet, col);
        }
    }
    for (const group of result.groups) {
        // +1 for 1-indexed rows, +1 for the header
        formatSubtotalRow(sheet.getRow(group.subtotalIndex + 2));
    }
    autoFitColumns(sheet);

    return workbook;
}

/**
 * Serializes the summary as .xlsx bytes.
 */
export async function writeSummaryWorkbook(result: SummaryResult): Promise<Buffer> {
    const workbook = generateSummaryExcel(result);
    const buffer = await workbook.xlsx.writeBuffer();
    return Buffer.from(buffer);
}
