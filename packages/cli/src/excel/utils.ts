import exceljs from 'exceljs';
import type { Worksheet, Workbook, Row } from 'exceljs';

/**
 * Creates a new workbook with standard metadata.
 */
export function createWorkbook(): Workbook {
    const workbook = new exceljs.Workbook();
    workbook.creator = 'GST Summarizer';
    workbook.created = new Date();
    return workbook;
}

/**
 * Bold header row, frozen so it stays visible while scrolling.
 */
export function formatHeaderRow(worksheet: Worksheet): void {
    const headerRow = worksheet.getRow(1);

    headerRow.font = { bold: true };
    headerRow.alignment = {
        vertical: 'middle',
        horizontal: 'center'
    };
    headerRow.border = {
        bottom: { style: 'thin' }
    };

    worksheet.views = [
        { state: 'frozen', xSplit: 0, ySplit: 1 }
    ];
}

/**
 * Highlights a subtotal row.
 */
export function formatSubtotalRow(row: Row): void {
    row.font = { bold: true };
    row.fill = {
        type: 'pattern',
        pattern: 'solid',
        fgColor: { argb: 'FFF1F5F9' } // Light slate
    };
}

/**
 * Attempts to auto-fit column widths based on cell content.
 */
export function autoFitColumns(worksheet: Worksheet): void {
    worksheet.columns.forEach(column => {
        let maxLen = 10;
        column.eachCell?.({ includeEmpty: false }, cell => {
            if (cell.value !== null && cell.value !== undefined && cell.value !== '') {
                const len = cell.value.toString().length;
                if (len > maxLen) maxLen = len;
            }
        });
        // Add a bit of padding and cap at 100
        column.width = Math.min(maxLen + 2, 100);
    });
}

/**
 * Two-decimal number format for an amount column.
 */
export function formatAmountColumn(worksheet: Worksheet, col: string | number): void {
    const column = worksheet.getColumn(col);
    column.numFmt = '0.00';
    column.alignment = { horizontal: 'right' };
}
