import { cellToText } from '@gst-summarizer/core';
import { INVOICE_NUMBER_COLUMN, type SummaryResult, type Table } from '@gst-summarizer/shared';

const MAX_CELL_WIDTH = 24;
const SUBTOTAL_MARK = '»';

/**
 * Plain-text preview of the first `limit` output rows.
 * Subtotal rows are marked with '»'.
 */
export function renderPreview(result: SummaryResult, limit: number): string[] {
    const { columns, rows } = result.table;
    const shown = rows.slice(0, Math.max(0, limit));
    const subtotals = new Set(result.groups.map((g) => g.subtotalIndex));

    const cells = shown.map((row) => columns.map((col) => fit(cellToText(row[col] ?? ''))));
    const widths = columns.map((col, i) =>
        cells.reduce((max, line) => Math.max(max, line[i].length), fit(col).length)
    );

    const format = (values: string[]) => values.map((v, i) => v.padEnd(widths[i])).join(' | ').trimEnd();

    return [
        `  ${format(columns.map(fit))}`,
        ...cells.map((line, index) => `${subtotals.has(index) ? SUBTOTAL_MARK : ' '} ${format(line)}`),
    ];
}

/**
 * Groups count as shown in the report.
 *
 * With a bl_invno column, subtotal rows are the rows whose invoice number is
 * blank (that is how the sheet's readers spot them); otherwise it is the
 * number of groups.
 */
export function countDisplayGroups(result: SummaryResult): number {
    if (!result.table.columns.includes(INVOICE_NUMBER_COLUMN)) {
        return result.groups.length;
    }
    return countBlankInvoiceRows(result.table);
}

function countBlankInvoiceRows(table: Table): number {
    return table.rows.filter((row) => cellToText(row[INVOICE_NUMBER_COLUMN] ?? '').trim() === '').length;
}

function fit(text: string): string {
    return text.length > MAX_CELL_WIDTH ? `${text.slice(0, MAX_CELL_WIDTH - 1)}…` : text;
}
