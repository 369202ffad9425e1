import * as XLSX from 'xlsx';
import type { AliasEntry } from '../../src/types/index.js';

/**
 * A slice of a real-world alias table, in lookup order.
 */
export const TEST_ALIASES: AliasEntry[] = [
    { alias: 'AKZO NOBEL', short: 'AKZO NOBEL' },
    { alias: 'ASIAN PAINTS', short: 'ASIAN' },
    { alias: 'SIMPSON & CO', short: 'SIMPSON' },
    { alias: 'APC-DIVISION', short: 'SIMPSON' },
    { alias: 'T.A.L.C.ANNAMALAI NADAR', short: 'T.A.L.C' },
    { alias: 'BALAJI INDUSTRIES', short: 'Balaji Ind' },
];

/**
 * Encode text (CSV contents) as a standalone ArrayBuffer.
 */
export function textData(text: string): ArrayBuffer {
    const bytes = new TextEncoder().encode(text);
    const buffer = new ArrayBuffer(bytes.byteLength);
    new Uint8Array(buffer).set(bytes);
    return buffer;
}

/**
 * Build workbook bytes from sheets of rows (first row = header).
 */
export function workbookData(
    sheets: Record<string, unknown[][]>,
    bookType: 'xlsx' | 'xls' | 'xlsb' = 'xlsx'
): ArrayBuffer {
    const wb = XLSX.utils.book_new();
    for (const [name, rows] of Object.entries(sheets)) {
        XLSX.utils.book_append_sheet(wb, XLSX.utils.aoa_to_sheet(rows), name);
    }
    return XLSX.write(wb, { type: 'array', bookType });
}
