/**
 * Legacy .xls → .xlsx conversion.
 *
 * Copies every sheet's cell values row by row into a fresh modern workbook so
 * that all spreadsheet inputs go through one decoding path. Styles, formulas
 * and merged ranges are not carried over.
 */

import * as XLSX from 'xlsx';
import { WORKBOOK_LIMITS } from '../types/index.js';

/**
 * Convert legacy binary workbook bytes into XLSX bytes.
 *
 * @param data - .xls file contents
 * @returns .xlsx file contents
 */
export function convertXlsToXlsx(data: ArrayBuffer): ArrayBuffer {
    const legacy = XLSX.read(data, { type: 'array', cellDates: true });
    const modern = XLSX.utils.book_new();
    const usedNames = new Set<string>();

    legacy.SheetNames.forEach((name, index) => {
        const rows = XLSX.utils.sheet_to_json<unknown[]>(legacy.Sheets[name], {
            header: 1,
            raw: true,
            defval: '',
        });
        const title = uniqueSheetName(toSheetTitle(name, index), usedNames);
        usedNames.add(title);
        XLSX.utils.book_append_sheet(modern, XLSX.utils.aoa_to_sheet(rows, { cellDates: true }), title);
    });

    if (modern.SheetNames.length === 0) {
        XLSX.utils.book_append_sheet(modern, XLSX.utils.aoa_to_sheet([]), 'Sheet1');
    }

    return XLSX.write(modern, { type: 'array', bookType: 'xlsx' });
}

/**
 * Sheet name as written to the modern workbook: capped at 31 characters,
 * "Sheet{n}" (1-based) when the legacy sheet had no name.
 */
export function toSheetTitle(name: string, index: number): string {
    return name ? name.slice(0, WORKBOOK_LIMITS.SHEET_NAME_MAX_LENGTH) : `Sheet${index + 1}`;
}

/**
 * Truncation can collide two long names; number the later one.
 */
function uniqueSheetName(title: string, used: Set<string>): string {
    if (!used.has(title)) {
        return title;
    }
    for (let n = 1; ; n++) {
        const suffix = String(n);
        const candidate = title.slice(0, WORKBOOK_LIMITS.SHEET_NAME_MAX_LENGTH - suffix.length) + suffix;
        if (!used.has(candidate)) {
            return candidate;
        }
    }
}
