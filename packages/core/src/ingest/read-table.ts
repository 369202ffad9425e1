/**
 * Tabular ingestion: file bytes → Table.
 *
 * Format handling:
 * - .xls is converted to .xlsx first (see convert-xls.ts)
 * - .xlsx/.xlsm/.xltx/.xltm and .xlsb are decoded by SheetJS
 * - .csv/.txt are decoded as UTF-8 text; SheetJS splits them and keeps every cell as text
 * - Only the first sheet is read; its first row is the header
 *
 * ARCHITECTURAL NOTE: Takes ArrayBuffer (not file path) to keep core headless.
 */

import * as XLSX from 'xlsx';
import type { Cell, InputFormat, Row, Table } from '../types/index.js';
import { IngestDecodeError } from '../types/index.js';
import { detectFormat } from './detect.js';
import { convertXlsToXlsx } from './convert-xls.js';
import { cleanHeader } from '../utils/csv.js';
import { toCell, cellToText, isBlankCell } from '../utils/cell.js';

/**
 * Read the first sheet of a supported file into a Table.
 *
 * @param filename - Original filename, used for extension sniffing
 * @param data - File contents as ArrayBuffer
 * @throws UnsupportedFormatError for unknown extensions
 * @throws IngestDecodeError when the bytes cannot be decoded
 */
export function readTable(filename: string, data: ArrayBuffer): Table {
    const format = detectFormat(filename);

    let matrix: unknown[][];
    try {
        const workbook = readWorkbook(format, data);
        if (workbook.SheetNames.length === 0) {
            return { columns: [], rows: [] };
        }
        const sheet = workbook.Sheets[workbook.SheetNames[0]];
        matrix = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
            header: 1,
            raw: true,
            defval: '',
            blankrows: false,
        });
    } catch (err) {
        throw new IngestDecodeError(filename, err);
    }

    return matrixToTable(matrix);
}

function readWorkbook(format: InputFormat, data: ArrayBuffer): XLSX.WorkBook {
    if (format === 'csv') {
        const text = new TextDecoder('utf-8').decode(data);
        return XLSX.read(text, { type: 'string', raw: true });
    }
    const bytes = format === 'xls' ? convertXlsToXlsx(data) : data;
    return XLSX.read(bytes, { type: 'array', cellDates: true });
}

/**
 * Turn a header-first matrix into a Table.
 * Rows shorter than the header are padded with ''; fully blank rows are skipped.
 */
export function matrixToTable(matrix: unknown[][]): Table {
    if (matrix.length === 0) {
        return { columns: [], rows: [] };
    }

    const [headerRow, ...body] = matrix;
    const width = body.reduce((max, values) => Math.max(max, values.length), headerRow.length);
    const columns = buildColumns(Array.from({ length: width }, (_, i) => toCell(headerRow[i])));

    const rows: Row[] = [];
    for (const values of body) {
        const cells = columns.map((_, i) => toCell(values[i]));
        if (cells.every(isBlankCell)) {
            continue;
        }
        const row: Row = {};
        columns.forEach((col, i) => {
            row[col] = cells[i];
        });
        rows.push(row);
    }

    return { columns, rows };
}

/**
 * Header names: trimmed, blank ones become "Unnamed: {i}", repeats become
 * "{name}.{n}" so every column stays addressable.
 */
export function buildColumns(headers: Cell[]): string[] {
    const seen = new Map<string, number>();
    return headers.map((header, index) => {
        const name = cleanHeader(cellToText(header)) || `Unnamed: ${index}`;
        const count = seen.get(name) ?? 0;
        seen.set(name, count + 1);
        return count === 0 ? name : `${name}.${count}`;
    });
}
