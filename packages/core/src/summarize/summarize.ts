/**
 * Grouping & aggregation: Table → Table with subtotal rows.
 *
 * Flow:
 * 1. Coerce amount columns (absent columns are added as all-zero)
 * 2. Resolve each Party to its short name, coerce GSTIN to text
 * 3. Group by (short name, GSTIN) in first-seen order
 * 4. Emit each group's rows, then its subtotal row
 * 5. Round every amount cell to 2 places
 *
 * ARCHITECTURAL NOTE: No console.* calls. Defaulted cells are reported in warnings.
 * The input table is never mutated.
 */

import type { GroupSummary, Row, SummaryResult, Table } from '../types/index.js';
import {
    InvalidTableError,
    MissingColumnError,
    NUMERIC_COLUMNS,
    REQUIRED_COLUMNS,
    TableSchema,
} from '../types/index.js';
import type { CompiledAliasTable } from '../names/resolve.js';
import { resolvePartyShort } from '../names/resolve.js';
import { cleanHeader } from '../utils/csv.js';
import { isBlankCell } from '../utils/cell.js';
import { coerceGstin, formatAmountCell, parseAmount } from './coerce.js';
import { groupInFirstSeenOrder, type KeyedRow } from './group.js';
import { buildSubtotalRow } from './subtotal.js';

/**
 * Insert a subtotal row after every (short name, GSTIN) group.
 *
 * @param input - Table with at least Party and GSTIN columns
 * @param aliases - Compiled alias table
 * @returns New table, per-group summary and warnings
 * @throws InvalidTableError when a row lacks a declared column or holds a non-cell value
 * @throws MissingColumnError when Party or GSTIN is absent
 */
export function summarizeTable(input: Table, aliases: CompiledAliasTable): SummaryResult {
    const parsed = TableSchema.safeParse(input);
    if (!parsed.success) {
        throw new InvalidTableError(parsed.error.issues.map((issue) => issue.message));
    }
    const table = trimHeaders(parsed.data);

    const required = [REQUIRED_COLUMNS.PARTY, REQUIRED_COLUMNS.GSTIN];
    const missing = required.filter((col) => !table.columns.includes(col));
    if (missing.length > 0) {
        throw new MissingColumnError(missing);
    }

    const absentAmounts = NUMERIC_COLUMNS.filter((col) => !table.columns.includes(col));
    const columns = [...table.columns, ...absentAmounts];
    const defaulted = new Map<string, number>();

    const keyed: KeyedRow[] = table.rows.map((source) => {
        const row: Row = {};
        for (const col of columns) {
            row[col] = source[col] ?? '';
        }

        for (const col of NUMERIC_COLUMNS) {
            const parsed = parseAmount(row[col]);
            if (parsed === undefined && !isBlankCell(row[col])) {
                defaulted.set(col, (defaulted.get(col) ?? 0) + 1);
            }
            row[col] = parsed ?? 0;
        }

        const key = {
            party: resolvePartyShort(source[REQUIRED_COLUMNS.PARTY], aliases),
            gstin: coerceGstin(source[REQUIRED_COLUMNS.GSTIN]),
        };
        row[REQUIRED_COLUMNS.GSTIN] = key.gstin;

        return { row, key };
    });

    const rows: Row[] = [];
    const groups: GroupSummary[] = [];

    for (const group of groupInFirstSeenOrder(keyed)) {
        for (const member of group.rows) {
            rows.push({ ...member, [REQUIRED_COLUMNS.PARTY]: group.key.party });
        }
        groups.push({
            party: group.key.party,
            gstin: group.key.gstin,
            rowCount: group.rows.length,
            subtotalIndex: rows.length,
        });
        rows.push(buildSubtotalRow(columns, group));
    }

    for (const row of rows) {
        for (const col of NUMERIC_COLUMNS) {
            row[col] = formatAmountCell(row[col]);
        }
    }

    const warnings: string[] = [];
    for (const [col, count] of defaulted) {
        warnings.push(`Treated ${count} non-numeric ${col} value(s) as 0`);
    }

    return { table: { columns, rows }, groups, warnings };
}

/**
 * Copy of the table with whitespace-trimmed column names.
 */
export function trimHeaders(table: Table): Table {
    const columns = table.columns.map(cleanHeader);
    const rows = table.rows.map((row) => {
        const clean: Row = {};
        table.columns.forEach((col, i) => {
            clean[columns[i]] = row[col] ?? '';
        });
        return clean;
    });
    return { columns, rows };
}
