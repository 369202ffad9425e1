/**
 * Subtotal row synthesis.
 *
 * Column rules:
 * - every column defaults to ''
 * - Party and GSTIN carry the group key
 * - TAXABLE and NETAMOUNT are always shown, even when 0
 * - IGST, CGST and SGST are '' when their rounded sum is exactly 0
 * - TAXPER is blanked
 */

import type { Cell, NumericColumn, Row } from '../types/index.js';
import {
    NUMERIC_COLUMNS,
    REQUIRED_COLUMNS,
    TAX_RATE_COLUMN,
    ZERO_SUPPRESSED_COLUMNS,
} from '../types/index.js';
import { sumAmounts } from './coerce.js';
import type { RowGroup } from './group.js';

/**
 * Rounded sums of the designated amount columns over a group.
 * Member rows hold coerced numbers by now; anything else counts as 0.
 */
export function sumGroup(group: RowGroup): Record<NumericColumn, number> {
    const sums: Record<NumericColumn, number> = { TAXABLE: 0, IGST: 0, CGST: 0, SGST: 0, NETAMOUNT: 0 };
    for (const col of NUMERIC_COLUMNS) {
        sums[col] = sumAmounts(group.rows.map((row) => amountOf(row[col])));
    }
    return sums;
}

/**
 * Build the subtotal row that follows a group's member rows.
 *
 * @param columns - Output columns, in order
 * @param group - Group being closed
 */
export function buildSubtotalRow(columns: readonly string[], group: RowGroup): Row {
    const sums = sumGroup(group);
    const row: Row = {};
    for (const col of columns) {
        row[col] = '';
    }

    row[REQUIRED_COLUMNS.GSTIN] = group.key.gstin;
    row[REQUIRED_COLUMNS.PARTY] = group.key.party;

    for (const col of NUMERIC_COLUMNS) {
        row[col] = renderSum(col, sums[col]);
    }
    if (columns.includes(TAX_RATE_COLUMN)) {
        row[TAX_RATE_COLUMN] = '';
    }

    return row;
}

function renderSum(col: NumericColumn, sum: number): Cell {
    if (ZERO_SUPPRESSED_COLUMNS.includes(col) && sum === 0) {
        return '';
    }
    return sum;
}

function amountOf(value: Cell | undefined): number {
    return typeof value === 'number' ? value : 0;
}
