/**
 * Lenient numeric and key coercion.
 *
 * Amount cells in real ledgers are routinely blank or hold placeholders
 * ("-", "N/A"). Those become 0 rather than failing the whole file.
 */

import { Decimal } from 'decimal.js';
import type { Cell } from '../types/index.js';
import { AMOUNT_DECIMALS, MISSING_GSTIN_TEXT } from '../types/index.js';
import { cellToText } from '../utils/cell.js';

const DECIMAL_LITERAL = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

/**
 * Parse an amount cell. Thousands separators are stripped.
 *
 * @returns The number, or undefined when the cell is not a finite decimal
 */
export function parseAmount(value: Cell): number | undefined {
    if (typeof value === 'number') {
        return Number.isFinite(value) ? value : undefined;
    }
    if (typeof value !== 'string') {
        return undefined;
    }
    const clean = value.replace(/,/g, '').trim();
    if (!DECIMAL_LITERAL.test(clean)) {
        return undefined;
    }
    const parsed = Number(clean);
    return Number.isFinite(parsed) ? parsed : undefined;
}

/**
 * Parse an amount cell, defaulting to 0.
 */
export function toAmount(value: Cell): number {
    return parseAmount(value) ?? 0;
}

/**
 * Round to 2 decimal places, half to even, on the exact binary value of the
 * number. 2.675 is stored as 2.67499... and rounds to 2.67; 0.125 is exact
 * and rounds to 0.12.
 */
export function roundAmount(value: number): number {
    // toPrecision(100) spells out every binary digit of an amount-sized double
    return new Decimal(value.toPrecision(100))
        .toDecimalPlaces(AMOUNT_DECIMALS, Decimal.ROUND_HALF_EVEN)
        .toNumber();
}

/**
 * Sum amounts in floating point, left to right, then round once.
 */
export function sumAmounts(values: readonly number[]): number {
    return roundAmount(values.reduce((acc, value) => acc + value, 0));
}

/**
 * Display pass for amount columns: '' stays '', numbers are rounded,
 * anything that will not parse passes through unchanged.
 */
export function formatAmountCell(value: Cell): Cell {
    if (value === '') {
        return '';
    }
    const parsed = parseAmount(value);
    return parsed === undefined ? value : roundAmount(parsed);
}

/**
 * GSTIN as a grouping key: always a string, "nan" reads as ''.
 */
export function coerceGstin(value: Cell | null | undefined): string {
    if (value === null || value === undefined) {
        return '';
    }
    const text = cellToText(value);
    return text === MISSING_GSTIN_TEXT ? '' : text;
}
