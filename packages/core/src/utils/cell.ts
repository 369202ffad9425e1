/**
 * Cell conversion helpers shared by the resolver, ingestor and summarizer.
 */

import type { Cell } from '../types/index.js';

/**
 * Narrow an arbitrary decoded value to a Cell. Absent values become ''.
 */
export function toCell(value: unknown): Cell {
    if (value === null || value === undefined) {
        return '';
    }
    if (
        typeof value === 'string' ||
        typeof value === 'number' ||
        typeof value === 'boolean' ||
        value instanceof Date
    ) {
        return value;
    }
    return String(value);
}

/**
 * Text form of a cell, as written into grouping keys.
 * Booleans read True/False, dates read YYYY-MM-DD.
 */
export function cellToText(value: Cell): string {
    if (typeof value === 'string') {
        return value;
    }
    if (typeof value === 'boolean') {
        return value ? 'True' : 'False';
    }
    if (value instanceof Date) {
        return formatIsoDate(value);
    }
    return String(value);
}

/**
 * Format date as ISO YYYY-MM-DD string using UTC components.
 */
export function formatIsoDate(date: Date): string {
    const year = date.getUTCFullYear();
    const month = String(date.getUTCMonth() + 1).padStart(2, '0');
    const day = String(date.getUTCDate()).padStart(2, '0');
    return `${year}-${month}-${day}`;
}

/**
 * True for the empty-cell sentinel and whitespace-only text.
 */
export function isBlankCell(value: Cell): boolean {
    return typeof value === 'string' && value.trim() === '';
}
