/**
 * Party name normalization for alias matching.
 *
 * NOTE: This key is only for lookups. Output rows carry the resolved short
 * name, never the normalized key.
 */

import type { Cell } from '../types/index.js';
import { cellToText } from '../utils/cell.js';

/**
 * Normalize a party name into a lookup key.
 *
 * Transformations:
 * - Convert to uppercase
 * - Drop every character outside A-Z and 0-9 (spaces, punctuation, accents)
 *
 * Absent input yields ''. Applying it to its own output returns the same key.
 */
export function normalizeForMatch(value: Cell | null | undefined): string {
    if (value === null || value === undefined) {
        return '';
    }
    return cellToText(value).toUpperCase().replace(/[^A-Z0-9]+/g, '');
}
