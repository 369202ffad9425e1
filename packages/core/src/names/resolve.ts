/**
 * Party short-name resolution.
 *
 * Lookup order:
 * 1. Alias table, first entry whose normalized alias is a substring of the
 *    normalized party name (declared order, not longest match)
 * 2. Fallback shortening heuristic
 *
 * ARCHITECTURAL NOTE: Pure functions. The alias table is passed in, never global.
 */

import type { AliasEntry, Cell } from '../types/index.js';
import { cellToText } from '../utils/cell.js';
import { normalizeForMatch } from './normalize.js';

/**
 * Alias entry with its lookup key precomputed.
 */
export interface CompiledAlias extends AliasEntry {
    key: string;
}

export type CompiledAliasTable = readonly CompiledAlias[];

/**
 * Legal-form and division words dropped by the fallback heuristic.
 * Matched whole-word and case-insensitive.
 */
const SUFFIX_WORDS = [
    'INDIA',
    'LTD',
    'LIMITED',
    'PVT',
    'PRIVATE',
    'COMPANY',
    'CO',
    'PVT.',
    'LTD.',
    'PVT LTD',
    'DIVISION',
    'APC',
    'APC-DIVISION',
];

const SUFFIX_PATTERN = new RegExp(`\\b(?:${SUFFIX_WORDS.map(escapeRegExp).join('|')})\\b`, 'gi');

/**
 * Build the immutable lookup table once. Order is preserved.
 */
export function compileAliasTable(entries: readonly AliasEntry[]): CompiledAliasTable {
    return Object.freeze(
        entries.map((entry) =>
            Object.freeze({ alias: entry.alias, short: entry.short, key: normalizeForMatch(entry.alias) })
        )
    );
}

/**
 * Resolve a raw party name to its canonical short form.
 *
 * @param name - Party cell as read from the table
 * @param aliases - Compiled alias table (see compileAliasTable)
 */
export function resolvePartyShort(name: Cell | null | undefined, aliases: CompiledAliasTable): string {
    const normalized = normalizeForMatch(name);
    for (const entry of aliases) {
        // Empty keys would match every name
        if (entry.key && normalized.includes(entry.key)) {
            return entry.short.toUpperCase();
        }
    }
    return fallbackShorten(name);
}

/**
 * Shorten a party name with no alias.
 *
 * Steps, in order:
 * - trim
 * - drop every "(...)" span
 * - keep the text before the first hyphen, then before the first slash
 * - drop legal suffix words (LTD, PVT, INDIA, ...)
 * - collapse repeated whitespace, uppercase
 *
 * Never returns '' for a name that had content: if everything was stripped,
 * the trimmed original is returned uppercased.
 */
export function fallbackShorten(name: Cell | null | undefined): string {
    if (name === null || name === undefined) {
        return '';
    }

    const original = cellToText(name).trim();
    let s = original.replace(/\(.*?\)/g, '');

    if (s.includes('-')) {
        s = s.split('-', 1)[0].trim();
    }
    if (s.includes('/')) {
        s = s.split('/', 1)[0].trim();
    }

    s = s.replace(SUFFIX_PATTERN, '').trim();
    s = s.replace(/\s{2,}/g, ' ').trim();

    return s ? s.toUpperCase() : original.toUpperCase();
}

function escapeRegExp(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
