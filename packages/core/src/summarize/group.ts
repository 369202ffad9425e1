/**
 * Order-preserving grouping by (short name, GSTIN).
 */

import type { Row } from '../types/index.js';

export interface GroupKey {
    party: string;
    gstin: string;
}

export interface KeyedRow {
    row: Row;
    key: GroupKey;
}

/**
 * Rows sharing a key, in input order.
 */
export interface RowGroup {
    readonly key: GroupKey;
    readonly rows: readonly Row[];
}

/**
 * Partition rows by key.
 *
 * Groups come back in first-seen order: a key first met at row i precedes
 * every key first met after i, however the input interleaves them.
 */
export function groupInFirstSeenOrder(keyed: readonly KeyedRow[]): RowGroup[] {
    const groups = new Map<string, { key: GroupKey; rows: Row[] }>();

    for (const { row, key } of keyed) {
        const id = groupKeyId(key);
        const group = groups.get(id);
        if (group) {
            group.rows.push(row);
        } else {
            groups.set(id, { key, rows: [row] });
        }
    }

    return Array.from(groups.values(), (group) => Object.freeze({ key: group.key, rows: Object.freeze(group.rows) }));
}

/**
 * Collision-free map key for a GroupKey.
 */
export function groupKeyId(key: GroupKey): string {
    return JSON.stringify([key.party, key.gstin]);
}
