import { describe, it, expect } from 'vitest';
import { summarizeTable, trimHeaders } from '../../src/summarize/summarize.js';
import { buildSubtotalRow, sumGroup } from '../../src/summarize/subtotal.js';
import { compileAliasTable } from '../../src/names/resolve.js';
import { InvalidTableError, MissingColumnError } from '../../src/types/index.js';
import type { Table } from '../../src/types/index.js';
import { TEST_ALIASES } from '../helpers/fixtures.js';

const aliases = compileAliasTable(TEST_ALIASES);
const COLUMNS = ['Party', 'GSTIN', 'TAXABLE', 'IGST', 'CGST', 'SGST', 'NETAMOUNT'];

describe('summarizeTable', () => {
    it('inserts a subtotal after an intra-state group', () => {
        const input: Table = {
            columns: COLUMNS,
            rows: [
                { Party: 'ASIAN PAINTS LTD', GSTIN: '29AAA', TAXABLE: '100', IGST: '0', CGST: '9', SGST: '9', NETAMOUNT: '118' },
                { Party: 'Asian Paints (India)', GSTIN: '29AAA', TAXABLE: '50', IGST: '0', CGST: '4.5', SGST: '4.5', NETAMOUNT: '59' },
            ],
        };

        const result = summarizeTable(input, aliases);

        expect(result.table.columns).toEqual(COLUMNS);
        expect(result.table.rows).toEqual([
            { Party: 'ASIAN', GSTIN: '29AAA', TAXABLE: 100, IGST: 0, CGST: 9, SGST: 9, NETAMOUNT: 118 },
            { Party: 'ASIAN', GSTIN: '29AAA', TAXABLE: 50, IGST: 0, CGST: 4.5, SGST: 4.5, NETAMOUNT: 59 },
            { Party: 'ASIAN', GSTIN: '29AAA', TAXABLE: 150, IGST: '', CGST: 13.5, SGST: 13.5, NETAMOUNT: 177 },
        ]);
        expect(result.groups).toEqual([{ party: 'ASIAN', gstin: '29AAA', rowCount: 2, subtotalIndex: 2 }]);
        expect(result.warnings).toEqual([]);
    });

    it('keeps groups in first-seen order when keys interleave', () => {
        const input: Table = {
            columns: COLUMNS,
            rows: [
                { Party: 'Asian Paints Ltd', GSTIN: 'G1', TAXABLE: 100, IGST: 18, CGST: 0, SGST: 0, NETAMOUNT: 118 },
                { Party: 'Ravi & Co', GSTIN: 'G2', TAXABLE: 200, IGST: 0, CGST: 18, SGST: 18, NETAMOUNT: 236 },
                { Party: 'ASIAN PAINTS (I) LTD', GSTIN: 'G1', TAXABLE: 50, IGST: 9, CGST: 0, SGST: 0, NETAMOUNT: 59 },
            ],
        };

        const result = summarizeTable(input, aliases);

        expect(result.table.rows).toEqual([
            { Party: 'ASIAN', GSTIN: 'G1', TAXABLE: 100, IGST: 18, CGST: 0, SGST: 0, NETAMOUNT: 118 },
            { Party: 'ASIAN', GSTIN: 'G1', TAXABLE: 50, IGST: 9, CGST: 0, SGST: 0, NETAMOUNT: 59 },
            { Party: 'ASIAN', GSTIN: 'G1', TAXABLE: 150, IGST: 27, CGST: '', SGST: '', NETAMOUNT: 177 },
            { Party: 'RAVI &', GSTIN: 'G2', TAXABLE: 200, IGST: 0, CGST: 18, SGST: 18, NETAMOUNT: 236 },
            { Party: 'RAVI &', GSTIN: 'G2', TAXABLE: 200, IGST: '', CGST: 18, SGST: 18, NETAMOUNT: 236 },
        ]);
        expect(result.groups).toEqual([
            { party: 'ASIAN', gstin: 'G1', rowCount: 2, subtotalIndex: 2 },
            { party: 'RAVI &', gstin: 'G2', rowCount: 1, subtotalIndex: 4 },
        ]);
    });

    it('emits one row per input row plus one per group', () => {
        const input: Table = {
            columns: ['Party', 'GSTIN'],
            rows: [
                { Party: 'A', GSTIN: '1' },
                { Party: 'B', GSTIN: '1' },
                { Party: 'A', GSTIN: '2' },
                { Party: 'A', GSTIN: '1' },
            ],
        };

        const result = summarizeTable(input, aliases);

        expect(result.groups).toHaveLength(3);
        expect(result.table.rows).toHaveLength(input.rows.length + result.groups.length);
        for (const group of result.groups) {
            expect(result.table.rows[group.subtotalIndex].Party).toBe(group.party);
        }
    });

    it('splits equal short names with different GSTINs', () => {
        const input: Table = {
            columns: ['Party', 'GSTIN', 'TAXABLE'],
            rows: [
                { Party: 'Asian Paints Ltd', GSTIN: '29AAA', TAXABLE: 10 },
                { Party: 'Asian Paints Ltd', GSTIN: '33BBB', TAXABLE: 20 },
            ],
        };

        const result = summarizeTable(input, aliases);

        expect(result.groups.map((g) => [g.party, g.gstin, g.rowCount])).toEqual([
            ['ASIAN', '29AAA', 1],
            ['ASIAN', '33BBB', 1],
        ]);
    });

    it('treats a "nan" GSTIN as missing', () => {
        const input: Table = {
            columns: ['Party', 'GSTIN', 'NETAMOUNT'],
            rows: [
                { Party: 'Cash Sales', GSTIN: 'nan', NETAMOUNT: 10 },
                { Party: 'Cash Sales', GSTIN: '', NETAMOUNT: 5 },
            ],
        };

        const result = summarizeTable(input, aliases);

        expect(result.groups).toEqual([{ party: 'CASH SALES', gstin: '', rowCount: 2, subtotalIndex: 2 }]);
        expect(result.table.rows.map((r) => r.GSTIN)).toEqual(['', '', '']);
        expect(result.table.rows[2].NETAMOUNT).toBe(15);
    });

    it('groups numeric and text GSTINs with the same digits together', () => {
        const input: Table = {
            columns: ['Party', 'GSTIN'],
            rows: [
                { Party: 'A', GSTIN: 29 },
                { Party: 'A', GSTIN: '29' },
            ],
        };

        const result = summarizeTable(input, aliases);

        expect(result.groups).toEqual([{ party: 'A', gstin: '29', rowCount: 2, subtotalIndex: 2 }]);
    });

    it('appends absent amount columns as zeros', () => {
        const input: Table = {
            columns: ['Party', 'GSTIN', 'TAXABLE'],
            rows: [{ Party: 'Ravi & Co', GSTIN: 'G2', TAXABLE: 100 }],
        };

        const result = summarizeTable(input, aliases);

        expect(result.table.columns).toEqual(COLUMNS);
        expect(result.table.rows).toEqual([
            { Party: 'RAVI &', GSTIN: 'G2', TAXABLE: 100, IGST: 0, CGST: 0, SGST: 0, NETAMOUNT: 0 },
            { Party: 'RAVI &', GSTIN: 'G2', TAXABLE: 100, IGST: '', CGST: '', SGST: '', NETAMOUNT: 0 },
        ]);
    });

    it('blanks the tax rate and other columns on subtotal rows', () => {
        const input: Table = {
            columns: ['bl_invno', 'Party', 'GSTIN', 'TAXPER', 'TAXABLE', 'IGST', 'CGST', 'SGST', 'NETAMOUNT'],
            rows: [
                { bl_invno: 'INV-1', Party: 'Ravi & Co', GSTIN: 'G2', TAXPER: 18, TAXABLE: 100, IGST: 18, CGST: 0, SGST: 0, NETAMOUNT: 118 },
            ],
        };

        const result = summarizeTable(input, aliases);

        expect(result.table.rows[0].TAXPER).toBe(18);
        expect(result.table.rows[1]).toEqual({
            bl_invno: '',
            Party: 'RAVI &',
            GSTIN: 'G2',
            TAXPER: '',
            TAXABLE: 100,
            IGST: 18,
            CGST: '',
            SGST: '',
            NETAMOUNT: 118,
        });
    });

    it('shows TAXABLE and NETAMOUNT totals even when zero', () => {
        const input: Table = {
            columns: COLUMNS,
            rows: [{ Party: 'A', GSTIN: 'G', TAXABLE: 0, IGST: 0, CGST: 0, SGST: 0, NETAMOUNT: 0 }],
        };

        const subtotal = summarizeTable(input, aliases).table.rows[1];

        expect(subtotal.TAXABLE).toBe(0);
        expect(subtotal.NETAMOUNT).toBe(0);
        expect(subtotal.IGST).toBe('');
    });

    it('treats unparseable amounts as zero and reports them', () => {
        const input: Table = {
            columns: ['Party', 'GSTIN', 'TAXABLE', 'NETAMOUNT'],
            rows: [
                { Party: 'A', GSTIN: 'G', TAXABLE: 'N/A', NETAMOUNT: '1,200.50' },
                { Party: 'A', GSTIN: 'G', TAXABLE: '-', NETAMOUNT: '' },
                { Party: 'A', GSTIN: 'G', TAXABLE: 25, NETAMOUNT: 'abc' },
            ],
        };

        const result = summarizeTable(input, aliases);

        expect(result.table.rows.map((r) => r.TAXABLE)).toEqual([0, 0, 25, 25]);
        expect(result.table.rows.map((r) => r.NETAMOUNT)).toEqual([1200.5, 0, 0, 1200.5]);
        expect(result.warnings).toEqual([
            'Treated 2 non-numeric TAXABLE value(s) as 0',
            'Treated 1 non-numeric NETAMOUNT value(s) as 0',
        ]);
    });

    it('rounds member amounts and totals to two places', () => {
        const input: Table = {
            columns: ['Party', 'GSTIN', 'TAXABLE'],
            rows: [
                { Party: 'A', GSTIN: 'G', TAXABLE: 10.456 },
                { Party: 'A', GSTIN: 'G', TAXABLE: 0.004 },
            ],
        };

        const result = summarizeTable(input, aliases);

        expect(result.table.rows.map((r) => r.TAXABLE)).toEqual([10.46, 0, 10.46]);
    });

    it('rounds ties on the stored value, half to even', () => {
        const input: Table = {
            columns: ['Party', 'GSTIN', 'TAXABLE', 'CGST'],
            rows: [{ Party: 'A', GSTIN: 'G', TAXABLE: 2.675, CGST: 0.125 }],
        };

        const rows = summarizeTable(input, aliases).table.rows;

        expect(rows.map((r) => r.TAXABLE)).toEqual([2.67, 2.67]);
        expect(rows.map((r) => r.CGST)).toEqual([0.12, 0.12]);
    });

    it('rejects a row that lacks a declared column', () => {
        const input: Table = {
            columns: ['Party', 'GSTIN', 'TAXABLE'],
            rows: [{ Party: 'A', GSTIN: 'G' }],
        };

        expect(() => summarizeTable(input, aliases)).toThrow(InvalidTableError);
        expect(() => summarizeTable(input, aliases)).toThrow('Row is missing columns: TAXABLE');
    });

    it('trims header whitespace before checking columns', () => {
        const input: Table = {
            columns: [' Party ', 'GSTIN '],
            rows: [{ ' Party ': 'A', 'GSTIN ': 'G' }],
        };

        const result = summarizeTable(input, aliases);

        expect(result.table.columns.slice(0, 2)).toEqual(['Party', 'GSTIN']);
        expect(result.table.rows[0].Party).toBe('A');
    });

    it('resolves a blank party to an empty short name', () => {
        const input: Table = { columns: ['Party', 'GSTIN'], rows: [{ Party: '', GSTIN: 'G' }] };

        expect(summarizeTable(input, aliases).groups[0].party).toBe('');
    });

    it('returns only the columns for a table without rows', () => {
        const result = summarizeTable({ columns: ['Party', 'GSTIN'], rows: [] }, aliases);

        expect(result).toEqual({ table: { columns: COLUMNS, rows: [] }, groups: [], warnings: [] });
    });

    it('does not mutate the input table', () => {
        const input: Table = {
            columns: ['Party', 'GSTIN', 'TAXABLE'],
            rows: [{ Party: 'Asian Paints', GSTIN: 'nan', TAXABLE: '1,000' }],
        };
        const before = JSON.parse(JSON.stringify(input));

        summarizeTable(input, aliases);

        expect(input).toEqual(before);
    });

    it('requires the GSTIN column', () => {
        const input: Table = { columns: ['Party', 'TAXABLE'], rows: [] };

        expect(() => summarizeTable(input, aliases)).toThrow(MissingColumnError);
        expect(() => summarizeTable(input, aliases)).toThrow("Input must contain 'Party' and 'GSTIN' columns.");
    });

    it('names both required columns when Party is absent', () => {
        try {
            summarizeTable({ columns: ['party', 'GSTIN'], rows: [] }, aliases);
            expect.fail('expected MissingColumnError');
        } catch (err) {
            expect(err).toBeInstanceOf(MissingColumnError);
            if (err instanceof MissingColumnError) {
                expect(err.missing).toEqual(['Party']);
                expect(err.message).toContain("'Party'");
                expect(err.message).toContain("'GSTIN'");
            }
        }
    });
});

describe('buildSubtotalRow', () => {
    const group = {
        key: { party: 'ASIAN', gstin: '29AAA' },
        rows: [
            { Party: 'x', GSTIN: '29AAA', TAXABLE: 100, IGST: 0, CGST: 9, SGST: 9, NETAMOUNT: 118, note: 'a' },
            { Party: 'y', GSTIN: '29AAA', TAXABLE: 50.005, IGST: 0, CGST: 4.5, SGST: 4.5, NETAMOUNT: 59, note: 'b' },
        ],
    };

    it('sums each amount column', () => {
        expect(sumGroup(group)).toEqual({ TAXABLE: 150, IGST: 0, CGST: 13.5, SGST: 13.5, NETAMOUNT: 177 });
    });

    it('fills every output column', () => {
        expect(buildSubtotalRow([...COLUMNS, 'note'], group)).toEqual({
            Party: 'ASIAN',
            GSTIN: '29AAA',
            TAXABLE: 150,
            IGST: '',
            CGST: 13.5,
            SGST: 13.5,
            NETAMOUNT: 177,
            note: '',
        });
    });
});

describe('trimHeaders', () => {
    it('re-keys rows under the trimmed names', () => {
        expect(trimHeaders({ columns: [' a ', 'b'], rows: [{ ' a ': 1, b: 2 }] })).toEqual({
            columns: ['a', 'b'],
            rows: [{ a: 1, b: 2 }],
        });
    });
});
