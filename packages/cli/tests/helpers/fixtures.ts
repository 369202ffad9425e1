import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { Worksheet } from 'exceljs';
import type { AliasEntry, SummaryResult } from '@gst-summarizer/shared';

export const TEST_ALIASES: AliasEntry[] = [
    { alias: 'ASIAN PAINTS', short: 'ASIAN' },
    { alias: 'SIMPSON & CO', short: 'SIMPSON' },
];

export const SALES_CSV =
    'bl_invno,Party,GSTIN,TAXPER,TAXABLE,IGST,CGST,SGST,NETAMOUNT\n' +
    'INV-1,Asian Paints Ltd,29AAA,18,100,0,9,9,118\n' +
    'INV-2,Mehta Traders Pvt Ltd,24BBB,18,200,36,0,0,236\n' +
    'INV-3,ASIAN PAINTS LTD,29AAA,18,50,0,4.5,4.5,59\n';

/**
 * Summary of one intra-state group of two invoices.
 */
export function sampleSummary(): SummaryResult {
    return {
        table: {
            columns: ['Party', 'GSTIN', 'TAXABLE', 'IGST', 'CGST', 'SGST', 'NETAMOUNT'],
            rows: [
                { Party: 'ASIAN', GSTIN: '29AAA', TAXABLE: 100, IGST: 0, CGST: 9, SGST: 9, NETAMOUNT: 118 },
                { Party: 'ASIAN', GSTIN: '29AAA', TAXABLE: 50, IGST: 0, CGST: 4.5, SGST: 4.5, NETAMOUNT: 59 },
                { Party: 'ASIAN', GSTIN: '29AAA', TAXABLE: 150, IGST: '', CGST: 13.5, SGST: 13.5, NETAMOUNT: 177 },
            ],
        },
        groups: [{ party: 'ASIAN', gstin: '29AAA', rowCount: 2, subtotalIndex: 2 }],
        warnings: [],
    };
}

export async function makeTempDir(): Promise<string> {
    return mkdtemp(join(tmpdir(), 'gstsum-test-'));
}

export async function removeTempDir(dir: string): Promise<void> {
    await rm(dir, { recursive: true, force: true });
}

/**
 * Cell values of a worksheet row, without exceljs' unused index 0.
 */
export function rowValues(sheet: Worksheet, rowNumber: number): unknown[] {
    const values = sheet.getRow(rowNumber).values;
    return Array.isArray(values) ? values.slice(1) : [];
}
