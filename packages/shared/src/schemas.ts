/**
 * Zod schemas for GST Summarizer data structures.
 *
 * Cells keep the type the decoder produced. Amounts are JS numbers on the
 * table and are rounded through decimal.js inside the core.
 */

import { z } from 'zod';

// ============================================================================
// Tables
// ============================================================================

/**
 * A single cell. Empty cells are the empty string, never null.
 */
export const CellSchema = z.union([z.string(), z.number(), z.boolean(), z.date()]);

export type Cell = z.infer<typeof CellSchema>;

/**
 * A row: column name → cell.
 */
export const RowSchema = z.record(z.string(), CellSchema);

export type Row = z.infer<typeof RowSchema>;

/**
 * An ordered set of columns plus rows that each carry every column.
 */
export const TableSchema = z
    .object({
        columns: z.array(z.string()),
        rows: z.array(RowSchema),
    })
    .superRefine((table, ctx) => {
        table.rows.forEach((row, index) => {
            const missing = table.columns.filter((col) => !(col in row));
            if (missing.length > 0) {
                ctx.addIssue({
                    code: z.ZodIssueCode.custom,
                    path: ['rows', index],
                    message: `Row is missing columns: ${missing.join(', ')}`,
                });
            }
        });
    });

export type Table = z.infer<typeof TableSchema>;

// ============================================================================
// Party aliases
// ============================================================================

/**
 * One alias: raw alias text and the short name it resolves to.
 */
export const AliasEntrySchema = z.object({
    alias: z.string().min(1),
    short: z.string().min(1),
});

export type AliasEntry = z.infer<typeof AliasEntrySchema>;

/**
 * Ordered alias table. Order matters: lookup is first substring match.
 */
export const AliasTableSchema = z.array(AliasEntrySchema);

export type AliasTable = z.infer<typeof AliasTableSchema>;

/**
 * Alias file on disk: either a bare list or `{ aliases: [...] }`.
 */
export const AliasFileSchema = z.union([
    AliasTableSchema,
    z.object({ aliases: AliasTableSchema }).transform((file) => file.aliases),
]);

// ============================================================================
// Summary output
// ============================================================================

/**
 * One (short name, GSTIN) bucket and where its subtotal row landed.
 */
export const GroupSummarySchema = z.object({
    party: z.string(),
    gstin: z.string(),
    rowCount: z.number().int().min(1),
    subtotalIndex: z.number().int().min(0),
});

export type GroupSummary = z.infer<typeof GroupSummarySchema>;

/**
 * What summarizeTable() returns.
 * Per architectural constraint: no console.* in core, warnings travel here.
 */
export const SummaryResultSchema = z.object({
    table: TableSchema,
    groups: z.array(GroupSummarySchema),
    warnings: z.array(z.string()),
});

export type SummaryResult = z.infer<typeof SummaryResultSchema>;

// ============================================================================
// Output store
// ============================================================================

/**
 * Opaque download token: 32 lower-case hex characters.
 */
export const OutputTokenSchema = z.string().regex(/^[0-9a-f]{32}$/, 'Must be 32-char hex token');

/**
 * A transformed workbook saved for later download.
 */
export const StoredOutputSchema = z.object({
    token: OutputTokenSchema,
    path: z.string().min(1),
    original_name: z.string(),
    created_at: z.string().datetime(),
    input_hash: z.string().optional(),
});

export type StoredOutput = z.infer<typeof StoredOutputSchema>;

/**
 * The store's index.json: token → record.
 */
export const OutputIndexSchema = z.record(OutputTokenSchema, StoredOutputSchema);

export type OutputIndex = z.infer<typeof OutputIndexSchema>;
