/**
 * Core entry point: file bytes → summary.
 *
 * Headless: the caller reads the file and writes the output workbook.
 */

import type { SummaryResult } from './types/index.js';
import type { CompiledAliasTable } from './names/resolve.js';
import { readTable } from './ingest/read-table.js';
import { summarizeTable } from './summarize/summarize.js';

/**
 * Read a supported file and insert subtotal rows.
 *
 * Either the full summary is returned or an error is thrown; there is no
 * partial result.
 *
 * @throws UnsupportedFormatError, IngestDecodeError, InvalidTableError, MissingColumnError
 */
export function summarizeFile(filename: string, data: ArrayBuffer, aliases: CompiledAliasTable): SummaryResult {
    return summarizeTable(readTable(filename, data), aliases);
}
