import { summarizeFile, type CompiledAliasTable } from '@gst-summarizer/core';
import { writeSummaryWorkbook } from './excel/summary.js';

/**
 * Transform an uploaded file into the summarized .xlsx, whatever the input format.
 *
 * Core errors (unsupported format, undecodable bytes, missing columns) are
 * thrown unchanged; nothing is written on failure.
 */
export async function transformFile(
    filename: string,
    content: Uint8Array,
    aliases: CompiledAliasTable
): Promise<Buffer> {
    const result = summarizeFile(filename, toArrayBuffer(content), aliases);
    return writeSummaryWorkbook(result);
}

/**
 * Copy a Node Buffer's bytes into a standalone ArrayBuffer.
 * Buffers may be views over a larger shared pool.
 */
export function toArrayBuffer(content: Uint8Array): ArrayBuffer {
    const buffer = new ArrayBuffer(content.byteLength);
    new Uint8Array(buffer).set(content);
    return buffer;
}
