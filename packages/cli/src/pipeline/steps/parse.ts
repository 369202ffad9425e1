import { readFile } from 'node:fs/promises';
import { readTable } from '@gst-summarizer/core';
import type { PipelineStep } from '../types.js';
import { errorMessage } from '../../utils/errors.js';
import { hashContent } from '../../utils/hash.js';
import { toArrayBuffer } from '../../transform.js';

/**
 * Step 3: Parsing
 * Reads the input into memory and decodes its first sheet into a table.
 */
export const parseInput: PipelineStep = async (state) => {
    try {
        const buffer = await readFile(state.input.path);
        state.input.hash = hashContent(buffer);

        const table = readTable(state.input.filename, toArrayBuffer(buffer));
        if (table.rows.length === 0) {
            state.warnings.push(`No data rows found in ${state.input.filename}.`);
        }
        state.table = table;
    } catch (err) {
        state.errors.push({
            step: 'parse',
            message: `Failed to parse ${state.input.filename}: ${errorMessage(err)}`,
            fatal: true,
            error: err
        });
    }

    return state;
};
