import { summarizeTable } from '@gst-summarizer/core';
import type { PipelineStep } from '../types.js';
import { errorMessage } from '../../utils/errors.js';

/**
 * Step 4: Summarizing
 * Resolves party short names and inserts a subtotal row per (party, GSTIN) group.
 */
export const summarizeInput: PipelineStep = async (state) => {
    if (!state.table) {
        state.errors.push({ step: 'summarize', message: 'No table to summarize.', fatal: true });
        return state;
    }

    try {
        state.summary = summarizeTable(state.table, state.aliases);
    } catch (err) {
        state.errors.push({
            step: 'summarize',
            message: errorMessage(err),
            fatal: true,
            error: err
        });
        return state;
    }

    // Forward core warnings to pipeline state
    for (const warning of state.summary.warnings) {
        state.warnings.push(`[${state.input.filename}] ${warning}`);
    }

    return state;
};
