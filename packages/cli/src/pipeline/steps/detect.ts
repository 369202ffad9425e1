import { detectFormat } from '@gst-summarizer/core';
import type { PipelineStep } from '../types.js';
import { errorMessage } from '../../utils/errors.js';

/**
 * Step 2: Format Detection
 * Rejects unsupported extensions before the file is read.
 */
export const detectInput: PipelineStep = async (state) => {
    try {
        state.format = detectFormat(state.input.filename);
    } catch (err) {
        state.errors.push({
            step: 'detect',
            message: errorMessage(err),
            fatal: true,
            error: err
        });
    }
    return state;
};
