import type { PipelineStep } from '../types.js';
import { errorMessage } from '../../utils/errors.js';
import { writeSummaryWorkbook } from '../../excel/summary.js';

/**
 * Step 5: Export
 * Writes the summary workbook into the output store under a new token.
 */
export const exportResult: PipelineStep = async (state) => {
    if (!state.summary) {
        state.errors.push({ step: 'export', message: 'Nothing to export.', fatal: true });
        return state;
    }

    if (state.options.dryRun) {
        state.warnings.push('Dry run: Skipping file export.');
        return state;
    }

    try {
        const content = await writeSummaryWorkbook(state.summary);
        state.output = await state.store.save(state.input.filename, content, state.input.hash);
    } catch (err) {
        state.errors.push({
            step: 'export',
            message: `Failed to save output to ${state.store.root}: ${errorMessage(err)}`,
            fatal: true,
            error: err
        });
    }

    return state;
};
