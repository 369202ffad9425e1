import type { PipelineStep } from '../types.js';
import { errorMessage } from '../../utils/errors.js';

/**
 * Step 1: Output Cleanup
 * Purges saved outputs older than the cleanup age. Failures only warn.
 */
export const purgeExpired: PipelineStep = async (state) => {
    try {
        state.purged = await state.store.purgeOlderThanMinutes(state.cleanupAgeMinutes);
    } catch (err) {
        state.errors.push({
            step: 'cleanup',
            message: `Failed to purge old outputs in ${state.store.root}: ${errorMessage(err)}`,
            fatal: false,
            error: err
        });
    }
    return state;
};
