import type { PipelineState, PipelineStep } from './types.js';
import { purgeExpired } from './steps/cleanup.js';
import { detectInput } from './steps/detect.js';
import { parseInput } from './steps/parse.js';
import { summarizeInput } from './steps/summarize.js';
import { exportResult } from './steps/export.js';

/**
 * Step order. Cleanup runs first so a run never finds its own output stale.
 */
export const PIPELINE_STEPS: { name: string; fn: PipelineStep }[] = [
    { name: 'Output Cleanup', fn: purgeExpired },
    { name: 'Format Detection', fn: detectInput },
    { name: 'Parsing', fn: parseInput },
    { name: 'Summarizing', fn: summarizeInput },
    { name: 'Export Result', fn: exportResult },
];

/**
 * Orchestrates the execution of the processing pipeline.
 * Runs each step sequentially, stopping if a fatal error occurs.
 */
export async function runPipeline(initial: PipelineState): Promise<PipelineState> {
    let state = initial;

    for (let i = 0; i < PIPELINE_STEPS.length; i++) {
        const step = PIPELINE_STEPS[i];
        console.log(`\n→ Step ${i + 1}/${PIPELINE_STEPS.length}: ${step.name}...`);

        state = await step.fn(state);

        if (state.errors.some(e => e.fatal)) {
            console.error(`\n✖ Fatal error in step "${step.name}". Stopping.`);
            break;
        }
    }

    return state;
}
