import { basename, resolve } from 'node:path';
import { compileAliasTable } from '@gst-summarizer/core';
import { resolveWorkspace } from '../workspace/paths.js';
import { loadAliasTable, resolveCleanupAgeMinutes, resolveWorkspaceRoot } from '../workspace/config.js';
import { FileOutputStore } from '../store/output-store.js';
import { runPipeline } from '../pipeline/runner.js';
import type { PipelineState } from '../pipeline/types.js';
import { log, success, warn, arrow, fail } from '../utils/console.js';
import { downloadName } from '../utils/filename.js';
import { renderPreview, countDisplayGroups } from '../utils/preview.js';
import type { ProcessOptions } from '../types.js';
import { errorMessage } from '../utils/errors.js';

export async function processFile(filePath: string, options: ProcessOptions): Promise<void> {
    const filename = basename(filePath);
    log(`\nGST Summarizer - Processing ${filename}`);

    // 1. Workspace resolution
    arrow('Resolving workspace...');
    const workspace = resolveWorkspace(resolveWorkspaceRoot(options.workspace));
    success(`Workspace: ${workspace.root}`);

    // 2. Configuration
    let state: PipelineState;
    try {
        const aliasesPath = options.aliases ?? workspace.config.aliasesPath;
        const aliases = compileAliasTable(loadAliasTable(aliasesPath));
        arrow(`Alias table: ${aliasesPath} (${aliases.length} entries)`);

        state = {
            input: { path: resolve(filePath), filename },
            workspace,
            options,
            aliases,
            store: new FileOutputStore(workspace.root),
            cleanupAgeMinutes: resolveCleanupAgeMinutes(options.maxAge),
            purged: [],
            warnings: [],
            errors: [],
        };
    } catch (err) {
        fail(`Failed to load configuration. ${errorMessage(err)}`);
        process.exit(1);
    }

    // 3. Run Pipeline
    state = await runPipeline(state);

    // 4. Report Final Status
    log('\n--- Processing Summary ---');

    for (const w of state.warnings) {
        warn(w);
    }

    if (state.errors.length > 0) {
        for (const e of state.errors) {
            console.error(`✖ ERROR [${e.step}]: ${e.message}`);
        }
        if (state.errors.some(e => e.fatal)) {
            log('\n✖ Processing failed with fatal errors.');
            process.exit(1);
        }
    }

    if (state.purged.length > 0) {
        arrow(`Purged ${state.purged.length} expired output(s)`);
    }

    const summary = state.summary;
    if (!summary) {
        return;
    }

    const limit = Math.min(options.preview, summary.table.rows.length);
    if (limit > 0) {
        log(`\nPreview - showing first ${limit} rows`);
        for (const line of renderPreview(summary, limit)) {
            log(line);
        }
    }

    log('');
    success(`Processing complete for ${filename}.`);
    arrow(`Rows: ${summary.table.rows.length} • Groups: ${countDisplayGroups(summary)}`);

    if (state.output) {
        arrow(`Token:    ${state.output.token}`);
        arrow(`Saved to: ${state.output.path}`);
        arrow(`Download: ${downloadName(state.output.original_name)}`);
    } else if (state.options.dryRun) {
        log('\n[DRY RUN] No files were written.');
    }
}
