import { normalizeForMatch } from '@gst-summarizer/core';
import type { AliasTable } from '@gst-summarizer/shared';
import { resolveWorkspace } from '../workspace/paths.js';
import { loadAliasTable, resolveWorkspaceRoot } from '../workspace/config.js';
import { log, warn, fail } from '../utils/console.js';
import type { AliasesOptions } from '../types.js';
import { errorMessage } from '../utils/errors.js';

/**
 * Print the alias table in lookup order.
 */
export async function listAliases(options: AliasesOptions): Promise<void> {
    const workspace = resolveWorkspace(resolveWorkspaceRoot(options.workspace));
    const path = options.aliases ?? workspace.config.aliasesPath;

    let entries: AliasTable;
    try {
        entries = loadAliasTable(path);
    } catch (err) {
        fail(`Failed to load alias table. ${errorMessage(err)}`);
        process.exit(1);
    }

    log(`Alias table: ${path}`);
    entries.forEach((entry, i) => {
        log(`${String(i + 1).padStart(3)}. ${entry.alias} → ${entry.short.toUpperCase()}`);
        if (!normalizeForMatch(entry.alias)) {
            warn(`     "${entry.alias}" has no letters or digits and never matches.`);
        }
    });
}
