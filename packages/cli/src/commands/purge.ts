import { resolveWorkspace } from '../workspace/paths.js';
import { resolveCleanupAgeMinutes, resolveWorkspaceRoot } from '../workspace/config.js';
import { FileOutputStore } from '../store/output-store.js';
import { arrow, success, fail } from '../utils/console.js';
import type { PurgeOptions } from '../types.js';
import { errorMessage } from '../utils/errors.js';

/**
 * Delete saved outputs older than the cleanup age.
 */
export async function purgeOutputs(options: PurgeOptions): Promise<void> {
    const workspace = resolveWorkspace(resolveWorkspaceRoot(options.workspace));

    let minutes: number;
    try {
        minutes = resolveCleanupAgeMinutes(options.maxAge);
    } catch (err) {
        fail(errorMessage(err));
        process.exit(1);
    }

    const store = new FileOutputStore(workspace.root);
    const purged = await store.purgeOlderThanMinutes(minutes);

    success(`Purged ${purged.length} output(s) older than ${minutes} minute(s).`);
    for (const token of purged) {
        arrow(token);
    }
}
