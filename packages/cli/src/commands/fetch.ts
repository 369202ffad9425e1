import { resolveWorkspace } from '../workspace/paths.js';
import { resolveWorkspaceRoot } from '../workspace/config.js';
import { FileOutputStore } from '../store/output-store.js';
import { downloadName } from '../utils/filename.js';
import { arrow, success } from '../utils/console.js';
import type { FetchOptions } from '../types.js';

/**
 * Look up a saved output by token and print where it lives.
 */
export async function fetchOutput(token: string, options: FetchOptions): Promise<void> {
    const workspace = resolveWorkspace(resolveWorkspaceRoot(options.workspace));
    const store = new FileOutputStore(workspace.root);

    const record = await store.get(token);
    if (!record) {
        console.error('File not found or expired');
        process.exit(1);
    }

    success(`Output ${record.token}`);
    arrow(`Path:     ${record.path}`);
    arrow(`Download: ${downloadName(record.original_name)}`);
    arrow(`Created:  ${record.created_at}`);
}
