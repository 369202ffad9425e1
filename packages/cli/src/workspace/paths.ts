import { join, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { existsSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { OUTPUT_STORE } from '@gst-summarizer/shared';
import type { Workspace } from '../types.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

/**
 * Constructs a Workspace object from a root path.
 * A workspace-local config/party-aliases.yaml overrides the bundled table.
 */
export function resolveWorkspace(root: string): Workspace {
    const localAliases = join(root, 'config', 'party-aliases.yaml');

    return {
        root,
        config: {
            aliasesPath: existsSync(localAliases) ? localAliases : resolveBundledAliasesPath(),
        },
    };
}

/**
 * Where outputs live when no workspace was given or found.
 */
export function defaultWorkspaceRoot(): string {
    return join(tmpdir(), OUTPUT_STORE.DIR_NAME);
}

export function resolveBundledAliasesPath(): string {
    // packages/cli/src/workspace/paths.ts -> __dirname = packages/cli/src/workspace
    const pkgRoot = join(__dirname, '..', '..');
    return join(pkgRoot, 'assets', 'party-aliases.yaml');
}
