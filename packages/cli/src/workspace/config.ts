import { readFileSync, existsSync } from 'node:fs';
import { parse } from 'yaml';
import { AliasFileSchema, OUTPUT_STORE, type AliasTable } from '@gst-summarizer/shared';
import { detectWorkspaceRoot } from './detect.js';
import { defaultWorkspaceRoot } from './paths.js';

/**
 * Environment variables read by the CLI.
 */
export const ENV = {
    WORKSPACE: 'GSTSUM_WORKSPACE',
    CLEANUP_AGE_MIN: 'GSTSUM_CLEANUP_AGE_MIN',
} as const;

/**
 * Loads the ordered party alias table (party-aliases.yaml).
 * Accepts either a bare list or `{ aliases: [...] }`.
 */
export function loadAliasTable(path: string): AliasTable {
    if (!existsSync(path)) {
        throw new Error(`Alias file not found: ${path}`);
    }
    const content = readFileSync(path, 'utf-8');
    const data: unknown = parse(content);
    if (data === null || data === undefined) {
        return [];
    }
    return AliasFileSchema.parse(data);
}

/**
 * Workspace root: explicit flag, then GSTSUM_WORKSPACE, then the nearest
 * directory with config/party-aliases.yaml, then the temp directory.
 */
export function resolveWorkspaceRoot(explicit?: string, env: NodeJS.ProcessEnv = process.env): string {
    return explicit || env[ENV.WORKSPACE] || detectWorkspaceRoot() || defaultWorkspaceRoot();
}

/**
 * Output age, in minutes, after which saved files are purged.
 */
export function resolveCleanupAgeMinutes(explicit?: string, env: NodeJS.ProcessEnv = process.env): number {
    const raw = explicit ?? env[ENV.CLEANUP_AGE_MIN];
    if (raw === undefined || raw === '') {
        return OUTPUT_STORE.CLEANUP_AGE_MIN;
    }
    const minutes = Number(raw);
    if (!Number.isFinite(minutes) || minutes < 0) {
        throw new Error(`Invalid cleanup age "${raw}". Use a number of minutes (e.g. 60).`);
    }
    return minutes;
}
