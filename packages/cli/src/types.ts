/**
 * GST Summarizer CLI - Core Types
 */

export interface ProcessOptions {
    dryRun: boolean;
    preview: number;
    aliases?: string;
    workspace?: string;
    maxAge?: string;
}

export interface FetchOptions {
    workspace?: string;
}

export interface PurgeOptions {
    maxAge?: string;
    workspace?: string;
}

export interface AliasesOptions {
    aliases?: string;
    workspace?: string;
}

export interface WorkspaceConfig {
    aliasesPath: string;
}

/**
 * Directory holding saved outputs and their index.
 */
export interface Workspace {
    root: string;
    config: WorkspaceConfig;
}
