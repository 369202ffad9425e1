import type { InputFormat, StoredOutput, SummaryResult, Table } from '@gst-summarizer/shared';
import type { CompiledAliasTable } from '@gst-summarizer/core';
import type { FileOutputStore } from '../store/output-store.js';
import type { Workspace, ProcessOptions } from '../types.js';

/**
 * The file being processed.
 */
export interface InputFile {
    path: string;
    filename: string;
    hash?: string;
}

/**
 * Representation of an error occurring within a pipeline step.
 */
export interface PipelineError {
    step: string;
    message: string;
    fatal: boolean;
    error?: unknown;
}

/**
 * Central state object passed through the processing pipeline.
 */
export interface PipelineState {
    input: InputFile;
    workspace: Workspace;
    options: ProcessOptions;
    aliases: CompiledAliasTable;
    store: FileOutputStore;
    cleanupAgeMinutes: number;

    // Accumulated during pipeline execution
    purged: string[];
    format?: InputFormat;
    table?: Table;
    summary?: SummaryResult;
    output?: StoredOutput;

    warnings: string[];
    errors: PipelineError[];
}

/**
 * Function signature for a discrete pipeline step.
 */
export type PipelineStep = (state: PipelineState) => Promise<PipelineState>;
