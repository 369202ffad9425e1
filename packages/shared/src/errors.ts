/**
 * Error taxonomy for the summarizer core.
 *
 * Cell-level numeric failures are never errors: they default to zero and
 * surface only as warnings in the summary result.
 */

import { REQUIRED_COLUMNS } from './constants.js';

export type SummarizerErrorCode = 'UNSUPPORTED_FORMAT' | 'MISSING_COLUMN' | 'INVALID_TABLE' | 'INGEST_DECODE';

export class SummarizerError extends Error {
    public readonly code: SummarizerErrorCode;

    constructor(code: SummarizerErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'SummarizerError';
        this.code = code;
    }
}

/**
 * File extension outside the recognized set. Raised before any decoding.
 */
export class UnsupportedFormatError extends SummarizerError {
    public readonly extension: string;

    constructor(extension: string) {
        super('UNSUPPORTED_FORMAT', `Unsupported file extension: ${extension || '(none)'}`);
        this.name = 'UnsupportedFormatError';
        this.extension = extension;
    }
}

/**
 * Party or GSTIN column absent. The message always names both.
 */
export class MissingColumnError extends SummarizerError {
    public readonly missing: string[];

    constructor(missing: string[]) {
        super(
            'MISSING_COLUMN',
            `Input must contain '${REQUIRED_COLUMNS.PARTY}' and '${REQUIRED_COLUMNS.GSTIN}' columns.`
        );
        this.name = 'MissingColumnError';
        this.missing = missing;
    }
}

/**
 * Table handed to the summarizer breaks the Table shape, e.g. a row that
 * lacks one of the declared columns.
 */
export class InvalidTableError extends SummarizerError {
    public readonly issues: string[];

    constructor(issues: string[]) {
        super('INVALID_TABLE', `Invalid table: ${issues.join('; ')}`);
        this.name = 'InvalidTableError';
        this.issues = issues;
    }
}

/**
 * Bytes could not be decoded as the format the extension declared.
 */
export class IngestDecodeError extends SummarizerError {
    constructor(filename: string, cause: unknown) {
        const reason = cause instanceof Error ? cause.message : String(cause);
        super('INGEST_DECODE', `Could not read ${filename}: ${reason}`, { cause });
        this.name = 'IngestDecodeError';
    }
}

export function isSummarizerError(err: unknown): err is SummarizerError {
    return err instanceof SummarizerError;
}
