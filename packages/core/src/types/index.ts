/**
 * Re-export all types from shared package.
 * Core package uses these types but doesn't define them.
 */
export type {
    Cell,
    Row,
    Table,
    AliasEntry,
    AliasTable,
    GroupSummary,
    SummaryResult,
    NumericColumn,
    InputFormat,
} from '@gst-summarizer/shared';

export {
    TableSchema,
    AliasTableSchema,
    REQUIRED_COLUMNS,
    NUMERIC_COLUMNS,
    ZERO_SUPPRESSED_COLUMNS,
    TAX_RATE_COLUMN,
    MISSING_GSTIN_TEXT,
    AMOUNT_DECIMALS,
    SUPPORTED_EXTENSIONS,
    WORKBOOK_LIMITS,
    UnsupportedFormatError,
    MissingColumnError,
    InvalidTableError,
    IngestDecodeError,
} from '@gst-summarizer/shared';
