// Schemas
export {
    CellSchema,
    RowSchema,
    TableSchema,
    AliasEntrySchema,
    AliasTableSchema,
    AliasFileSchema,
    GroupSummarySchema,
    SummaryResultSchema,
    OutputTokenSchema,
    StoredOutputSchema,
    OutputIndexSchema,
} from './schemas.js';

// Types
export type {
    Cell,
    Row,
    Table,
    AliasEntry,
    AliasTable,
    GroupSummary,
    SummaryResult,
    StoredOutput,
    OutputIndex,
} from './schemas.js';

// Constants
export {
    REQUIRED_COLUMNS,
    NUMERIC_COLUMNS,
    ZERO_SUPPRESSED_COLUMNS,
    TAX_RATE_COLUMN,
    INVOICE_NUMBER_COLUMN,
    MISSING_GSTIN_TEXT,
    AMOUNT_DECIMALS,
    SUPPORTED_EXTENSIONS,
    WORKBOOK_LIMITS,
    OUTPUT_STORE,
    PREVIEW_ROW_LIMIT,
} from './constants.js';
export type { NumericColumn, InputFormat } from './constants.js';

// Errors
export {
    SummarizerError,
    UnsupportedFormatError,
    MissingColumnError,
    InvalidTableError,
    IngestDecodeError,
    isSummarizerError,
} from './errors.js';
export type { SummarizerErrorCode } from './errors.js';
