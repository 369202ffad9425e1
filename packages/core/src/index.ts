// Types (re-exported from shared)
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
} from './types/index.js';

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
} from './types/index.js';

// Names
export { normalizeForMatch, compileAliasTable, resolvePartyShort, fallbackShorten } from './names/index.js';
export type { CompiledAlias, CompiledAliasTable } from './names/index.js';

// Ingestion
export { detectFormat, getExtension, getSupportedExtensions, convertXlsToXlsx, readTable } from './ingest/index.js';

// Summarizing
export { summarizeTable, buildSubtotalRow, groupInFirstSeenOrder, parseAmount, roundAmount } from './summarize/index.js';
export type { GroupKey, RowGroup } from './summarize/index.js';

export { summarizeFile } from './summarize-file.js';

// Utils
export { cellToText, isBlankCell } from './utils/cell.js';
