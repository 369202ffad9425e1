/**
 * Constants for the GST Summarizer.
 */

/**
 * Columns every input table must carry (exact names, after header trimming).
 */
export const REQUIRED_COLUMNS = {
    PARTY: 'Party',
    GSTIN: 'GSTIN',
} as const;

/**
 * Columns summed into each subtotal row, in the order they are appended
 * when an input lacks them.
 */
export const NUMERIC_COLUMNS = ['TAXABLE', 'IGST', 'CGST', 'SGST', 'NETAMOUNT'] as const;

export type NumericColumn = (typeof NUMERIC_COLUMNS)[number];

/**
 * Tax columns rendered blank in a subtotal row when their sum is exactly zero.
 * NETAMOUNT and TAXABLE are always shown.
 */
export const ZERO_SUPPRESSED_COLUMNS: readonly NumericColumn[] = ['IGST', 'CGST', 'SGST'];

/**
 * Rate column blanked on subtotal rows (a summed percentage is meaningless).
 */
export const TAX_RATE_COLUMN = 'TAXPER';

/**
 * Invoice-number column. Blank on subtotal rows, so front ends use it to spot them.
 */
export const INVOICE_NUMBER_COLUMN = 'bl_invno';

/**
 * Literal text some exporters write for an empty GSTIN cell.
 */
export const MISSING_GSTIN_TEXT = 'nan';

/**
 * Decimal places used for every summed or displayed amount.
 */
export const AMOUNT_DECIMALS = 2;

/**
 * Input formats, keyed by lower-cased file extension.
 */
export const SUPPORTED_EXTENSIONS = {
    '.xls': 'xls',
    '.xlsx': 'xlsx',
    '.xlsm': 'xlsx',
    '.xltx': 'xlsx',
    '.xltm': 'xlsx',
    '.xlsb': 'xlsb',
    '.csv': 'csv',
    '.txt': 'csv',
} as const;

export type InputFormat = (typeof SUPPORTED_EXTENSIONS)[keyof typeof SUPPORTED_EXTENSIONS];

/**
 * Legacy workbook conversion limits.
 * Excel rejects sheet names longer than 31 characters.
 */
export const WORKBOOK_LIMITS = {
    SHEET_NAME_MAX_LENGTH: 31,
} as const;

/**
 * Output store defaults.
 */
export const OUTPUT_STORE = {
    DIR_NAME: 'excel_summarizer_uploads',
    INDEX_FILE: 'index.json',
    CLEANUP_AGE_MIN: 60,
    OUTPUT_SUFFIX: '_modified.xlsx',
} as const;

/**
 * Number of output rows printed by the preview.
 */
export const PREVIEW_ROW_LIMIT = 500;
