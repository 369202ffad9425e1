export { summarizeTable, trimHeaders } from './summarize.js';
export { buildSubtotalRow, sumGroup } from './subtotal.js';
export { groupInFirstSeenOrder, groupKeyId } from './group.js';
export type { GroupKey, KeyedRow, RowGroup } from './group.js';
export { parseAmount, toAmount, roundAmount, sumAmounts, formatAmountCell, coerceGstin } from './coerce.js';
