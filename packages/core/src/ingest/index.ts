export { detectFormat, getExtension, getSupportedExtensions } from './detect.js';
export { convertXlsToXlsx, toSheetTitle } from './convert-xls.js';
export { readTable, matrixToTable, buildColumns } from './read-table.js';
