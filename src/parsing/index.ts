/**
 * Invoice Parsing Module
 *
 * Document adapters read files into raw tables; the table extractor turns
 * those into line items.
 *
 * @example
 * import { resolveAdapter, extractLineItems } from './parsing';
 *
 * const adapter = resolveAdapter('invoice.pdf');
 * const { pages, supplierName } = await adapter.parse(buffer);
 * const { lineItems } = extractLineItems(pages, adapter.profile);
 */

export * from './types';
export {
  normalizeUnit,
  parseLocaleNumber,
  parseRowNumber,
  stripArticleCode,
  roundMoney,
} from './valueParsers';
export {
  COLUMN_MARKER_RULES,
  PDF_TABLE_PROFILE,
  SPREADSHEET_TABLE_PROFILE,
  buildColumnMap,
  type ColumnMarkerRule,
} from './columnMarkers';
export { isHeaderRow, parseProductRow, extractLineItems } from './tableExtractor';
export { cleanSupplierName, extractSupplierFromText, extractSupplierFromCells } from './supplierName';
export {
  resolveAdapter,
  SUPPORTED_EXTENSIONS,
  pdfAdapter,
  csvAdapter,
  xlsxAdapter,
  type AdapterOutput,
  type DocumentAdapter,
} from './adapters';
