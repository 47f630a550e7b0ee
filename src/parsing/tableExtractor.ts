/**
 * Table Extractor for Supplier Invoices
 *
 * Finds the header row of each invoice table, derives where the name,
 * quantity and price columns live, and turns numbered product rows into
 * line items.
 *
 * Flow per page:
 * 1. Scan each table for a header row (name + quantity markers)
 * 2. Build a column map from the header cells
 * 3. Accept rows with a positive ordinal in the row-number column
 * 4. Normalize name, unit, quantity and tax-inclusive unit price
 *
 * The column map carries over between tables of the same page (a table
 * split by the layout engine keeps its header) and resets on a new page.
 */

import {
  buildColumnMap,
  MIN_HEADER_CELLS,
  NAME_HEADER_MARKERS,
  PDF_TABLE_PROFILE,
  QUANTITY_HEADER_MARKERS,
  SKIP_WORDS,
} from './columnMarkers';
import {
  normalizeUnit,
  parseLocaleNumber,
  parseRowNumber,
  roundMoney,
  stripArticleCode,
} from './valueParsers';
import type {
  ColumnMap,
  ExtractionResult,
  LineItem,
  Page,
  Row,
  TableProfile,
} from './types';

const MAX_CODE_LENGTH = 80;

const cellText = (row: Row, index: number): string => {
  if (index < 0 || index >= row.length) {
    return '';
  }
  return (row[index] ?? '').trim();
};

/**
 * Checks whether a row looks like the column header of a product table.
 */
export function isHeaderRow(row: Row): boolean {
  const nonEmpty = row.filter((cell) => cell !== null && cell.trim() !== '').length;
  if (nonEmpty < MIN_HEADER_CELLS) {
    return false;
  }

  const text = row.map((cell) => (cell ?? '').toLowerCase()).join(' ');
  const hasName = NAME_HEADER_MARKERS.some((marker) => text.includes(marker));
  const hasQuantity = QUANTITY_HEADER_MARKERS.some((marker) => text.includes(marker));

  return hasName && hasQuantity;
}

/**
 * Builds a line item from a data row, or returns null for rows that are not
 * products (footers, subtotals, zero quantities, unparseable cells).
 */
export function parseProductRow(
  row: Row,
  columns: ColumnMap,
  minRowCells: number = PDF_TABLE_PROFILE.minRowCells
): LineItem | null {
  if (row.length < minRowCells) {
    return null;
  }

  if (parseRowNumber(cellText(row, columns.rowNumber)) === null) {
    return null;
  }

  const name = stripArticleCode(cellText(row, columns.name));
  if (!name || /^\d+$/.test(name)) {
    return null;
  }

  const lowerName = name.toLowerCase();
  if (SKIP_WORDS.some((word) => lowerName.includes(word))) {
    return null;
  }

  const quantity = parseLocaleNumber(cellText(row, columns.quantity));
  if (quantity === null || quantity <= 0) {
    return null;
  }

  const totalWithTax = parseLocaleNumber(cellText(row, columns.totalWithTax));
  const unitPrice = parseLocaleNumber(cellText(row, columns.unitPrice));

  let unitPriceWithTax = 0;
  if (totalWithTax !== null && totalWithTax > 0) {
    unitPriceWithTax = totalWithTax / quantity;
  } else if (unitPrice !== null && unitPrice > 0) {
    unitPriceWithTax = unitPrice;
  }

  const code = cellText(row, columns.code).slice(0, MAX_CODE_LENGTH);

  const item: LineItem = {
    name,
    unit: normalizeUnit(cellText(row, columns.unit)),
    quantity,
    unitPriceWithTax: roundMoney(unitPriceWithTax),
    ...(code ? { sourceCode: code } : {}),
  };

  return Object.freeze(item);
}

/**
 * Extracts line items from every table of every page.
 *
 * @example
 * extractLineItems([[
 *   [
 *     ['№', 'Наименование товара', 'Код', 'Ед. изм.', 'Количество', 'Цена'],
 *     ['1', 'Молоко 3,2%', '', 'л', '2', '89,90'],
 *   ],
 * ]]).lineItems
 * // [{ name: 'Молоко 3,2%', unit: 'liter', quantity: 2, unitPriceWithTax: 89.9 }]
 */
export function extractLineItems(
  pages: readonly Page[],
  profile: TableProfile = PDF_TABLE_PROFILE
): ExtractionResult {
  const lineItems: LineItem[] = [];
  let tableCount = 0;
  let headerCount = 0;

  for (const page of pages) {
    let columns: ColumnMap | null = null;

    for (const table of page) {
      tableCount++;

      for (let rowIndex = 0; rowIndex < table.length; rowIndex++) {
        const row = table[rowIndex];
        if (row.length === 0) continue;

        if (rowIndex < profile.headerScanLimit && isHeaderRow(row)) {
          columns = buildColumnMap(row, profile.defaultColumns);
          headerCount++;
          continue;
        }

        if (columns === null) continue;

        const item = parseProductRow(row, columns, profile.minRowCells);
        if (item) {
          lineItems.push(item);
        }
      }
    }
  }

  return { lineItems, tableCount, headerCount };
}

export default extractLineItems;
