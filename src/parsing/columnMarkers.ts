/**
 * Header vocabulary for invoice tables.
 *
 * Column roles are located by an ordered list of (marker, role) rules that is
 * evaluated once per header cell. The first rule that matches a cell wins for
 * that cell; a later cell matching the same role overwrites the earlier index.
 * New layouts are supported by adding rules here, not by touching the extractor.
 */

import type { ColumnMap, ColumnRole, TableProfile } from './types';

export interface ColumnMarkerRule {
  role: ColumnRole;
  /** Receives the trimmed, lower-cased header cell */
  matches: (cell: string) => boolean;
}

const hasAny = (cell: string, words: readonly string[]): boolean =>
  words.some((word) => cell.includes(word));

export const COLUMN_MARKER_RULES: readonly ColumnMarkerRule[] = [
  {
    role: 'rowNumber',
    matches: (cell) => cell === '№' || (cell.length <= 3 && cell.includes('№')),
  },
  {
    role: 'name',
    matches: (cell) => cell.includes('наименование') || cell.includes('description'),
  },
  {
    role: 'quantity',
    matches: (cell) => hasAny(cell, QUANTITY_HEADER_MARKERS),
  },
  // "Цена за единицу измерения" is a price, so price is tested before unit
  {
    role: 'unitPrice',
    matches: (cell) =>
      (cell.includes('цена') && !cell.includes('ндс')) ||
      (cell.includes('price') && !cell.includes('vat')),
  },
  {
    role: 'unit',
    matches: (cell) => hasAny(cell, ['ед', 'измер']) || cell === 'unit' || cell === 'uom',
  },
  {
    role: 'totalWithTax',
    matches: (cell) =>
      (cell.includes('ндс') && hasAny(cell, ['учетом', 'учётом'])) ||
      (cell.includes('стоимость') && cell.includes('ндс')) ||
      (cell.includes('total') && cell.includes('vat')),
  },
  {
    role: 'code',
    matches: (cell) =>
      cell.includes('идентификацион') ||
      (cell.includes('код') && !cell.includes('штрих')) ||
      cell === 'code' ||
      cell === 'sku',
  },
];

/** A header row must mention the product name... */
export const NAME_HEADER_MARKERS: readonly string[] = ['наименование', 'description'];

/** ...and the quantity */
export const QUANTITY_HEADER_MARKERS: readonly string[] = [
  'количество',
  'кол-во',
  // "Кол." in spreadsheet exports
  'кол.',
  'quantity',
  'qty',
];

/** Rows whose name contains one of these are totals, not products */
export const SKIP_WORDS: readonly string[] = ['итого', 'всего', 'total', 'сумма', 'купля-продажа'];

export const MIN_HEADER_CELLS = 3;

// ============================================
// PROFILES
// ============================================

/** Typical column order of a Russian tax invoice (счёт-фактура) */
export const PDF_TABLE_PROFILE: TableProfile = {
  defaultColumns: {
    rowNumber: 0,
    name: 1,
    code: 2,
    unit: 3,
    quantity: 4,
    unitPrice: 5,
    totalWithTax: 9,
  },
  headerScanLimit: 30,
  // Merged contract cells come through as short rows
  minRowCells: 5,
};

export const SPREADSHEET_TABLE_PROFILE: TableProfile = {
  defaultColumns: {
    rowNumber: 0,
    name: 1,
    code: 2,
    unit: 3,
    quantity: 4,
    unitPrice: 5,
    totalWithTax: 8,
  },
  headerScanLimit: 30,
  minRowCells: 1,
};

/**
 * Derives the column map for a header row.
 */
export function buildColumnMap(
  headerRow: readonly (string | null)[],
  defaults: ColumnMap,
  rules: readonly ColumnMarkerRule[] = COLUMN_MARKER_RULES
): ColumnMap {
  const columns: Record<ColumnRole, number> = { ...defaults };

  headerRow.forEach((raw, index) => {
    const cell = (raw ?? '').toLowerCase().trim();
    if (!cell) return;

    const rule = rules.find((candidate) => candidate.matches(cell));
    if (rule) {
      columns[rule.role] = index;
    }
  });

  return columns;
}
