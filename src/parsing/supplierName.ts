/**
 * Supplier name extraction from invoice text.
 *
 * Tax invoices name the seller in a labelled line ("Продавец: ООО «Ромашка»,
 * ИНН ..."), contracts in a quoted "именуемое ... Исполнитель" clause.
 */

const MAX_SUPPLIER_LENGTH = 120;
const MIN_SUPPLIER_LENGTH = 3;

/** Tried in order; the first pattern that matches decides */
const SUPPLIER_TEXT_PATTERNS: readonly RegExp[] = [
  /продавец\s*[:\s]+([^\n]+)/iu,
  /seller\s*[:\s]+([^\n]+)/iu,
  /поставщик\s*[:\s]+([^\n]+)/iu,
  /продавец\s*\n\s*([^\n]+)/iu,
  /["«]([^"»]+)["»]\s*[^\n]*именуемое[^\n]*исполнитель/iu,
  /исполнитель[^\n]*[«"]([^»"]+)[»"]/iu,
];

const CELL_MARKERS: readonly string[] = ['поставщик', 'продавец', 'seller'];

const CELL_SUPPLIER_PATTERN = /^[:\s]+([«»"A-Za-zА-Яа-яЁё0-9\s\-.]+)/u;

/** Spreadsheet headers only need the first rows */
export const SUPPLIER_CELL_SCAN_ROWS = 15;

/**
 * Removes buyer blocks, tax ids, trailing address numbers and quotes from a
 * captured seller line.
 */
export function cleanSupplierName(raw: string): string | null {
  const name = raw
    .trim()
    .replace(/\s*[;,]?\s*покупатель\s*:.*$/iu, '')
    .replace(/\s*[;,]?\s*buyer\s*:.*$/iu, '')
    // ИНН 7701234567
    .replace(/\s*[,;]\s*и[\sн]+\.?\s*\d+.*/iu, '')
    // КПП 770101001
    .replace(/\s*[,;]\s*к[\sп]+п\.?\s*\d+.*/iu, '')
    .replace(/\s*,\s*[\d\s-]+.*/u, '')
    .replace(/["«»]/g, '')
    .replace(/\s+/g, ' ')
    .trim();

  if (name.length < MIN_SUPPLIER_LENGTH || /^[\d\s\-.]+$/.test(name)) {
    return null;
  }

  return name.slice(0, MAX_SUPPLIER_LENGTH);
}

/**
 * Finds the seller in free page text (PDF first page).
 *
 * @example
 * extractSupplierFromText('Продавец: ООО "Ромашка", ИНН 7701234567')
 * // 'ООО Ромашка'
 */
export function extractSupplierFromText(text: string | null | undefined): string | null {
  if (!text || text.length < 5) {
    return null;
  }

  for (const pattern of SUPPLIER_TEXT_PATTERNS) {
    const match = pattern.exec(text);
    if (!match) continue;

    return cleanSupplierName(match[1]);
  }

  return null;
}

/**
 * Finds the seller in the leading cells of a spreadsheet's first column.
 */
export function extractSupplierFromCells(cells: readonly (string | null)[]): string | null {
  for (const cell of cells.slice(0, SUPPLIER_CELL_SCAN_ROWS)) {
    if (!cell || !cell.trim()) continue;

    const lower = cell.toLowerCase();

    for (const marker of CELL_MARKERS) {
      const position = lower.indexOf(marker);
      if (position === -1) continue;

      const match = CELL_SUPPLIER_PATTERN.exec(cell.slice(position + marker.length));
      if (!match) continue;

      const name = cleanSupplierName(match[1]);
      if (name) {
        return name;
      }
    }
  }

  return null;
}
