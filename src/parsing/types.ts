/**
 * Type Definitions for Invoice Table Extraction
 *
 * Document adapters turn a file into pages of raw tables; the table extractor
 * turns those tables into normalized line items. Nothing here does I/O.
 */

// ============================================
// RAW TABLE SHAPES
// ============================================

/** One cell as read from the document; merged or missing cells are null */
export type Cell = string | null;

export type Row = readonly Cell[];

export type Table = readonly Row[];

/** A page holds zero or more tables, in reading order */
export type Page = readonly Table[];

// ============================================
// LINE ITEMS
// ============================================

export type Unit = 'kg' | 'piece' | 'liter';

/**
 * One product row extracted from an invoice.
 */
export interface LineItem {
  /** Product name with article codes stripped and newlines collapsed */
  readonly name: string;
  readonly unit: Unit;
  /** Always strictly positive */
  readonly quantity: number;
  /** Price per unit including tax, rounded to 2 decimals */
  readonly unitPriceWithTax: number;
  /** Supplier's own article/identification code, when the table has one */
  readonly sourceCode?: string;
}

// ============================================
// COLUMN LAYOUT
// ============================================

export type ColumnRole =
  | 'rowNumber'
  | 'name'
  | 'code'
  | 'unit'
  | 'quantity'
  | 'unitPrice'
  | 'totalWithTax';

export type ColumnMap = Readonly<Record<ColumnRole, number>>;

/**
 * Per-format knobs for the table extractor.
 */
export interface TableProfile {
  /** Column indices assumed before the header row overrides them */
  readonly defaultColumns: ColumnMap;
  /** Header must appear within this many rows of a table */
  readonly headerScanLimit: number;
  /** Rows with fewer cells are layout fragments, not products */
  readonly minRowCells: number;
}

// ============================================
// DOCUMENT RESULTS
// ============================================

export type DocumentIssueReason = 'no_tables' | 'no_header' | 'no_rows';

export interface DocumentIssue {
  kind: 'MalformedDocument';
  reason: DocumentIssueReason;
  message: string;
}

export interface ParsedDocument {
  lineItems: LineItem[];
  supplierName: string | null;
  issues: DocumentIssue[];
}

/**
 * What the table extractor reports besides the items themselves.
 */
export interface ExtractionResult {
  lineItems: LineItem[];
  tableCount: number;
  headerCount: number;
}
