/**
 * Spreadsheet Adapters
 *
 * - .xlsx through exceljs: every worksheet is a page holding one table
 * - .csv through csv-parse: a single page, delimiter detected from the first line
 *
 * Spreadsheet invoices keep the seller in the first column above the table
 * ("Поставщик: ООО «Ромашка»"), so the supplier search looks there.
 */

import { Readable } from 'stream';
import { Workbook, type Worksheet } from 'exceljs';
import { parse } from 'csv-parse';
import { z } from 'zod';
import { componentLogger } from '../../utils';
import { MalformedDocumentError } from '../../utils/errors';
import { SPREADSHEET_TABLE_PROFILE } from '../columnMarkers';
import { extractSupplierFromCells } from '../supplierName';
import type { Cell, Page, Row, Table } from '../types';
import type { AdapterOutput, DocumentAdapter } from './types';

const logger = componentLogger('documents');

const csvRecordSchema = z.array(z.string());

const toCell = (value: string): Cell => {
  const text = value.trim();
  return text === '' ? null : text;
};

/**
 * Leading cells of the first column of the first page.
 */
export function firstColumn(pages: readonly Page[]): Cell[] {
  const table = pages[0]?.[0] ?? [];
  return table.map((row) => row[0] ?? null);
}

function withSupplier(pages: Page[]): AdapterOutput {
  return { pages, supplierName: extractSupplierFromCells(firstColumn(pages)) };
}

// ============================================
// CSV
// ============================================

/**
 * Picks ";" when the first line has more semicolons than commas.
 */
export function detectDelimiter(text: string): ';' | ',' {
  const firstLine = text.split(/\r?\n/, 1)[0] ?? '';
  const semicolons = firstLine.split(';').length - 1;
  const commas = firstLine.split(',').length - 1;

  return semicolons > commas ? ';' : ',';
}

/**
 * Reads CSV text into a table, one row per record.
 */
export async function readCsvTable(text: string): Promise<Table> {
  const parser = Readable.from([text]).pipe(
    parse({
      delimiter: detectDelimiter(text),
      bom: true,
      relax_column_count: true,
      relax_quotes: true,
    })
  );

  const rows: Row[] = [];

  for await (const record of parser) {
    const parsed = csvRecordSchema.safeParse(record);
    if (!parsed.success) {
      throw new MalformedDocumentError('Unexpected CSV record shape');
    }
    rows.push(parsed.data.map(toCell));
  }

  return rows;
}

export const csvAdapter: DocumentAdapter = {
  format: 'csv',
  profile: SPREADSHEET_TABLE_PROFILE,

  async parse(buffer: Buffer): Promise<AdapterOutput> {
    let table: Table;

    try {
      table = await readCsvTable(buffer.toString('utf8'));
    } catch (error) {
      if (error instanceof MalformedDocumentError) throw error;
      throw new MalformedDocumentError(
        `Unable to read CSV: ${error instanceof Error ? error.message : 'Unknown error'}`
      );
    }

    logger.debug(`CSV read: ${table.length} row(s)`);

    return withSupplier([table.length > 0 ? [table] : []]);
  },
};

// ============================================
// XLSX
// ============================================

function worksheetTable(worksheet: Worksheet): Table {
  const rows: Row[] = [];

  worksheet.eachRow({ includeEmpty: true }, (row) => {
    const cells: Cell[] = [];
    for (let column = 1; column <= row.cellCount; column++) {
      cells.push(toCell(row.getCell(column).text));
    }
    rows.push(cells);
  });

  return rows;
}

export const xlsxAdapter: DocumentAdapter = {
  format: 'xlsx',
  profile: SPREADSHEET_TABLE_PROFILE,

  async parse(buffer: Buffer): Promise<AdapterOutput> {
    const workbook = new Workbook();

    try {
      await workbook.xlsx.load(buffer);
    } catch (error) {
      throw new MalformedDocumentError(
        `Unable to read workbook: ${error instanceof Error ? error.message : 'Unknown error'}`
      );
    }

    const pages: Page[] = workbook.worksheets.map((worksheet) => {
      const table = worksheetTable(worksheet);
      return table.length > 0 ? [table] : [];
    });

    logger.debug(`Workbook read: ${pages.length} sheet(s)`);

    return withSupplier(pages);
  },
};
