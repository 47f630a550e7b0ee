/**
 * PDF Adapter
 *
 * Reads an invoice PDF with pdf2json. Every page becomes one table laid out
 * from its positioned text runs; the seller is looked up in the text of the
 * first page.
 */

import PDFParser from 'pdf2json';
import { componentLogger } from '../../utils';
import { MalformedDocumentError } from '../../utils/errors';
import { PDF_TABLE_PROFILE } from '../columnMarkers';
import { extractSupplierFromText } from '../supplierName';
import type { Page } from '../types';
import { decodeRunText, groupRunsIntoLines, layoutTable, linesToText, type TextRun } from './pdfLayout';
import type { AdapterOutput, DocumentAdapter } from './types';

const logger = componentLogger('documents');

interface PdfPageRuns {
  runs: TextRun[];
}

/**
 * Runs pdf2json over a buffer and collects the text runs of each page.
 */
function readPdfRuns(buffer: Buffer): Promise<PdfPageRuns[]> {
  return new Promise((resolve, reject) => {
    const pdfParser = new PDFParser();

    pdfParser.on('pdfParser_dataError', (errData) => {
      reject(
        new MalformedDocumentError(
          `Unable to read PDF: ${errData.parserError?.message ?? 'parser error'}`
        )
      );
    });

    pdfParser.on('pdfParser_dataReady', (pdfData) => {
      const pages = pdfData.Pages.map((page) => {
        const runs: TextRun[] = [];

        for (const textBlock of page.Texts ?? []) {
          for (const run of textBlock.R ?? []) {
            runs.push({ x: textBlock.x, y: textBlock.y, text: decodeRunText(run.T) });
          }
        }

        return { runs };
      });

      resolve(pages);
    });

    pdfParser.parseBuffer(buffer);
  });
}

export const pdfAdapter: DocumentAdapter = {
  format: 'pdf',
  profile: PDF_TABLE_PROFILE,

  async parse(buffer: Buffer): Promise<AdapterOutput> {
    const pdfPages = await readPdfRuns(buffer);

    const pages: Page[] = [];
    let supplierName: string | null = null;

    for (const [index, pdfPage] of pdfPages.entries()) {
      const lines = groupRunsIntoLines(pdfPage.runs);

      if (index === 0) {
        supplierName = extractSupplierFromText(linesToText(lines));
      }

      const table = layoutTable(lines);
      pages.push(table.length > 0 ? [table] : []);
    }

    logger.debug(`PDF read: ${pages.length} page(s), supplier ${supplierName ?? 'not found'}`);

    return { pages, supplierName };
  },
};

export default pdfAdapter;
