/**
 * Adapter registry, keyed by file extension.
 */

import { extname } from 'path';
import { AppError } from '../../utils/AppError';
import { pdfAdapter } from './pdfAdapter';
import { csvAdapter, xlsxAdapter } from './spreadsheetAdapter';
import type { DocumentAdapter } from './types';

const ADAPTERS: Readonly<Record<string, DocumentAdapter>> = {
  '.pdf': pdfAdapter,
  '.xlsx': xlsxAdapter,
  '.csv': csvAdapter,
};

export const SUPPORTED_EXTENSIONS: readonly string[] = Object.keys(ADAPTERS);

/**
 * Selects the adapter for a file name.
 *
 * @throws AppError (400) for unsupported extensions
 */
export function resolveAdapter(fileName: string): DocumentAdapter {
  const adapter = ADAPTERS[extname(fileName).toLowerCase()];

  if (!adapter) {
    throw AppError.badRequest(
      `Unsupported document type "${fileName}". Supported: ${SUPPORTED_EXTENSIONS.join(', ')}`
    );
  }

  return adapter;
}

export { pdfAdapter } from './pdfAdapter';
export { csvAdapter, xlsxAdapter, readCsvTable, detectDelimiter, firstColumn } from './spreadsheetAdapter';
export type { AdapterOutput, DocumentAdapter } from './types';
