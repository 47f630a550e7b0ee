/**
 * Document adapter contract.
 *
 * An adapter reads one file format into pages of raw tables and, when the
 * format allows it, the seller's name. Line-item extraction happens later
 * with the adapter's table profile.
 */

import type { Page, TableProfile } from '../types';

export interface AdapterOutput {
  pages: Page[];
  supplierName: string | null;
}

export interface DocumentAdapter {
  /** Short format name for logs ("pdf", "xlsx", "csv") */
  readonly format: string;
  readonly profile: TableProfile;
  parse(buffer: Buffer): Promise<AdapterOutput>;
}
