/**
 * Reconciliation Service
 *
 * Orchestrates one invoice:
 * 1. parseDocument   - file -> line items + supplier name (+ issues)
 * 2. reconcile       - line items -> best catalog match per line
 * 3. confirmMapping  - remember the user's choice for a line
 *
 * Learned mappings are checked before searching and validated against the
 * snapshot the caller holds; a mapping that points at an item no longer in
 * the searchable pool is removed.
 *
 * Mapping store failures never fail a request: lookups degrade to a search,
 * saves are reported as not persisted.
 */

import type { CatalogItem, CatalogSnapshot, Supplier } from '../catalog';
import type { LearnedMapping, LearnedMappingStore } from '../mappings';
import { normalizeMappingKey } from '../mappings';
import { matchSupplier, searchCatalog, EXACT_SCORE } from '../matching';
import type { MatchCandidate, SearchOptions } from '../matching';
import { extractLineItems, resolveAdapter } from '../parsing';
import type { DocumentIssue, LineItem, ParsedDocument } from '../parsing';
import { AppError, componentLogger } from '../utils';
import { describeError, InvalidMatchTargetError } from '../utils/errors';
import type { CatalogService } from './catalog.service';

const logger = componentLogger('reconciliation');

// ============================================
// Types
// ============================================

export type MatchSource = 'learned' | 'search';

export interface ReconciledMatch extends MatchCandidate {
  source: MatchSource;
}

export interface ReconciledLine {
  lineIndex: number;
  lineText: string;
  match: ReconciledMatch | null;
}

export interface ConfirmMappingResult {
  /** Normalized line text the mapping is stored under */
  key: string;
  mapping: LearnedMapping;
  persisted: boolean;
}

export interface ProcessedDocument extends ParsedDocument {
  supplier: Supplier | null;
  lines: ReconciledLine[];
}

export interface ReconciliationServiceDeps {
  catalog: CatalogService;
  mappings: LearnedMappingStore;
  searchOptions?: SearchOptions;
}

/** Only the name of a line item is needed to reconcile it */
export type ReconcilableLine = Pick<LineItem, 'name'>;

// ============================================
// Helpers
// ============================================

const ISSUE_MESSAGES: Record<DocumentIssue['reason'], string> = {
  no_tables: 'No tables were found in the document',
  no_header: 'No product table header was found (expected name and quantity columns)',
  no_rows: 'The product table has no rows with a positive quantity',
};

const issue = (reason: DocumentIssue['reason']): DocumentIssue => ({
  kind: 'MalformedDocument',
  reason,
  message: ISSUE_MESSAGES[reason],
});

const fromCatalogItem = (item: CatalogItem, source: MatchSource, score: number): ReconciledMatch => ({
  id: item.id,
  name: item.name,
  code: item.code ?? '',
  score,
  source,
});

// ============================================
// Service
// ============================================

export class ReconciliationService {
  private readonly catalog: CatalogService;
  private readonly mappings: LearnedMappingStore;
  private readonly searchOptions: SearchOptions;

  constructor(deps: ReconciliationServiceDeps) {
    this.catalog = deps.catalog;
    this.mappings = deps.mappings;
    this.searchOptions = deps.searchOptions ?? {};
  }

  /**
   * Reads a document into line items.
   * A document without usable rows is returned with an issue, not rejected.
   *
   * @throws AppError (400) for unsupported file types
   * @throws MalformedDocumentError when the file cannot be read at all
   */
  async parseDocument(fileName: string, buffer: Buffer): Promise<ParsedDocument> {
    const adapter = resolveAdapter(fileName);
    const { pages, supplierName } = await adapter.parse(buffer);
    const extraction = extractLineItems(pages, adapter.profile);

    const issues: DocumentIssue[] = [];
    if (extraction.lineItems.length === 0) {
      if (extraction.tableCount === 0) {
        issues.push(issue('no_tables'));
      } else if (extraction.headerCount === 0) {
        issues.push(issue('no_header'));
      } else {
        issues.push(issue('no_rows'));
      }
    }

    logger.info(
      `📄 ${fileName} (${adapter.format}): ${extraction.lineItems.length} line item(s), ` +
        `supplier ${supplierName ?? 'unknown'}`
    );

    return { lineItems: extraction.lineItems, supplierName, issues };
  }

  /**
   * Finds the best match for each line, keyed by its position.
   */
  async reconcile(
    lineItems: readonly ReconcilableLine[],
    snapshot: CatalogSnapshot
  ): Promise<ReconciledLine[]> {
    const lines: ReconciledLine[] = [];

    for (const [lineIndex, item] of lineItems.entries()) {
      const learned = await this.findLearnedMatch(item.name, snapshot);
      if (learned) {
        lines.push({ lineIndex, lineText: item.name, match: learned });
        continue;
      }

      const [best] = searchCatalog(item.name, snapshot.searchable, this.searchOptions);
      lines.push({
        lineIndex,
        lineText: item.name,
        match: best ? { ...best, source: 'search' } : null,
      });
    }

    return lines;
  }

  /**
   * Remembers that a line of invoice text means the given catalog item.
   *
   * @throws AppError (400) for blank line text
   * @throws AppError (404) when the item is not in the catalog
   * @throws InvalidMatchTargetError for groups and excluded items
   */
  async confirmMapping(
    lineText: string,
    itemId: string,
    snapshot: CatalogSnapshot
  ): Promise<ConfirmMappingResult> {
    const key = normalizeMappingKey(lineText);
    if (!key) {
      throw AppError.badRequest('Line text must not be empty');
    }

    const item = snapshot.byId.get(itemId);
    if (!item) {
      throw AppError.notFound(`Catalog item ${itemId} not found`);
    }

    if (item.type === 'Group') {
      throw new InvalidMatchTargetError(
        `"${item.name}" is a category, not a product; choose an item inside it`,
        itemId
      );
    }

    if (!snapshot.searchableIds.has(itemId)) {
      throw new InvalidMatchTargetError(
        `"${item.name}" belongs to an excluded part of the catalog`,
        itemId
      );
    }

    const mapping: LearnedMapping = { id: item.id, name: item.name, code: item.code ?? '' };

    let persisted = true;
    try {
      await this.mappings.save({ [key]: mapping });
    } catch (error) {
      persisted = false;
      logger.error(`Failed to persist mapping for "${key}": ${describeError(error)}`);
    }

    return { key, mapping, persisted };
  }

  /**
   * Parse, supplier lookup and reconciliation in one call.
   */
  async processDocument(fileName: string, buffer: Buffer): Promise<ProcessedDocument> {
    const parsed = await this.parseDocument(fileName, buffer);
    const snapshot = await this.catalog.getSnapshot();

    const supplier = parsed.supplierName
      ? matchSupplier(parsed.supplierName, await this.catalog.getSuppliers())
      : null;

    const lines = await this.reconcile(parsed.lineItems, snapshot);

    return { ...parsed, supplier, lines };
  }

  private async findLearnedMatch(
    lineText: string,
    snapshot: CatalogSnapshot
  ): Promise<ReconciledMatch | null> {
    let mapping: LearnedMapping | null;
    try {
      mapping = await this.mappings.get(lineText);
    } catch (error) {
      logger.warn(`Mapping lookup for "${lineText}" failed, searching instead: ${describeError(error)}`);
      return null;
    }

    if (!mapping) {
      return null;
    }

    const item = snapshot.byId.get(mapping.id);
    if (item && snapshot.searchableIds.has(mapping.id)) {
      return fromCatalogItem(item, 'learned', EXACT_SCORE);
    }

    logger.info(`Removing stale mapping for "${lineText}" (item ${mapping.id} is gone)`);
    try {
      await this.mappings.remove(lineText);
    } catch (error) {
      logger.warn(`Failed to remove stale mapping for "${lineText}": ${describeError(error)}`);
    }

    return null;
  }
}

export default ReconciliationService;
