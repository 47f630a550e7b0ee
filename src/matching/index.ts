/**
 * Catalog Matching Engine
 *
 * Pure, deterministic functions that rank catalog items against invoice
 * line text and pick a supplier for an extracted seller name.
 *
 * Usage:
 * ```typescript
 * import { searchCatalog } from './matching';
 *
 * const [best] = searchCatalog('Авакадо хасс', snapshot.searchable);
 * console.log(best?.name); // 'Авокадо Хасс'
 * ```
 */

// Main functions
export { searchCatalog } from './searchCatalog';
export { matchSupplier } from './matchSupplier';

// Stages (for testing/debugging)
export {
  searchByCode,
  fuzzySearch,
  relaxedQueries,
  scoreItem,
  passesKeywordGate,
  compareCandidates,
} from './searchCatalog';
export { normalizeQuery, tokenizeQuery, parseTypoTable, DEFAULT_TYPO_TABLE } from './normalizeQuery';
export { catalogItemScore, supplierNameScore } from './similarity';

// Constants
export {
  DEFAULT_SEARCH_LIMIT,
  DEFAULT_MIN_SCORE,
  EXACT_SCORE,
  BOUNDARY_MATCH_SCORE,
  PRUNE_SCORE,
  STOP_WORDS,
  SUPPLIER_MIN_SCORE,
} from './constants';

// Types
export type { MatchCandidate, SearchOptions, TypoTable, PhraseSubstitution } from './types';
