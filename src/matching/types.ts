/**
 * Type Definitions for the Catalog Matching Engine
 *
 * The engine is pure and deterministic: it receives an already filtered pool
 * of catalog items and returns ranked candidates. No I/O happens here.
 */

// ============================================
// OUTPUT TYPES
// ============================================

/**
 * A catalog item proposed for an invoice line.
 */
export interface MatchCandidate {
  id: string;
  name: string;
  /** Catalog article code, empty string when the item has none */
  code: string;
  /** Integer similarity 0-100 */
  score: number;
}

// ============================================
// CONFIGURATION
// ============================================

/**
 * Corrections applied to whole words of a query before matching
 * (misspellings that recur in supplier documents).
 */
export interface TypoTable {
  version: number;
  /** Lower-case typo -> replacement */
  entries: Readonly<Record<string, string>>;
}

export interface SearchOptions {
  /** Maximum number of candidates returned */
  limit?: number;
  /** Candidates below this score are dropped after truncation */
  minScore?: number;
  typos?: TypoTable;
}

/**
 * A fixed rewrite for a phrase that fuzzy matching handles badly.
 * Applies when the query contains every term in `requires`.
 */
export interface PhraseSubstitution {
  requires: readonly string[];
  query: string;
}
