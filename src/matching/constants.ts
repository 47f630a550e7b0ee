/**
 * Constants for the Catalog Matching Engine
 *
 * Scores are on the 0-100 scale of the string similarity metrics.
 */

import type { PhraseSubstitution } from './types';

// ============================================
// SEARCH DEFAULTS
// ============================================

export const DEFAULT_SEARCH_LIMIT = 10;

/**
 * Minimum score of a returned candidate.
 * Checked after the ranked list is truncated to the limit.
 */
export const DEFAULT_MIN_SCORE = 38;

// ============================================
// SCORE OVERRIDES
// ============================================

/** Code equals the query */
export const EXACT_SCORE = 100;

/**
 * Name equals the query, or the query is its first/last words
 * ("сыр гауда" vs "сыр гауда 45%").
 */
export const BOUNDARY_MATCH_SCORE = 95;

/** Items at or below this score are dropped before the keyword gate */
export const PRUNE_SCORE = 35;

// ============================================
// TOKENIZATION
// ============================================

/**
 * Short Russian function words that carry no product meaning.
 */
export const STOP_WORDS: ReadonlySet<string> = new Set([
  'для',
  'или',
  'и',
  'в',
  'на',
  'с',
  'по',
  'из',
  'от',
  'до',
  'без',
]);

export const MIN_SIGNIFICANT_WORD_LENGTH = 3;

/** Prefix lengths used for near-literal word matches (declensions) */
export const SHORT_PREFIX_LENGTH = 5;
export const LONG_PREFIX_LENGTH = 6;

/** Numeric query tokens shorter than this are not treated as codes */
export const MIN_CODE_TOKEN_LENGTH = 3;

// ============================================
// RELAXATIONS
// ============================================

/** Single-word retry only for words at least this long */
export const MIN_LONGEST_WORD_LENGTH = 4;

export const PHRASE_SUBSTITUTIONS: readonly PhraseSubstitution[] = [
  { requires: ['масло', 'фритюр'], query: 'масло фритюра' },
];

// ============================================
// SUPPLIERS
// ============================================

/** A supplier must score strictly above this */
export const SUPPLIER_MIN_SCORE = 50;

export const SUPPLIER_MIN_NAME_LENGTH = 3;
