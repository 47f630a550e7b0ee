/**
 * Catalog Search
 *
 * Ranks catalog items against a line of invoice text.
 *
 * Stages:
 * 1. Code: a numeric token ("00375", "гранат 00375") is looked up in item codes
 * 2. Fuzzy: composite similarity + keyword gate over the whole pool
 * 3. Relaxations, only when stage 2 found nothing:
 *    a. the first two significant words
 *    b. the longest significant word
 *    c. fixed phrase substitutions
 *
 * Results are ordered by score (desc), then name length (asc).
 */

import type { CatalogItem } from '../catalog/types';
import {
  BOUNDARY_MATCH_SCORE,
  DEFAULT_MIN_SCORE,
  DEFAULT_SEARCH_LIMIT,
  EXACT_SCORE,
  LONG_PREFIX_LENGTH,
  MIN_CODE_TOKEN_LENGTH,
  MIN_LONGEST_WORD_LENGTH,
  PHRASE_SUBSTITUTIONS,
  PRUNE_SCORE,
  SHORT_PREFIX_LENGTH,
} from './constants';
import { DEFAULT_TYPO_TABLE, normalizeQuery, tokenizeQuery } from './normalizeQuery';
import { catalogItemScore, codeScore } from './similarity';
import type { MatchCandidate, SearchOptions } from './types';

// ============================================
// HELPERS
// ============================================

const compactCode = (item: CatalogItem): string => (item.code ?? '').replace(/\s/g, '');

const toCandidate = (item: CatalogItem, score: number): MatchCandidate => ({
  id: item.id,
  name: item.name,
  code: item.code ?? '',
  score,
});

/**
 * Higher score first; among equal scores the shorter (more generic) name wins.
 */
export function compareCandidates(a: MatchCandidate, b: MatchCandidate): number {
  return b.score - a.score || a.name.length - b.name.length;
}

const rank = (candidates: MatchCandidate[], limit: number): MatchCandidate[] =>
  [...candidates].sort(compareCandidates).slice(0, limit);

// ============================================
// STAGE 1: CODES
// ============================================

/**
 * Looks the query up by article code.
 * Returns an empty list when the query has no code-like part or nothing matches.
 */
export function searchByCode(
  query: string,
  pool: readonly CatalogItem[],
  limit: number = DEFAULT_SEARCH_LIMIT
): MatchCandidate[] {
  const token = query
    .split(/\s+/)
    .find((part) => part.length >= MIN_CODE_TOKEN_LENGTH && /^\d+$/.test(part));

  if (token) {
    const exact = pool.filter((item) => compactCode(item) === token);
    if (exact.length > 0) {
      return rank(
        exact.map((item) => toCandidate(item, EXACT_SCORE)),
        limit
      );
    }
  }

  const compactQuery = query.replace(/\s/g, '');
  if (!/^\d+$/.test(compactQuery)) {
    return [];
  }

  const exact = pool.filter((item) => compactCode(item) === compactQuery);
  if (exact.length > 0) {
    return rank(
      exact.map((item) => toCandidate(item, EXACT_SCORE)),
      limit
    );
  }

  const partial = pool.filter((item) => compactCode(item).includes(compactQuery));
  return rank(
    partial.map((item) => toCandidate(item, codeScore(compactQuery, compactCode(item)))),
    limit
  );
}

// ============================================
// STAGE 2: FUZZY
// ============================================

const wordInName = (word: string, name: string): boolean =>
  name.includes(word) ||
  (word.length >= SHORT_PREFIX_LENGTH && name.includes(word.slice(0, SHORT_PREFIX_LENGTH)));

const countWordMatches = (words: readonly string[], name: string): number =>
  words.filter(
    (word) =>
      wordInName(word, name) ||
      (word.length >= LONG_PREFIX_LENGTH && name.includes(word.slice(0, LONG_PREFIX_LENGTH)))
  ).length;

/**
 * Checks that enough significant query words appear in the name:
 * at least one, and at least two when the query has two or more.
 */
export function passesKeywordGate(words: readonly string[], name: string): boolean {
  const lowerName = name.toLowerCase();

  if (words.length > 0 && !words.some((word) => wordInName(word, lowerName))) {
    return false;
  }

  const required = words.length >= 2 ? Math.min(2, words.length) : 1;
  return countWordMatches(words, lowerName) >= required;
}

/**
 * Scores one item, or returns null when it is pruned.
 */
export function scoreItem(query: string, item: CatalogItem): number | null {
  const name = item.name.toLowerCase();
  const code = (item.code ?? '').toLowerCase();

  let score = catalogItemScore(query, name, code);

  if (code && query === code) {
    score = EXACT_SCORE;
  } else if (name === query || name.startsWith(`${query} `) || name.endsWith(` ${query}`)) {
    score = Math.max(score, BOUNDARY_MATCH_SCORE);
  } else if (score <= PRUNE_SCORE) {
    return null;
  }

  return score;
}

/**
 * Runs the fuzzy stage for an already normalized query.
 */
export function fuzzySearch(
  query: string,
  pool: readonly CatalogItem[],
  limit: number = DEFAULT_SEARCH_LIMIT,
  minScore: number = DEFAULT_MIN_SCORE
): MatchCandidate[] {
  const words = tokenizeQuery(query);
  const candidates: MatchCandidate[] = [];

  for (const item of pool) {
    const score = scoreItem(query, item);
    if (score === null) continue;
    if (!passesKeywordGate(words, item.name)) continue;

    candidates.push(toCandidate(item, score));
  }

  return rank(candidates, limit).filter((candidate) => candidate.score >= minScore);
}

// ============================================
// STAGE 3: RELAXATIONS
// ============================================

/**
 * Shorter queries to retry with, in order.
 */
export function relaxedQueries(query: string): string[] {
  const queries: string[] = [];

  let words = tokenizeQuery(query);
  if (words.length === 0) {
    words = query.split(/\s+/).filter((word) => word.length >= 2);
  }

  if (words.length > 0) {
    const firstWords = words.slice(0, 2).join(' ');
    if (firstWords !== query) {
      queries.push(firstWords);
    }

    const longest = words.reduce((best, word) => (word.length > best.length ? word : best));
    if (longest.length >= MIN_LONGEST_WORD_LENGTH) {
      queries.push(longest);
    }
  }

  for (const substitution of PHRASE_SUBSTITUTIONS) {
    if (substitution.requires.every((term) => query.includes(term))) {
      queries.push(substitution.query);
    }
  }

  return queries;
}

// ============================================
// ENTRY POINT
// ============================================

/**
 * Finds the catalog items that best match a line of invoice text.
 *
 * @param pool - Items allowed as matches (groups and excluded items removed)
 *
 * @example
 * searchCatalog('00375', pool)
 * // [{ id: '...', name: 'Гранат', code: '00375', score: 100 }]
 *
 * searchCatalog('Сыр гауда', pool, { limit: 3 })
 * // [{ name: 'Сыр гауда', ... }, { name: 'Сыр гауда 45%', ... }]
 */
export function searchCatalog(
  query: string,
  pool: readonly CatalogItem[],
  options: SearchOptions = {}
): MatchCandidate[] {
  const limit = options.limit ?? DEFAULT_SEARCH_LIMIT;
  const minScore = options.minScore ?? DEFAULT_MIN_SCORE;
  const typos = options.typos ?? DEFAULT_TYPO_TABLE;

  if (!query.trim() || pool.length === 0) {
    return [];
  }

  const normalized = normalizeQuery(query, typos);

  const byCode = searchByCode(normalized, pool, limit);
  if (byCode.length > 0) {
    return byCode;
  }

  const result = fuzzySearch(normalized, pool, limit, minScore);
  if (result.length > 0) {
    return result;
  }

  for (const relaxed of relaxedQueries(normalized)) {
    const retry = fuzzySearch(relaxed, pool, limit, minScore);
    if (retry.length > 0) {
      return retry;
    }
  }

  return [];
}

export default searchCatalog;
