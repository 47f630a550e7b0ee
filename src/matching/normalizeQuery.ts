/**
 * Query Normalization for Catalog Matching
 *
 * Lower-cases the query, fixes known misspellings and splits it into the
 * significant words the keyword gate works with.
 */

import { z } from 'zod';
import typosJson from '../data/typos.json';
import { MIN_SIGNIFICANT_WORD_LENGTH, STOP_WORDS } from './constants';
import type { TypoTable } from './types';

const typoTableSchema = z.object({
  version: z.number().int().nonnegative(),
  entries: z.record(z.string().min(1), z.string()),
});

/**
 * Validates a typo table read from JSON. Keys are lower-cased.
 */
export function parseTypoTable(input: unknown): TypoTable {
  const table = typoTableSchema.parse(input);

  const entries: Record<string, string> = {};
  for (const [typo, correction] of Object.entries(table.entries)) {
    entries[typo.toLowerCase()] = correction;
  }

  return { version: table.version, entries };
}

export const DEFAULT_TYPO_TABLE: TypoTable = parseTypoTable(typosJson);

const escapeRegExp = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

/**
 * Word boundary that understands Cyrillic (\b in JS only knows ASCII words).
 */
const wholeWord = (word: string): RegExp =>
  new RegExp(`(?<![\\p{L}\\p{N}_])${escapeRegExp(word)}(?![\\p{L}\\p{N}_])`, 'gu');

/**
 * Lower-cases, trims and applies the typo table to whole words.
 *
 * @example
 * normalizeQuery('  Авакадо Хасс ') // 'авокадо хасс'
 */
export function normalizeQuery(query: string, typos: TypoTable = DEFAULT_TYPO_TABLE): string {
  let normalized = query.toLowerCase().trim();

  for (const [typo, correction] of Object.entries(typos.entries)) {
    normalized = normalized.replace(wholeWord(typo), correction);
  }

  return normalized;
}

/**
 * Splits on whitespace, slashes, hyphens and parentheses and keeps words of
 * three or more characters that are not stop words.
 *
 * @example
 * tokenizeQuery('соус для пиццы (томатный)') // ['соус', 'пиццы', 'томатный']
 */
export function tokenizeQuery(query: string): string[] {
  return query
    .toLowerCase()
    .split(/[\s/\-()]+/)
    .filter((word) => word.length >= MIN_SIGNIFICANT_WORD_LENGTH && !STOP_WORDS.has(word));
}
