/**
 * String Similarity Scoring
 *
 * Invoice and catalog names differ in word order, extra qualifiers and
 * truncation, so the score is the best of several fuzzball metrics.
 * Inputs are compared as given (callers lower-case them); fuzzball's own
 * preprocessing is off so punctuation such as "3,2%" still counts.
 */

import * as fuzz from 'fuzzball';

const RAW = { full_process: false };

/**
 * Score of a query against a catalog item.
 *
 * max(ratio(q, name), ratio(q, code), partial(q, name), tokenSet(q, name), tokenSort(q, name))
 */
export function catalogItemScore(query: string, name: string, code: string): number {
  return Math.max(
    fuzz.ratio(query, name, RAW),
    code ? fuzz.ratio(query, code, RAW) : 0,
    fuzz.partial_ratio(query, name, RAW),
    fuzz.token_set_ratio(query, name, RAW),
    fuzz.token_sort_ratio(query, name, RAW)
  );
}

/**
 * Score of an extracted supplier name against a known supplier.
 */
export function supplierNameScore(query: string, name: string): number {
  return Math.max(
    fuzz.ratio(query, name, RAW),
    fuzz.partial_ratio(query, name, RAW),
    fuzz.token_set_ratio(query, name, RAW),
    fuzz.token_sort_ratio(query, name, RAW)
  );
}

/**
 * Plain edit-distance ratio, used to rank partial code matches.
 */
export function codeScore(token: string, code: string): number {
  return fuzz.ratio(token, code, RAW);
}
