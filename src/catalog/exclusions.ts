/**
 * Catalog Exclusion Builder
 *
 * Computes the ids that must never be offered as matches: groups named by the
 * exclusion rules plus everything below them in the catalog tree.
 *
 * Algorithm:
 * 1. Seed with groups (or untyped items) whose name matches a rule
 * 2. Repeatedly add items whose parent is already excluded, until a pass adds
 *    nothing or MAX_CLOSURE_PASSES is reached
 */

import { z } from 'zod';
import defaultRulesJson from '../data/exclusions.json';
import type { CatalogItem, ExclusionRules } from './types';

/** Deeper trees than this are cut off */
export const MAX_CLOSURE_PASSES = 20;

const exclusionRulesSchema = z.object({
  exactNames: z.array(z.string()),
  containsAll: z.array(z.array(z.string()).min(1)),
});

/**
 * Validates exclusion rules read from JSON.
 */
export function parseExclusionRules(input: unknown): ExclusionRules {
  const rules = exclusionRulesSchema.parse(input);

  return {
    exactNames: rules.exactNames.map((name) => name.trim().toLowerCase()),
    containsAll: rules.containsAll.map((terms) => terms.map((term) => term.toLowerCase())),
  };
}

export const DEFAULT_EXCLUSION_RULES: ExclusionRules = parseExclusionRules(defaultRulesJson);

const matchesRules = (name: string, rules: ExclusionRules): boolean => {
  const normalized = name.trim().toLowerCase();
  if (!normalized) return false;

  if (rules.exactNames.includes(normalized)) {
    return true;
  }

  return rules.containsAll.some((terms) => terms.every((term) => normalized.includes(term)));
};

/**
 * Builds the exclusion set for a catalog.
 *
 * @example
 * buildExclusions([
 *   { id: 'g1', name: 'Кухня', type: 'Group' },
 *   { id: 'i1', name: 'Борщ', type: 'Item', parentId: 'g1' },
 *   { id: 'i2', name: 'Хлеб', type: 'Item' },
 * ])
 * // Set { 'g1', 'i1' }
 */
export function buildExclusions(
  items: readonly CatalogItem[],
  rules: ExclusionRules = DEFAULT_EXCLUSION_RULES
): ReadonlySet<string> {
  const excluded = new Set<string>();

  for (const item of items) {
    if (item.type === 'Item') continue;
    if (matchesRules(item.name, rules)) {
      excluded.add(item.id);
    }
  }

  for (let pass = 0; pass < MAX_CLOSURE_PASSES; pass++) {
    let added = 0;

    for (const item of items) {
      if (excluded.has(item.id) || !item.parentId) continue;
      if (excluded.has(item.parentId)) {
        excluded.add(item.id);
        added++;
      }
    }

    if (added === 0) break;
  }

  return excluded;
}

export default buildExclusions;
