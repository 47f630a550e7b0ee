/**
 * Catalog Snapshot
 *
 * Everything matching needs from one catalog fetch, computed once and frozen.
 * Refreshing the catalog builds a new snapshot; nothing mutates an old one.
 */

import { buildExclusions, DEFAULT_EXCLUSION_RULES } from './exclusions';
import type { CatalogItem, CatalogSnapshot, ExclusionRules } from './types';

export function createCatalogSnapshot(
  items: readonly CatalogItem[],
  rules: ExclusionRules = DEFAULT_EXCLUSION_RULES,
  fetchedAt: Date = new Date()
): CatalogSnapshot {
  const frozenItems = Object.freeze(items.map((item) => Object.freeze({ ...item })));
  const excludedIds = buildExclusions(frozenItems, rules);

  const searchable = Object.freeze(
    frozenItems.filter(
      (item) => item.type !== 'Group' && !excludedIds.has(item.id) && item.name.trim() !== ''
    )
  );

  return Object.freeze({
    items: frozenItems,
    excludedIds,
    searchable,
    searchableIds: new Set(searchable.map((item) => item.id)),
    byId: new Map(frozenItems.map((item) => [item.id, item])),
    fetchedAt,
  });
}

export default createCatalogSnapshot;
