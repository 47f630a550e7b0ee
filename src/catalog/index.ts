/**
 * Catalog Module
 *
 * Catalog items come from a provider, get their exclusion set computed once,
 * and are frozen into a snapshot the matching engine searches.
 */

export { buildExclusions, parseExclusionRules, DEFAULT_EXCLUSION_RULES, MAX_CLOSURE_PASSES } from './exclusions';
export { createCatalogSnapshot } from './snapshot';
export {
  createCatalogProvider,
  FileCatalogProvider,
  HttpCatalogProvider,
  InMemoryCatalogProvider,
  type HttpCatalogProviderOptions,
} from './providers';
export type {
  CatalogItem,
  CatalogItemType,
  CatalogProvider,
  CatalogSnapshot,
  ExclusionRules,
  Supplier,
} from './types';
