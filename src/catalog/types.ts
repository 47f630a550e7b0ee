/**
 * Catalog Types
 */

export type CatalogItemType = 'Item' | 'Group';

/**
 * One entry of the remote product catalog, as returned by a provider.
 * Groups are categories; their ids appear as `parentId` of their children.
 */
export interface CatalogItem {
  id: string;
  name: string;
  code?: string;
  type?: CatalogItemType;
  parentId?: string | null;
}

export interface Supplier {
  id: string;
  name: string;
}

/**
 * Which catalog branches never take part in matching (service categories,
 * delivery menus and so on). Only groups and untyped items seed the set.
 */
export interface ExclusionRules {
  /** Names compared after trim + lower-case */
  exactNames: readonly string[];
  /** A name matches a group when it contains every term of the group */
  containsAll: readonly (readonly string[])[];
}

/**
 * Immutable view of the catalog at one point in time.
 */
export interface CatalogSnapshot {
  readonly items: readonly CatalogItem[];
  readonly excludedIds: ReadonlySet<string>;
  /** Items that may be returned as matches */
  readonly searchable: readonly CatalogItem[];
  readonly searchableIds: ReadonlySet<string>;
  readonly byId: ReadonlyMap<string, CatalogItem>;
  readonly fetchedAt: Date;
}

export interface CatalogProvider {
  /** Short name for logs and health output */
  readonly name: string;
  fetchCatalog(): Promise<CatalogItem[]>;
  fetchSuppliers(): Promise<Supplier[]>;
}
