/**
 * In-memory catalog, for tests and fixtures.
 */

import type { CatalogItem, CatalogProvider, Supplier } from '../types';

export class InMemoryCatalogProvider implements CatalogProvider {
  readonly name = 'memory';

  constructor(
    private items: CatalogItem[] = [],
    private suppliers: Supplier[] = []
  ) {}

  setItems(items: CatalogItem[]): void {
    this.items = items;
  }

  setSuppliers(suppliers: Supplier[]): void {
    this.suppliers = suppliers;
  }

  async fetchCatalog(): Promise<CatalogItem[]> {
    return [...this.items];
  }

  async fetchSuppliers(): Promise<Supplier[]> {
    return [...this.suppliers];
  }
}

export default InMemoryCatalogProvider;
