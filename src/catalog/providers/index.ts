import type { EnvConfig } from '../../config';
import type { CatalogProvider } from '../types';
import { FileCatalogProvider } from './fileProvider';
import { HttpCatalogProvider } from './httpProvider';

/**
 * Uses the HTTP API when CATALOG_URL is set, the JSON file otherwise.
 */
export function createCatalogProvider(config: EnvConfig): CatalogProvider {
  if (config.CATALOG_URL) {
    return new HttpCatalogProvider(config.CATALOG_URL, {
      timeoutMs: config.CATALOG_TIMEOUT_MS,
      apiKey: config.CATALOG_API_KEY,
    });
  }

  return new FileCatalogProvider(config.CATALOG_FILE);
}

export { FileCatalogProvider } from './fileProvider';
export { HttpCatalogProvider, type HttpCatalogProviderOptions } from './httpProvider';
export { InMemoryCatalogProvider } from './memoryProvider';
export { catalogFileSchema, catalogItemSchema, supplierSchema } from './schema';
