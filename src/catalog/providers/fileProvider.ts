/**
 * File Catalog Provider
 *
 * Reads `{ items, suppliers }` from a JSON export of the catalog. The file is
 * re-read on every fetch, so replacing it and calling refresh picks up changes.
 */

import { readFile } from 'fs/promises';
import { CatalogUnavailableError, describeError } from '../../utils/errors';
import type { CatalogItem, CatalogProvider, Supplier } from '../types';
import { catalogFileSchema, type CatalogFile } from './schema';

export class FileCatalogProvider implements CatalogProvider {
  readonly name = 'file';

  constructor(private readonly filePath: string) {}

  private async load(): Promise<CatalogFile> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf8');
    } catch (error) {
      throw new CatalogUnavailableError(
        `Catalog file ${this.filePath} cannot be read: ${describeError(error)}`,
        error
      );
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new CatalogUnavailableError(`Catalog file ${this.filePath} is not valid JSON`, error);
    }

    const result = catalogFileSchema.safeParse(json);
    if (!result.success) {
      throw new CatalogUnavailableError(
        `Catalog file ${this.filePath} has an unexpected shape: ${result.error.issues[0]?.message ?? 'invalid'}`,
        result.error
      );
    }

    return result.data;
  }

  async fetchCatalog(): Promise<CatalogItem[]> {
    return (await this.load()).items;
  }

  async fetchSuppliers(): Promise<Supplier[]> {
    return (await this.load()).suppliers;
  }
}

export default FileCatalogProvider;
