/**
 * HTTP Catalog Provider
 *
 * Talks to a JSON catalog API:
 *   GET {baseUrl}/items      -> CatalogItem[]
 *   GET {baseUrl}/suppliers  -> Supplier[]
 *
 * Any transport error, non-2xx status or malformed payload surfaces as
 * CatalogUnavailableError.
 */

import axios, { type AxiosInstance } from 'axios';
import type { ZodType, ZodTypeDef } from 'zod';
import { componentLogger } from '../../utils';
import { CatalogUnavailableError, describeError } from '../../utils/errors';
import type { CatalogItem, CatalogProvider, Supplier } from '../types';
import { catalogItemsSchema, suppliersSchema } from './schema';

const logger = componentLogger('catalog');

export interface HttpCatalogProviderOptions {
  timeoutMs: number;
  /** Sent as a bearer token when set */
  apiKey?: string;
  /** Injected in tests */
  client?: AxiosInstance;
}

export class HttpCatalogProvider implements CatalogProvider {
  readonly name = 'http';

  private readonly client: AxiosInstance;

  constructor(
    private readonly baseUrl: string,
    options: HttpCatalogProviderOptions
  ) {
    this.client =
      options.client ??
      axios.create({
        baseURL: baseUrl.replace(/\/+$/, ''),
        timeout: options.timeoutMs,
        headers: {
          Accept: 'application/json',
          ...(options.apiKey ? { Authorization: `bearer ${options.apiKey}` } : {}),
        },
      });
  }

  private async getJson<T>(path: string, schema: ZodType<T, ZodTypeDef, unknown>): Promise<T> {
    let data: unknown;
    try {
      const response = await this.client.get<unknown>(path);
      data = response.data;
    } catch (error) {
      logger.warn(`Catalog request ${path} failed: ${describeError(error)}`);
      throw new CatalogUnavailableError(
        `Catalog API at ${this.baseUrl} is unreachable: ${describeError(error)}`,
        error
      );
    }

    const result = schema.safeParse(data);
    if (!result.success) {
      throw new CatalogUnavailableError(
        `Catalog API returned an unexpected payload for ${path}`,
        result.error
      );
    }

    return result.data;
  }

  fetchCatalog(): Promise<CatalogItem[]> {
    return this.getJson('/items', catalogItemsSchema);
  }

  fetchSuppliers(): Promise<Supplier[]> {
    return this.getJson('/suppliers', suppliersSchema);
  }
}

export default HttpCatalogProvider;
