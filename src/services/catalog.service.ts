/**
 * Catalog Service
 *
 * Holds the current catalog snapshot.
 *
 * - A snapshot younger than the TTL is reused
 * - Concurrent callers during a fetch share the same request
 * - A successful fetch swaps the snapshot reference in one step; callers
 *   holding the old snapshot keep a consistent view
 * - A failed fetch leaves the previous snapshot in place
 */

import { createCatalogSnapshot, DEFAULT_EXCLUSION_RULES } from '../catalog';
import type {
  CatalogItem,
  CatalogProvider,
  CatalogSnapshot,
  ExclusionRules,
  Supplier,
} from '../catalog';
import { componentLogger } from '../utils';
import { CatalogUnavailableError, describeError } from '../utils/errors';

const logger = componentLogger('catalog');

export interface CatalogServiceOptions {
  /** 0 disables reuse: every call fetches */
  ttlMs: number;
  exclusionRules?: ExclusionRules;
  /** Clock, injectable for tests */
  now?: () => number;
}

export interface CatalogStatus {
  provider: string;
  loaded: boolean;
  fetchedAt: string | null;
  itemCount: number;
  searchableCount: number;
  excludedCount: number;
}

const toUnavailable = (error: unknown): CatalogUnavailableError =>
  error instanceof CatalogUnavailableError
    ? error
    : new CatalogUnavailableError(`Catalog fetch failed: ${describeError(error)}`, error);

export class CatalogService {
  private snapshot: CatalogSnapshot | null = null;
  private loadedAt = 0;
  private inFlight: Promise<CatalogSnapshot> | null = null;

  private readonly ttlMs: number;
  private readonly exclusionRules: ExclusionRules;
  private readonly now: () => number;

  constructor(
    private readonly provider: CatalogProvider,
    options: CatalogServiceOptions
  ) {
    this.ttlMs = options.ttlMs;
    this.exclusionRules = options.exclusionRules ?? DEFAULT_EXCLUSION_RULES;
    this.now = options.now ?? Date.now;
  }

  /**
   * Returns the cached snapshot, fetching a new one when it is missing or stale.
   *
   * @throws CatalogUnavailableError when the provider fails
   */
  async getSnapshot(): Promise<CatalogSnapshot> {
    if (this.snapshot && this.now() - this.loadedAt < this.ttlMs) {
      return this.snapshot;
    }

    return this.load();
  }

  /**
   * Fetches a new snapshot regardless of age.
   */
  refresh(): Promise<CatalogSnapshot> {
    return this.load();
  }

  /**
   * @throws CatalogUnavailableError when the provider fails
   */
  async getSuppliers(): Promise<Supplier[]> {
    try {
      return await this.provider.fetchSuppliers();
    } catch (error) {
      throw toUnavailable(error);
    }
  }

  getStatus(): CatalogStatus {
    const snapshot = this.snapshot;

    return {
      provider: this.provider.name,
      loaded: snapshot !== null,
      fetchedAt: snapshot ? snapshot.fetchedAt.toISOString() : null,
      itemCount: snapshot ? snapshot.items.length : 0,
      searchableCount: snapshot ? snapshot.searchable.length : 0,
      excludedCount: snapshot ? snapshot.excludedIds.size : 0,
    };
  }

  private load(): Promise<CatalogSnapshot> {
    if (this.inFlight) {
      return this.inFlight;
    }

    const request = this.fetchSnapshot().finally(() => {
      this.inFlight = null;
    });

    this.inFlight = request;
    return request;
  }

  private async fetchSnapshot(): Promise<CatalogSnapshot> {
    const startTime = this.now();

    let items: CatalogItem[];
    try {
      items = await this.provider.fetchCatalog();
    } catch (error) {
      logger.warn(`Catalog fetch from ${this.provider.name} failed: ${describeError(error)}`);
      throw toUnavailable(error);
    }

    const snapshot = createCatalogSnapshot(items, this.exclusionRules, new Date(this.now()));

    this.snapshot = snapshot;
    this.loadedAt = this.now();

    logger.info(
      `📚 Catalog loaded from ${this.provider.name}: ${snapshot.items.length} items, ` +
        `${snapshot.searchable.length} searchable, ${snapshot.excludedIds.size} excluded ` +
        `(${this.now() - startTime}ms)`
    );

    return snapshot;
  }
}

export default CatalogService;
