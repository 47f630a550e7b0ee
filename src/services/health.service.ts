import { HealthCheckResponse } from '../types';
import { env } from '../config';
import type { CatalogService } from './catalog.service';

export interface HealthServiceDeps {
  catalog?: CatalogService;
  /** Kind of learned-mapping store in use ("file", "redis", "memory") */
  mappingStore?: string;
}

/**
 * Health check service
 */
export class HealthService {
  private readonly startTime: number;
  private readonly version: string;
  private readonly catalog?: CatalogService;
  private readonly mappingStore?: string;

  constructor(deps: HealthServiceDeps = {}) {
    this.startTime = Date.now();
    this.version = process.env.npm_package_version || '1.0.0';
    this.catalog = deps.catalog;
    this.mappingStore = deps.mappingStore;
  }

  /**
   * Process status plus what the reconciler is working with: the catalog
   * snapshot (never fetched here) and the mapping store
   */
  getHealthStatus(): HealthCheckResponse {
    return {
      status: 'healthy',
      timestamp: new Date().toISOString(),
      uptime: Math.floor((Date.now() - this.startTime) / 1000),
      environment: env.NODE_ENV,
      version: this.version,
      ...(this.catalog && { catalog: this.catalog.getStatus() }),
      ...(this.mappingStore && { mappingStore: this.mappingStore }),
    };
  }

  /**
   * Ready once the catalog can be loaded; a cached snapshot counts
   */
  async checkReadiness(): Promise<{ ready: boolean; checks: Record<string, boolean> }> {
    const checks: Record<string, boolean> = {
      server: true,
    };

    if (this.catalog) {
      checks.catalog = await this.catalog.getSnapshot().then(
        () => true,
        () => false
      );
    }

    const ready = Object.values(checks).every((check) => check);

    return { ready, checks };
  }
}

export default HealthService;
