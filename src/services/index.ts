/**
 * Service container
 *
 * Wires providers and stores from configuration. Tests pass their own
 * provider and store through `overrides`.
 */

import { createCatalogProvider, DEFAULT_EXCLUSION_RULES } from '../catalog';
import type { CatalogProvider } from '../catalog';
import { env, type EnvConfig } from '../config';
import { createMappingStore } from '../mappings';
import type { LearnedMappingStore } from '../mappings';
import { CatalogService } from './catalog.service';
import { HealthService } from './health.service';
import { ReconciliationService } from './reconciliation.service';

export interface AppServices {
  catalog: CatalogService;
  mappings: LearnedMappingStore;
  reconciliation: ReconciliationService;
  health: HealthService;
}

export interface ServiceOverrides {
  provider?: CatalogProvider;
  mappings?: LearnedMappingStore;
}

export function createServices(
  config: EnvConfig = env,
  overrides: ServiceOverrides = {}
): AppServices {
  const catalog = new CatalogService(overrides.provider ?? createCatalogProvider(config), {
    ttlMs: config.CATALOG_TTL_MS,
    exclusionRules: DEFAULT_EXCLUSION_RULES,
  });

  const mappings = overrides.mappings ?? createMappingStore(config);

  const reconciliation = new ReconciliationService({
    catalog,
    mappings,
    searchOptions: { limit: config.SEARCH_LIMIT, minScore: config.SEARCH_MIN_SCORE },
  });

  return {
    catalog,
    mappings,
    reconciliation,
    health: new HealthService({ catalog, mappingStore: mappings.kind }),
  };
}

export { HealthService, type HealthServiceDeps } from './health.service';
export { CatalogService, type CatalogServiceOptions, type CatalogStatus } from './catalog.service';
export {
  ReconciliationService,
  type ConfirmMappingResult,
  type MatchSource,
  type ProcessedDocument,
  type ReconcilableLine,
  type ReconciledLine,
  type ReconciledMatch,
  type ReconciliationServiceDeps,
} from './reconciliation.service';
