import { Router } from 'express';
import type { AppServices } from '../services';
import { createHealthRoutes } from './health.routes';
import { createDocumentRoutes } from './documents.routes';
import { createReconciliationRoutes } from './reconciliation.routes';
import { createCatalogRoutes } from './catalog.routes';
import { createSupplierRoutes } from './suppliers.routes';
import { createMappingRoutes } from './mappings.routes';

export const createRoutes = (services: AppServices): Router => {
  const router = Router();

  // Health check routes
  router.use('/health', createHealthRoutes(services.health));

  // Invoice upload (parse + reconcile)
  router.use('/documents', createDocumentRoutes(services));

  // Reconciliation of already extracted line items
  router.use('/reconciliation', createReconciliationRoutes(services));

  // Catalog search and refresh
  router.use('/catalog', createCatalogRoutes(services));

  // Supplier lookup
  router.use('/suppliers', createSupplierRoutes(services));

  // Learned mappings (confirm, look up, forget)
  router.use('/mappings', createMappingRoutes(services));

  return router;
};

export default createRoutes;
