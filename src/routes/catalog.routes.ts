/**
 * Catalog API Routes
 *
 * Endpoints:
 * - GET /search   - Ranked catalog candidates for a query
 * - GET /status   - Snapshot statistics
 * - POST /refresh - Re-fetch the catalog now
 */

import { Router } from 'express';
import { z } from 'zod';
import { env } from '../config';
import { searchCatalog } from '../matching';
import { commonSchemas, validateRequest } from '../middlewares';
import type { AppServices } from '../services';
import { asyncHandler, sendSuccess } from '../utils';

const searchQuerySchema = z.object({
  q: commonSchemas.nonEmptyText,
  limit: commonSchemas.boundedInt(1, 50).default(env.SEARCH_LIMIT),
  minScore: commonSchemas.boundedInt(0, 100).default(env.SEARCH_MIN_SCORE),
});

export const createCatalogRoutes = ({ catalog }: AppServices): Router => {
  const router = Router();

  /**
   * @route   GET /api/v1/catalog/search
   * @desc    Search the catalog the way line items are matched
   * @access  Public
   *
   * Query params:
   * - q: string (required) - line text or article code
   * - limit: number (1-50, default SEARCH_LIMIT)
   * - minScore: number (0-100, default SEARCH_MIN_SCORE)
   *
   * Response:
   * - 200 OK: { query, candidates: MatchCandidate[] }
   */
  router.get(
    '/search',
    asyncHandler(async (req, res): Promise<void> => {
      const { q, limit, minScore } = validateRequest(searchQuerySchema, req.query);

      const snapshot = await catalog.getSnapshot();
      const candidates = searchCatalog(q, snapshot.searchable, { limit, minScore });

      sendSuccess(res, { query: q, candidates }, `Found ${candidates.length} candidate(s)`);
    })
  );

  /**
   * @route   GET /api/v1/catalog/status
   * @desc    Size of the current snapshot and when it was fetched
   * @access  Public
   */
  router.get(
    '/status',
    asyncHandler(async (_req, res): Promise<void> => {
      sendSuccess(res, catalog.getStatus(), 'Catalog status');
    })
  );

  /**
   * @route   POST /api/v1/catalog/refresh
   * @desc    Fetch a new snapshot regardless of its age
   * @access  Public
   */
  router.post(
    '/refresh',
    asyncHandler(async (_req, res): Promise<void> => {
      await catalog.refresh();
      sendSuccess(res, catalog.getStatus(), 'Catalog refreshed');
    })
  );

  return router;
};

export default createCatalogRoutes;
