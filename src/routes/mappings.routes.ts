/**
 * Learned Mapping API Routes
 *
 * Endpoints:
 * - GET /?key=     - Stored mapping for a line of text
 * - POST /         - Confirm a catalog item for a line of text
 * - DELETE /?key=  - Forget a mapping
 */

import { Router } from 'express';
import { z } from 'zod';
import { normalizeMappingKey } from '../mappings';
import { commonSchemas, validateRequest } from '../middlewares';
import type { AppServices } from '../services';
import { asyncHandler, sendSuccess, AppError } from '../utils';

const keyQuerySchema = z.object({
  key: commonSchemas.nonEmptyText,
});

const confirmBodySchema = z.object({
  lineText: commonSchemas.nonEmptyText,
  itemId: commonSchemas.nonEmptyText,
});

export const createMappingRoutes = ({ catalog, mappings, reconciliation }: AppServices): Router => {
  const router = Router();

  /**
   * @route   GET /api/v1/mappings?key=
   * @desc    Learned mapping for a line of invoice text
   * @access  Public
   *
   * Response:
   * - 200 OK: { key, mapping }
   * - 404 Not Found: nothing stored for the key
   */
  router.get(
    '/',
    asyncHandler(async (req, res): Promise<void> => {
      const { key } = validateRequest(keyQuerySchema, req.query);

      const mapping = await mappings.get(key);
      if (!mapping) {
        throw AppError.notFound(`No mapping stored for "${normalizeMappingKey(key)}"`);
      }

      sendSuccess(res, { key: normalizeMappingKey(key), mapping }, 'Mapping found');
    })
  );

  /**
   * @route   POST /api/v1/mappings
   * @desc    Confirm which catalog item a line of text means
   * @access  Public
   *
   * Request body:
   * - lineText: string
   * - itemId: string
   *
   * Response:
   * - 201 Created: { key, mapping, persisted }
   * - 404 Not Found: unknown item
   * - 422 Unprocessable: the item is a category or excluded
   */
  router.post(
    '/',
    asyncHandler(async (req, res): Promise<void> => {
      const { lineText, itemId } = validateRequest(confirmBodySchema, req.body);

      const snapshot = await catalog.getSnapshot();
      const result = await reconciliation.confirmMapping(lineText, itemId, snapshot);

      sendSuccess(
        res,
        result,
        result.persisted ? 'Mapping saved' : 'Mapping accepted but could not be saved',
        201
      );
    })
  );

  /**
   * @route   DELETE /api/v1/mappings?key=
   * @desc    Forget a learned mapping
   * @access  Public
   */
  router.delete(
    '/',
    asyncHandler(async (req, res): Promise<void> => {
      const { key } = validateRequest(keyQuerySchema, req.query);

      await mappings.remove(key);

      sendSuccess(res, { key: normalizeMappingKey(key) }, 'Mapping removed');
    })
  );

  return router;
};

export default createMappingRoutes;
