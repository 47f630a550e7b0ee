/**
 * Reconciliation API Routes
 *
 * Endpoints:
 * - POST / - Match already extracted line items against the current catalog
 */

import { Router } from 'express';
import { z } from 'zod';
import { commonSchemas, validateRequest } from '../middlewares';
import type { AppServices } from '../services';
import { asyncHandler, sendSuccess } from '../utils';

const reconcileBodySchema = z.object({
  lineItems: z.array(z.object({ name: commonSchemas.nonEmptyText }).passthrough()).min(1).max(500),
});

export const createReconciliationRoutes = ({ catalog, reconciliation }: AppServices): Router => {
  const router = Router();

  /**
   * @route   POST /api/v1/reconciliation
   * @desc    Best catalog match per line item (learned mapping first, then search)
   * @access  Public
   *
   * Request body:
   * - lineItems: Array<{ name: string }> (1-500)
   *
   * Response:
   * - 200 OK: { lines: ReconciledLine[] }
   * - 400 Bad Request: invalid body
   * - 503 Service Unavailable: catalog unavailable
   */
  router.post(
    '/',
    asyncHandler(async (req, res): Promise<void> => {
      const { lineItems } = validateRequest(reconcileBodySchema, req.body);

      const snapshot = await catalog.getSnapshot();
      const lines = await reconciliation.reconcile(lineItems, snapshot);

      sendSuccess(res, { lines }, 'Line items reconciled');
    })
  );

  return router;
};

export default createReconciliationRoutes;
