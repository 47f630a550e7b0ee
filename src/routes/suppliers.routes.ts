import { Router } from 'express';
import { z } from 'zod';
import { matchSupplier } from '../matching';
import { validateRequest } from '../middlewares';
import type { AppServices } from '../services';
import { asyncHandler, sendSuccess } from '../utils';

const matchQuerySchema = z.object({
  name: z.string().default(''),
});

export const createSupplierRoutes = ({ catalog }: AppServices): Router => {
  const router = Router();

  /**
   * @route   GET /api/v1/suppliers/match?name=
   * @desc    Known supplier closest to a seller name, or null
   * @access  Public
   */
  router.get(
    '/match',
    asyncHandler(async (req, res): Promise<void> => {
      const { name } = validateRequest(matchQuerySchema, req.query);

      const supplier = matchSupplier(name, await catalog.getSuppliers());

      sendSuccess(res, { name, supplier }, supplier ? 'Supplier matched' : 'No matching supplier');
    })
  );

  return router;
};

export default createSupplierRoutes;
