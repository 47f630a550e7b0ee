/**
 * Document API Routes
 *
 * Endpoints for invoice uploads.
 *
 * Endpoints:
 * - POST /        - Parse, match supplier and reconcile every line
 * - POST /parse   - Parse only (line items, supplier name, issues)
 */

import { Router, Request } from 'express';
import { uploadDocument } from '../middlewares';
import type { AppServices } from '../services';
import { asyncHandler, sendSuccess, AppError } from '../utils';

/**
 * Multer leaves `req.file` unset when the field is missing
 */
function getUploadedFile(req: Request): Express.Multer.File {
  if (!req.file) {
    throw AppError.badRequest('No file uploaded. Send the document in the "file" field');
  }
  return req.file;
}

export const createDocumentRoutes = ({ reconciliation }: AppServices): Router => {
  const router = Router();

  /**
   * @route   POST /api/v1/documents
   * @desc    Upload an invoice and get a suggested catalog item per line
   * @access  Public
   *
   * Request: multipart/form-data, field "file" (.pdf, .xlsx, .csv)
   *
   * Response:
   * - 200 OK: { lineItems, supplierName, supplier, issues, lines }
   * - 400 Bad Request: no file / unsupported type
   * - 422 Unprocessable: the file cannot be read
   * - 503 Service Unavailable: catalog unavailable
   */
  router.post(
    '/',
    uploadDocument,
    asyncHandler(async (req, res): Promise<void> => {
      const file = getUploadedFile(req);
      const result = await reconciliation.processDocument(file.originalname, file.buffer);

      const matched = result.lines.filter((line) => line.match !== null).length;
      sendSuccess(
        res,
        result,
        `Matched ${matched} of ${result.lines.length} line(s)`
      );
    })
  );

  /**
   * @route   POST /api/v1/documents/parse
   * @desc    Extract line items without matching
   * @access  Public
   *
   * Response:
   * - 200 OK: { lineItems, supplierName, issues }
   */
  router.post(
    '/parse',
    uploadDocument,
    asyncHandler(async (req, res): Promise<void> => {
      const file = getUploadedFile(req);
      const parsed = await reconciliation.parseDocument(file.originalname, file.buffer);

      sendSuccess(res, parsed, `Extracted ${parsed.lineItems.length} line item(s)`);
    })
  );

  return router;
};

export default createDocumentRoutes;
