import { z, ZodError, type ZodType, type ZodTypeDef } from 'zod';
import { AppError } from '../utils';

/**
 * Formats zod issues the same way for every endpoint
 */
const toBadRequest = (error: ZodError): AppError => {
  const errorMessages = error.errors.map((err) => ({
    field: err.path.join('.'),
    message: err.message,
  }));
  return AppError.badRequest(`Validation failed: ${JSON.stringify(errorMessages)}`);
};

/**
 * Validates request input (body, query or params) against a zod schema and
 * returns the typed, coerced value.
 *
 * @throws AppError (400) listing every failing field
 *
 * @example
 * const { q, limit } = validateRequest(searchQuerySchema, req.query);
 */
export const validateRequest = <T>(schema: ZodType<T, ZodTypeDef, unknown>, input: unknown): T => {
  const result = schema.safeParse(input);

  if (!result.success) {
    throw toBadRequest(result.error);
  }

  return result.data;
};

// Common validation schemas
export const commonSchemas = {
  /** Query-string integer with bounds, e.g. ?limit=5 */
  boundedInt: (min: number, max: number) => z.coerce.number().int().min(min).max(max),
  nonEmptyText: z.string().trim().min(1, 'Must not be empty'),
};

export default validateRequest;
