/**
 * Payload schemas shared by the catalog providers.
 */

import { z } from 'zod';

const idSchema = z.union([z.string().min(1), z.number()]).transform(String);

export const catalogItemSchema = z.object({
  id: idSchema,
  name: z.string(),
  code: z
    .union([z.string(), z.number()])
    .nullish()
    .transform((code) => (code === null || code === undefined ? undefined : String(code))),
  // Unknown kinds are treated like untyped items
  type: z.enum(['Item', 'Group']).optional().catch(undefined),
  parentId: idSchema.nullish(),
});

export const supplierSchema = z.object({
  id: idSchema,
  name: z.string(),
});

export const catalogItemsSchema = z.array(catalogItemSchema);
export const suppliersSchema = z.array(supplierSchema);

export const catalogFileSchema = z.object({
  items: catalogItemsSchema,
  suppliers: suppliersSchema.default([]),
});

export type CatalogFile = z.infer<typeof catalogFileSchema>;
