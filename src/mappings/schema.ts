import { z } from 'zod';

export const learnedMappingSchema = z.object({
  id: z.string().min(1),
  name: z.string().default(''),
  code: z.string().default(''),
});

export const mappingFileSchema = z.record(z.string(), learnedMappingSchema);
