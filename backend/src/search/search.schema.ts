import { z } from 'zod';

export const searchQuerySchema = z
  .object({
    text: z.string().optional(),
    vector: z.array(z.number().finite()).optional(),
    k: z.number().int('k must be an integer').optional(),
    // an empty category means "no filter"
    category: z
      .string()
      .optional()
      .transform((value) => (value === '' ? undefined : value)),
  })
  .refine((query) => query.text !== undefined || query.vector !== undefined, {
    message: 'either text or vector is required',
    path: ['text'],
  });

export type ParsedSearchQuery = z.infer<typeof searchQuerySchema>;
