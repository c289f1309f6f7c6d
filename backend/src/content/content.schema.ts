import { z } from 'zod';

export const contentIdSchema = z.string().min(1, 'content id is required');

export const buildContentRecordSchema = (dimension: number) =>
  z.object({
    title: z.string(),
    body: z.string(),
    category: z.string(),
    tags: z.array(z.string()),
    author: z.string(),
    createdAt: z.date(),
    embedding: z
      .array(z.number().finite(), {
        required_error: 'embedding is required',
      })
      .length(dimension, `embedding must have exactly ${dimension} components`),
    embeddingModel: z.string().min(1, 'embeddingModel is required'),
    metadata: z.record(z.unknown()).default({}),
  });

export type ContentRecordData = z.infer<
  ReturnType<typeof buildContentRecordSchema>
>;

/** Caller-supplied fields, e.g. from a JSON import; dates arrive as strings. */
export const contentFieldsSchema = z.object({
  title: z.string().min(1, 'title is required'),
  body: z.string(),
  category: z.string().min(1, 'category is required'),
  tags: z.array(z.string()).optional(),
  author: z.string().optional(),
  createdAt: z.coerce.date().optional(),
  metadata: z.record(z.unknown()).optional(),
  embedding: z.array(z.number().finite()).optional(),
});

export const contentImportSchema = z.array(
  contentFieldsSchema.extend({
    id: contentIdSchema,
  }),
);

export type ContentImport = z.infer<typeof contentImportSchema>;
