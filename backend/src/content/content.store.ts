import { ContentStoreError } from './content.errors.js';
import {
  buildContentRecordSchema,
  contentIdSchema,
  type ContentRecordData,
} from './content.schema.js';
import type { ContentRecord, ContentRecordDraft } from './content.types.js';

/**
 * Durable id -> record mapping. Every operation is atomic per id: a record
 * becomes visible to readers only once it is complete, embedding included.
 */
export interface ContentStore {
  /** Insert or overwrite. Rejects with INCOMPLETE_RECORD when the embedding is missing or malformed. */
  put(id: string, record: ContentRecordDraft): Promise<ContentRecord>;
  /** Rejects with NOT_FOUND for unknown ids. */
  get(id: string): Promise<ContentRecord>;
  /** Records for `ids` in the same order; absent ids are skipped. */
  getMany(ids: readonly string[]): Promise<ContentRecord[]>;
  /** Identifiers in first-insertion order. */
  getAll(): Promise<string[]>;
  count(): Promise<number>;
}

export const CONTENT_STORE_TOKEN = Symbol('CONTENT_STORE');

export interface ContentStoreOptions {
  /** Required embedding length. */
  dimension: number;
}

/**
 * Validate a draft at the store boundary. Missing embeddings are rejected,
 * never filled in.
 */
export function validateContentRecord(
  id: string,
  record: ContentRecordDraft,
  dimension: number,
): ContentRecord {
  const idResult = contentIdSchema.safeParse(id);
  const recordResult = buildContentRecordSchema(dimension).safeParse(record);

  if (!idResult.success || !recordResult.success) {
    const issues = [
      ...(idResult.success ? [] : idResult.error.errors.map((issue) => `id: ${issue.message}`)),
      ...(recordResult.success
        ? []
        : recordResult.error.errors.map(
            (issue) => `${issue.path.join('.') || 'record'}: ${issue.message}`,
          )),
    ];
    throw new ContentStoreError(
      'INCOMPLETE_RECORD',
      `Content ${id || '(empty id)'} rejected - ${issues.join('; ')}`,
    );
  }

  const data: ContentRecordData = recordResult.data;
  return { id: idResult.data, ...data };
}
