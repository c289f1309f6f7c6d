import { Injectable, Logger } from '@nestjs/common';
import { DatabaseService } from '../database/index.js';
import { ContentStoreError, isContentStoreError } from './content.errors.js';
import {
  validateContentRecord,
  type ContentStore,
  type ContentStoreOptions,
} from './content.store.js';
import type { ContentRecord, ContentRecordDraft } from './content.types.js';

interface ContentRow {
  id: string;
  title: string;
  body: string;
  category: string;
  tags: string[] | null;
  author: string;
  created_at: Date | string;
  embedding: number[] | null;
  embedding_model: string;
  metadata: Record<string, unknown> | null;
}

const CREATE_TABLE_SQL = `
  CREATE TABLE IF NOT EXISTS content_records (
    seq BIGSERIAL,
    id TEXT PRIMARY KEY,
    title TEXT NOT NULL,
    body TEXT NOT NULL,
    category TEXT NOT NULL,
    tags TEXT[] NOT NULL DEFAULT '{}',
    author TEXT NOT NULL,
    created_at TIMESTAMPTZ NOT NULL,
    embedding DOUBLE PRECISION[] NOT NULL,
    embedding_model TEXT NOT NULL,
    metadata JSONB NOT NULL DEFAULT '{}'::jsonb,
    updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
  )`;

const RECORD_COLUMNS =
  'id, title, body, category, tags, author, created_at, embedding, embedding_model, metadata';

/**
 * Content records in a single Postgres table. Each write is one upsert
 * statement, so a record is either fully replaced or untouched. `seq` is
 * assigned on first insert and left alone on conflict, which keeps id
 * ordering stable across overwrites.
 */
@Injectable()
export class PostgresContentStore implements ContentStore {
  private readonly logger = new Logger(PostgresContentStore.name);
  private schemaReady: Promise<void> | null = null;

  constructor(
    private readonly database: DatabaseService,
    private readonly options: ContentStoreOptions,
  ) {}

  async put(id: string, record: ContentRecordDraft): Promise<ContentRecord> {
    const validated = validateContentRecord(id, record, this.options.dimension);

    const rows = await this.execute('put', () =>
      this.database.query<ContentRow>(
        `INSERT INTO content_records (
          id,
          title,
          body,
          category,
          tags,
          author,
          created_at,
          embedding,
          embedding_model,
          metadata,
          updated_at
        )
        VALUES ($1, $2, $3, $4, $5::text[], $6, $7, $8::double precision[], $9, $10::jsonb, NOW())
        ON CONFLICT (id) DO UPDATE
        SET
          title = EXCLUDED.title,
          body = EXCLUDED.body,
          category = EXCLUDED.category,
          tags = EXCLUDED.tags,
          author = EXCLUDED.author,
          created_at = EXCLUDED.created_at,
          embedding = EXCLUDED.embedding,
          embedding_model = EXCLUDED.embedding_model,
          metadata = EXCLUDED.metadata,
          updated_at = NOW()
        RETURNING ${RECORD_COLUMNS}`,
        [
          validated.id,
          validated.title,
          validated.body,
          validated.category,
          validated.tags,
          validated.author,
          validated.createdAt,
          validated.embedding,
          validated.embeddingModel,
          JSON.stringify(validated.metadata),
        ],
      ),
    );

    const [row] = rows;
    return row ? this.mapRow(row) : validated;
  }

  async get(id: string): Promise<ContentRecord> {
    const rows = await this.execute('get', () =>
      this.database.query<ContentRow>(
        `SELECT ${RECORD_COLUMNS} FROM content_records WHERE id = $1`,
        [id],
      ),
    );

    const [row] = rows;
    if (!row) {
      throw ContentStoreError.notFound(id);
    }
    return this.mapRow(row);
  }

  async getMany(ids: readonly string[]): Promise<ContentRecord[]> {
    if (ids.length === 0) {
      return [];
    }

    const rows = await this.execute('getMany', () =>
      this.database.query<ContentRow>(
        `SELECT ${RECORD_COLUMNS} FROM content_records WHERE id = ANY($1::text[])`,
        [[...ids]],
      ),
    );

    const byId = new Map<string, ContentRecord>();
    for (const row of rows) {
      try {
        byId.set(row.id, this.mapRow(row));
      } catch (error) {
        this.logger.warn(
          `Skipping unreadable content row ${row.id}: ${
            error instanceof Error ? error.message : String(error)
          }`,
        );
      }
    }

    return ids.flatMap((id) => {
      const record = byId.get(id);
      return record ? [record] : [];
    });
  }

  async getAll(): Promise<string[]> {
    const rows = await this.execute('getAll', () =>
      this.database.query<{ id: string }>(
        'SELECT id FROM content_records ORDER BY seq',
      ),
    );
    return rows.map((row) => row.id);
  }

  async count(): Promise<number> {
    const rows = await this.execute('count', () =>
      this.database.query<{ count: number }>(
        'SELECT COUNT(*)::int AS count FROM content_records',
      ),
    );
    return rows[0]?.count ?? 0;
  }

  private ensureSchema(): Promise<void> {
    if (!this.schemaReady) {
      this.schemaReady = this.database.query(CREATE_TABLE_SQL).then(
        () => undefined,
        (error: unknown) => {
          // allow the next call to retry
          this.schemaReady = null;
          throw error;
        },
      );
    }
    return this.schemaReady;
  }

  private async execute<T>(operation: string, run: () => Promise<T>): Promise<T> {
    try {
      await this.ensureSchema();
      return await run();
    } catch (error) {
      if (isContentStoreError(error)) {
        throw error;
      }
      this.logger.error(
        `Content store ${operation} failed`,
        error instanceof Error ? error.stack : error,
      );
      throw new ContentStoreError(
        'STORAGE_FAILED',
        `Content store ${operation} failed: ${
          error instanceof Error ? error.message : String(error)
        }`,
        { cause: error },
      );
    }
  }

  private mapRow(row: ContentRow): ContentRecord {
    return validateContentRecord(
      row.id,
      {
        title: row.title,
        body: row.body,
        category: row.category,
        tags: row.tags ?? [],
        author: row.author,
        createdAt: new Date(row.created_at),
        embedding: row.embedding ?? undefined,
        embeddingModel: row.embedding_model,
        metadata: row.metadata ?? {},
      },
      this.options.dimension,
    );
  }
}
