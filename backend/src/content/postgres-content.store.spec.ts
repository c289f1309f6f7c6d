import { afterEach, beforeEach, describe, expect, it, jest } from '@jest/globals';
import { Test, TestingModule } from '@nestjs/testing';
import { DatabaseService } from '../database/database.service.js';
import type { ContentRecordDraft } from './content.types.js';
import { PostgresContentStore } from './postgres-content.store.js';

type QueryFn = (text: string, values?: unknown[]) => Promise<unknown[]>;

const draft: ContentRecordDraft = {
  title: 'Bread basics',
  body: 'Flour, water, salt and time.',
  category: 'cooking',
  tags: ['bread'],
  author: 'sam',
  createdAt: new Date('2024-03-01T00:00:00.000Z'),
  embedding: [1, 0, 0],
  embeddingModel: 'hash:test@3',
  metadata: { source: 'import' },
};

const row = (id: string, embedding: number[] | null = [0, 1, 0]) => ({
  id,
  title: `Title ${id}`,
  body: 'Body',
  category: 'cooking',
  tags: null,
  author: 'sam',
  created_at: '2024-03-01T00:00:00.000Z',
  embedding,
  embedding_model: 'hash:test@3',
  metadata: null,
});

const isSchemaStatement = (text: string) => text.includes('CREATE TABLE');

describe('PostgresContentStore', () => {
  let store: PostgresContentStore;
  let query: jest.MockedFunction<QueryFn>;

  beforeEach(async () => {
    query = jest.fn<QueryFn>(async () => []);

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        { provide: DatabaseService, useValue: { query } },
        {
          provide: PostgresContentStore,
          useFactory: (database: DatabaseService) =>
            new PostgresContentStore(database, { dimension: 3 }),
          inject: [DatabaseService],
        },
      ],
    }).compile();

    store = module.get(PostgresContentStore);
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  describe('put', () => {
    it('creates the table once and upserts every column', async () => {
      await store.put('a', draft);
      await store.put('b', draft);

      const statements = query.mock.calls.map(([text]) => text);
      expect(statements.filter(isSchemaStatement)).toHaveLength(1);
      expect(isSchemaStatement(statements[0])).toBe(true);

      const [text, values] = query.mock.calls[1];
      expect(text).toContain('ON CONFLICT (id) DO UPDATE');
      expect(values).toEqual([
        'a',
        'Bread basics',
        'Flour, water, salt and time.',
        'cooking',
        ['bread'],
        'sam',
        new Date('2024-03-01T00:00:00.000Z'),
        [1, 0, 0],
        'hash:test@3',
        '{"source":"import"}',
      ]);
    });

    it('returns the stored row', async () => {
      query.mockImplementation(async (text) => (text.includes('INSERT INTO') ? [row('a')] : []));

      const record = await store.put('a', draft);

      expect(record).toEqual({
        id: 'a',
        title: 'Title a',
        body: 'Body',
        category: 'cooking',
        tags: [],
        author: 'sam',
        createdAt: new Date('2024-03-01T00:00:00.000Z'),
        embedding: [0, 1, 0],
        embeddingModel: 'hash:test@3',
        metadata: {},
      });
    });

    it('rejects an incomplete record without touching the database', async () => {
      await expect(store.put('a', { ...draft, embedding: [1, 0] })).rejects.toMatchObject({
        code: 'INCOMPLETE_RECORD',
      });
      expect(query).not.toHaveBeenCalled();
    });
  });

  describe('get', () => {
    it('rejects unknown ids with NOT_FOUND', async () => {
      await expect(store.get('missing')).rejects.toMatchObject({
        code: 'NOT_FOUND',
        message: 'Content not found: missing',
      });
    });

    it('maps a row to a record', async () => {
      query.mockImplementation(async (text) => (text.includes('WHERE id = $1') ? [row('a')] : []));

      const record = await store.get('a');

      expect(record.id).toBe('a');
      expect(record.createdAt).toEqual(new Date('2024-03-01T00:00:00.000Z'));
      expect(query).toHaveBeenLastCalledWith(expect.stringContaining('WHERE id = $1'), ['a']);
    });
  });

  describe('getMany', () => {
    it('follows the requested order and skips absent or unreadable rows', async () => {
      query.mockImplementation(async (text) =>
        text.includes('ANY($1::text[])') ? [row('b'), row('bad', [1, 0]), row('a')] : [],
      );

      const records = await store.getMany(['a', 'missing', 'bad', 'b']);

      expect(records.map((record) => record.id)).toEqual(['a', 'b']);
      expect(query).toHaveBeenLastCalledWith(expect.stringContaining('ANY($1::text[])'), [
        ['a', 'missing', 'bad', 'b'],
      ]);
    });

    it('does not query for an empty id list', async () => {
      expect(await store.getMany([])).toEqual([]);
      expect(query).not.toHaveBeenCalled();
    });
  });

  describe('getAll and count', () => {
    it('lists ids in insertion order', async () => {
      query.mockImplementation(async (text) =>
        text.includes('ORDER BY seq') ? [{ id: 'b' }, { id: 'a' }] : [],
      );

      expect(await store.getAll()).toEqual(['b', 'a']);
    });

    it('reads the row count', async () => {
      query.mockImplementation(async (text) => (text.includes('COUNT(*)') ? [{ count: 2 }] : []));

      expect(await store.count()).toBe(2);
    });
  });

  describe('failures', () => {
    it('wraps driver errors as STORAGE_FAILED and retries the schema next time', async () => {
      query.mockRejectedValueOnce(new Error('connection refused'));

      await expect(store.count()).rejects.toMatchObject({
        code: 'STORAGE_FAILED',
        message: 'Content store count failed: connection refused',
      });

      query.mockImplementation(async (text) => (text.includes('COUNT(*)') ? [{ count: 1 }] : []));
      expect(await store.count()).toBe(1);

      const schemaCalls = query.mock.calls.filter(([text]) => isSchemaStatement(text));
      expect(schemaCalls).toHaveLength(2);
    });
  });
});
