import { Inject, Injectable, Logger } from '@nestjs/common';
import { isContentStoreError } from '../content/content.errors.js';
import { CONTENT_STORE_TOKEN } from '../content/content.store.js';
import type { ContentStore } from '../content/content.store.js';
import type { ContentFields, ContentRecord } from '../content/content.types.js';
import { EmbedderService } from '../embedding/embedder.service.js';
import type { EmbeddingVector } from '../embedding/embedding.types.js';
import { SEARCH_OPTIONS_TOKEN } from './search.constants.js';
import { SearchError } from './search.errors.js';
import { searchQuerySchema, type ParsedSearchQuery } from './search.schema.js';
import type {
  IndexContentItem,
  IndexContentResult,
  SearchOptions,
  SearchQuery,
  SearchResult,
} from './search.types.js';
import { SimilarityRanker } from './similarity-ranker.js';

const errorMessage = (error: unknown) =>
  error instanceof Error ? error.message : String(error);

/** Text a record is embedded under when the caller supplies no vector. */
export const embeddingTextFor = (fields: Pick<ContentFields, 'title' | 'body'>) =>
  `${fields.title} ${fields.body}`;

/**
 * Indexing and similarity search over the content store. Holds no state of
 * its own; the embedder owns the cache and the store owns the records.
 */
@Injectable()
export class SearchEngineService {
  private readonly logger = new Logger(SearchEngineService.name);

  // explicit tokens: loaders that skip decorator metadata (tsx) still resolve them
  constructor(
    @Inject(EmbedderService)
    private readonly embedder: EmbedderService,
    @Inject(CONTENT_STORE_TOKEN)
    private readonly store: ContentStore,
    @Inject(SimilarityRanker)
    private readonly ranker: SimilarityRanker,
    @Inject(SEARCH_OPTIONS_TOKEN)
    private readonly options: Pick<SearchOptions, 'defaultLimit'>,
  ) {}

  /**
   * Rank stored content against the query. Invalid queries reject with
   * SearchError; storage trouble while loading candidates is logged and
   * yields no results.
   */
  async search(query: SearchQuery): Promise<SearchResult[]> {
    const parsed = this.parseQuery(query);
    const limit = parsed.k ?? this.options.defaultLimit;

    if (limit <= 0) {
      return [];
    }

    const queryVector = await this.resolveQueryVector(parsed);
    const candidates = await this.loadCandidates();

    const results = this.ranker.rank(queryVector, candidates, {
      category: parsed.category,
      limit,
    });

    if (process.env.NODE_ENV === 'development') {
      this.logger.debug(
        `Ranked ${candidates.length} candidates, returning ${results.length} (k=${limit}${
          parsed.category ? `, category=${parsed.category}` : ''
        })`,
      );
    }

    return results;
  }

  /**
   * Embed and store one item. Never rejects; failures come back as
   * `{ ok: false }` with the stage that failed.
   */
  async indexContent(id: string, fields: ContentFields): Promise<IndexContentResult> {
    const embeddingModel = this.embedder.model;

    let embedding: EmbeddingVector;
    try {
      embedding = fields.embedding ?? (await this.embedder.embed(embeddingTextFor(fields)));
    } catch (error) {
      this.logger.error(
        `Failed to embed content ${id}`,
        error instanceof Error ? error.stack : error,
      );
      return {
        ok: false,
        reason: 'EMBEDDING_FAILED',
        retryable: true,
        message: errorMessage(error),
      };
    }

    return this.persist(id, fields, embedding, embeddingModel);
  }

  /**
   * Index several items, embedding all uncached texts in one provider call.
   * Results are in input order.
   */
  async indexContentBatch(items: IndexContentItem[]): Promise<IndexContentResult[]> {
    const embeddingModel = this.embedder.model;
    const pending = items.filter((item) => item.fields.embedding === undefined);

    let computed: EmbeddingVector[];
    try {
      computed = await this.embedder.embedBatch(
        pending.map((item) => embeddingTextFor(item.fields)),
      );
    } catch (error) {
      this.logger.error(
        `Failed to embed ${pending.length} content item(s)`,
        error instanceof Error ? error.stack : error,
      );
      const failure: IndexContentResult = {
        ok: false,
        reason: 'EMBEDDING_FAILED',
        retryable: true,
        message: errorMessage(error),
      };
      // items that brought their own vector can still be stored
      return Promise.all(
        items.map(({ id, fields }) =>
          fields.embedding
            ? this.persist(id, fields, fields.embedding, embeddingModel)
            : Promise.resolve(failure),
        ),
      );
    }

    const vectors = new Map<IndexContentItem, EmbeddingVector>();
    pending.forEach((item, index) => vectors.set(item, computed[index]));

    const results: IndexContentResult[] = [];
    // sequential so a repeated id ends with its last occurrence
    for (const item of items) {
      const embedding = item.fields.embedding ?? vectors.get(item);
      results.push(
        embedding
          ? await this.persist(item.id, item.fields, embedding, embeddingModel)
          : {
              ok: false,
              reason: 'EMBEDDING_FAILED',
              retryable: true,
              message: `No embedding computed for content ${item.id}`,
            },
      );
    }
    return results;
  }

  count(): Promise<number> {
    return this.store.count();
  }

  embed(text: string): Promise<EmbeddingVector> {
    return this.embedder.embed(text);
  }

  /** Rejects with ContentStoreError NOT_FOUND for unknown ids. */
  getContent(id: string): Promise<ContentRecord> {
    return this.store.get(id);
  }

  private async persist(
    id: string,
    fields: ContentFields,
    embedding: EmbeddingVector,
    embeddingModel: string,
  ): Promise<IndexContentResult> {
    try {
      const record = await this.store.put(id, {
        title: fields.title,
        body: fields.body,
        category: fields.category,
        tags: fields.tags ?? [],
        author: fields.author ?? '',
        createdAt: fields.createdAt ?? new Date(),
        embedding,
        embeddingModel,
        metadata: fields.metadata ?? {},
      });
      return { ok: true, record };
    } catch (error) {
      const incomplete = isContentStoreError(error, 'INCOMPLETE_RECORD');
      if (incomplete) {
        this.logger.warn(`Rejected content ${id}: ${errorMessage(error)}`);
      } else {
        this.logger.error(
          `Failed to store content ${id}`,
          error instanceof Error ? error.stack : error,
        );
      }
      return {
        ok: false,
        reason: 'STORAGE_FAILED',
        retryable: !incomplete,
        message: errorMessage(error),
      };
    }
  }

  private parseQuery(query: SearchQuery): ParsedSearchQuery {
    const parsed = searchQuerySchema.safeParse(query);
    if (!parsed.success) {
      const messages = parsed.error.errors
        .map((issue) => `${issue.path.join('.') || 'query'}: ${issue.message}`)
        .join('; ');
      throw new SearchError('INVALID_INPUT', `Invalid search query - ${messages}`);
    }
    return parsed.data;
  }

  private async resolveQueryVector(query: ParsedSearchQuery): Promise<EmbeddingVector> {
    if (query.vector) {
      if (query.vector.length !== this.embedder.dimension) {
        throw new SearchError(
          'INVALID_INPUT',
          `Query vector has ${query.vector.length} components, expected ${this.embedder.dimension}`,
        );
      }
      return query.vector;
    }
    // the schema guarantees text when there is no vector
    return this.embedder.embed(query.text ?? '');
  }

  private async loadCandidates(): Promise<ContentRecord[]> {
    let records: ContentRecord[];
    try {
      const ids = await this.store.getAll();
      records = await this.store.getMany(ids);
    } catch (error) {
      this.logger.error(
        'Failed to load search candidates',
        error instanceof Error ? error.stack : error,
      );
      return [];
    }

    const model = this.embedder.model;
    const comparable = records.filter((record) => record.embeddingModel === model);
    if (comparable.length < records.length) {
      this.logger.warn(
        `Skipped ${records.length - comparable.length} record(s) embedded under a different model than ${model}`,
      );
    }
    return comparable;
  }
}
