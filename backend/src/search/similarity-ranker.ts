import { Inject, Injectable, Logger } from '@nestjs/common';
import type { ContentRecord } from '../content/content.types.js';
import { cosineSimilarity } from '../embedding/vector-math.js';
import { SCORE_EPSILON, SEARCH_OPTIONS_TOKEN } from './search.constants.js';
import type { RankOptions, SearchOptions, SearchResult } from './search.types.js';

interface ScoredCandidate {
  record: ContentRecord;
  score: number;
  position: number;
}

/**
 * Brute-force cosine ranking over an in-memory candidate list. Any
 * replacement (an ANN index, say) only has to keep this signature and the
 * ordering rules: score descending, ties in candidate order.
 */
@Injectable()
export class SimilarityRanker {
  private readonly logger = new Logger(SimilarityRanker.name);

  constructor(
    @Inject(SEARCH_OPTIONS_TOKEN)
    private readonly options: Pick<SearchOptions, 'bodyPreviewLength' | 'tagPreviewLimit'>,
  ) {}

  rank(
    queryVector: readonly number[],
    records: readonly ContentRecord[],
    { category, limit }: RankOptions,
  ): SearchResult[] {
    if (limit <= 0 || records.length === 0) {
      return [];
    }

    const scored: ScoredCandidate[] = [];
    records.forEach((record, position) => {
      if (category !== undefined && record.category !== category) {
        return;
      }
      try {
        const score = cosineSimilarity(queryVector, record.embedding);
        scored.push({ record, score, position });
      } catch (error) {
        this.logger.debug(
          `Excluding candidate ${record.id}: ${
            error instanceof Error ? error.message : String(error)
          }`,
        );
      }
    });

    // scores are compared in SCORE_EPSILON steps, so the order is total and
    // near-equal scores fall back to candidate order
    scored.sort(
      (a, b) => scoreStep(b.score) - scoreStep(a.score) || a.position - b.position,
    );

    return scored.slice(0, limit).map((candidate) => this.toResult(candidate));
  }

  private toResult({ record, score }: ScoredCandidate): SearchResult {
    return {
      id: record.id,
      title: record.title,
      body: truncate(record.body, this.options.bodyPreviewLength),
      category: record.category,
      tags: record.tags.slice(0, this.options.tagPreviewLimit),
      author: record.author,
      createdAt: record.createdAt,
      score,
      distance: 1 - score,
    };
  }
}

const scoreStep = (score: number) => Math.round(score / SCORE_EPSILON);

/** Cut by code point so surrogate pairs are never split. */
export function truncate(text: string, maxLength: number): string {
  const chars = Array.from(text);
  if (chars.length <= maxLength) {
    return text;
  }
  return `${chars.slice(0, maxLength).join('')}...`;
}
