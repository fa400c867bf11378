import { Injectable, Logger } from '@nestjs/common';
import { KnowledgeStoreService } from './knowledge-store.service.js';
import { DimensionMismatchError } from './knowledge.errors.js';
import type { Embedding, RetrievedMatch } from './knowledge.types.js';
import { cosineSimilarity } from './similarity.js';

export const DEFAULT_TOP_K = 5;

@Injectable()
export class RetrieverService {
  private readonly logger = new Logger(RetrieverService.name);

  constructor(private readonly store: KnowledgeStoreService) {}

  /**
   * Ranks every stored chunk against the query by cosine similarity. Equal
   * scores keep the order in which the chunks were ingested.
   */
  async retrieve(
    queryEmbedding: Embedding,
    topK = DEFAULT_TOP_K,
  ): Promise<RetrievedMatch[]> {
    if (!Number.isInteger(topK) || topK < 0) {
      throw new RangeError(`topK must be a non-negative integer, received ${topK}`);
    }

    const candidates = await this.store.allChunksWithSource();
    if (candidates.length === 0 || topK === 0) {
      return [];
    }

    let scored: { match: RetrievedMatch; order: number }[];
    try {
      scored = candidates.map(({ chunk, sourceFileName }, order) => ({
        order,
        match: {
          chunkId: chunk.id,
          chunkText: chunk.text,
          similarityScore: cosineSimilarity(queryEmbedding, chunk.embedding),
          sourceFileName,
        },
      }));
    } catch (error) {
      if (error instanceof DimensionMismatchError) {
        this.logger.error(error.message);
        this.store.markRequiresReembedding();
      }
      throw error;
    }

    return scored
      .sort(
        (a, b) =>
          b.match.similarityScore - a.match.similarityScore ||
          a.order - b.order,
      )
      .slice(0, topK)
      .map(({ match }) => match);
  }
}
