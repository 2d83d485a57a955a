/**
 * @fileoverview Vector Retriever
 *
 * Turns a query into its embedding and asks the vector index for the
 * nearest entities. The index order is trusted (descending similarity);
 * nothing is re-ranked here.
 */

import { StoreError, ValidationError } from '../core/errors.js';
import type { VectorIndex, VectorQueryMatch } from '../storage/types.js';
import { logDebug } from '../telemetry/logger.js';
import type { SimilarityMatch } from '../types.js';
import { toError } from '../utils/errors.js';
import type { EmbeddingCache } from './embedding_cache.js';

export const DEFAULT_TOP_K = 5;

export class VectorRetriever {
  constructor(
    private readonly cache: EmbeddingCache,
    private readonly index: VectorIndex,
  ) {}

  /**
   * Top-k similarity search. Embedding and index failures propagate; the
   * caller decides the fallback.
   */
  async search(query: string, topK: number = DEFAULT_TOP_K): Promise<SimilarityMatch[]> {
    if (!Number.isInteger(topK) || topK < 1) {
      throw new ValidationError('topK', 'integer >= 1', String(topK));
    }

    const vector = await this.cache.get(query);

    let rows: VectorQueryMatch[];
    try {
      rows = await this.index.query({ vector, topK, includeMetadata: true });
    } catch (error) {
      if (error instanceof StoreError) throw error;
      const cause = toError(error);
      throw new StoreError('vector', 'query', true, cause.message, cause);
    }

    const matches = rows.slice(0, topK).map(toSimilarityMatch);
    logDebug('vector search complete', { topK, returned: matches.length });
    return matches;
  }
}

/**
 * Records stored without metadata still carry their id; name and type are
 * left empty rather than invented.
 */
function toSimilarityMatch(row: VectorQueryMatch): SimilarityMatch {
  return {
    id: row.id,
    score: row.score,
    metadata: row.metadata ?? { id: row.id, name: '', type: '' },
  };
}
