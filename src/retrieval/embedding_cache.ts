/**
 * @fileoverview Session-scoped embedding memo
 *
 * Keys are the raw query text: no trimming, no case folding. Two queries
 * that differ only in whitespace are embedded separately. Entries live as
 * long as the owning session and are never evicted.
 */

import type { EmbeddingProvider } from '../providers/types.js';
import { logDebug } from '../telemetry/logger.js';

export class EmbeddingCache {
  private readonly vectors = new Map<string, number[]>();
  private readonly inflight = new Map<string, Promise<number[]>>();
  private computeCount = 0;

  constructor(private readonly provider: EmbeddingProvider) {}

  async get(text: string): Promise<number[]> {
    const cached = this.vectors.get(text);
    if (cached) return cached;

    // A second lookup of the same text while the first is still in flight
    // shares the pending call.
    const pending = this.inflight.get(text);
    if (pending) return pending;

    const computation = this.compute(text);
    this.inflight.set(text, computation);
    try {
      return await computation;
    } finally {
      this.inflight.delete(text);
    }
  }

  has(text: string): boolean {
    return this.vectors.has(text);
  }

  /** Number of cached embeddings */
  get size(): number {
    return this.vectors.size;
  }

  /** Number of embedding-model calls made so far */
  get computations(): number {
    return this.computeCount;
  }

  private async compute(text: string): Promise<number[]> {
    this.computeCount += 1;
    const vector = await this.provider.embedOne(text);
    this.vectors.set(text, vector);
    logDebug('embedding cache miss', { length: text.length, cached: this.vectors.size });
    return vector;
  }
}
