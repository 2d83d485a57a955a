import type { MatchMetadata } from '../types.js';
import type { VectorIndex, VectorIndexStats, VectorQuery, VectorQueryMatch } from './types.js';

export interface MemoryVectorRecord {
  id: string;
  values: number[];
  metadata?: MatchMetadata;
}

/**
 * Brute-force cosine index held in process memory.
 *
 * Stand-in for the hosted index in tests and local experiments. Records of
 * a different dimension than the query are skipped; ties keep insertion
 * order.
 */
export class MemoryVectorIndex implements VectorIndex {
  private records: MemoryVectorRecord[] = [];
  private dimensions = new Set<number>();
  /** Number of `query` calls served */
  queryCount = 0;

  constructor(records: MemoryVectorRecord[] = []) {
    this.load(records);
  }

  load(records: MemoryVectorRecord[]): void {
    this.records = [...records];
    this.dimensions = new Set(records.map((record) => record.values.length));
  }

  upsert(record: MemoryVectorRecord): void {
    const existing = this.records.findIndex((item) => item.id === record.id);
    if (existing >= 0) {
      this.records[existing] = record;
    } else {
      this.records.push(record);
    }
    this.dimensions.add(record.values.length);
  }

  size(): number {
    return this.records.length;
  }

  async query(request: VectorQuery): Promise<VectorQueryMatch[]> {
    this.queryCount += 1;
    const scored: VectorQueryMatch[] = [];
    for (const record of this.records) {
      if (record.values.length !== request.vector.length) continue;
      scored.push({
        id: record.id,
        score: cosineSimilarity(request.vector, record.values),
        metadata: request.includeMetadata ? record.metadata : undefined,
      });
    }
    scored.sort((a, b) => b.score - a.score);
    return scored.slice(0, request.topK);
  }

  async describe(): Promise<VectorIndexStats> {
    const [dimension] = this.dimensions;
    return {
      dimension: this.dimensions.size === 1 && dimension !== undefined ? dimension : null,
      totalRecordCount: this.records.length,
      namespaces: { '': this.records.length },
    };
  }
}

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) return 0;
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i += 1) {
    const av = a[i] ?? 0;
    const bv = b[i] ?? 0;
    dot += av * bv;
    normA += av * av;
    normB += bv * bv;
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}
