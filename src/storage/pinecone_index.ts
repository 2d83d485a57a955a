/**
 * @fileoverview Pinecone-backed vector index
 *
 * Metadata written by the upload job is `{ id, type, name, city, tags }`.
 * It is validated on the way out; a record whose metadata cannot be read is
 * still returned, keyed by its vector id, so one bad row never hides the
 * rest of the result page.
 */

import { Pinecone } from '@pinecone-database/pinecone';
import { z } from 'zod';
import { StoreError } from '../core/errors.js';
import { logWarning } from '../telemetry/logger.js';
import type { MatchMetadata } from '../types.js';
import { toError } from '../utils/errors.js';
import type { VectorIndex, VectorIndexStats, VectorQuery, VectorQueryMatch } from './types.js';

export interface PineconeIndexOptions {
  apiKey: string;
  indexName: string;
  namespace?: string;
}

const MatchMetadataSchema = z.object({
  id: z.string().optional(),
  name: z.string().default(''),
  type: z.string().default(''),
  city: z.string().optional(),
  tags: z.array(z.string()).optional(),
});

export function parseMatchMetadata(vectorId: string, raw: unknown): MatchMetadata | undefined {
  if (raw === undefined || raw === null) return undefined;
  const parsed = MatchMetadataSchema.safeParse(raw);
  if (!parsed.success) {
    logWarning('vector metadata failed validation', {
      vectorId,
      issues: parsed.error.issues.map((issue) => issue.path.join('.')),
    });
    return undefined;
  }
  const { id, name, type, city, tags } = parsed.data;
  return {
    id: id && id.length > 0 ? id : vectorId,
    name,
    type,
    ...(city ? { city } : {}),
    ...(tags ? { tags } : {}),
  };
}

export class PineconeVectorIndex implements VectorIndex {
  private readonly client: Pinecone;

  constructor(private readonly options: PineconeIndexOptions) {
    this.client = new Pinecone({ apiKey: options.apiKey });
  }

  private target() {
    const index = this.client.index(this.options.indexName);
    return this.options.namespace ? index.namespace(this.options.namespace) : index;
  }

  async query(request: VectorQuery): Promise<VectorQueryMatch[]> {
    try {
      const response = await this.target().query({
        vector: request.vector,
        topK: request.topK,
        includeMetadata: request.includeMetadata,
      });
      return response.matches.map((match) => ({
        id: match.id,
        score: match.score ?? 0,
        metadata: parseMatchMetadata(match.id, match.metadata),
      }));
    } catch (error) {
      const cause = toError(error);
      throw new StoreError('vector', 'query', true, cause.message, cause);
    }
  }

  async describe(): Promise<VectorIndexStats> {
    try {
      const stats = await this.client.index(this.options.indexName).describeIndexStats();
      const namespaces: Record<string, number> = {};
      for (const [name, summary] of Object.entries(stats.namespaces ?? {})) {
        namespaces[name] = summary.recordCount;
      }
      return {
        dimension: stats.dimension ?? null,
        totalRecordCount: stats.totalRecordCount ?? 0,
        namespaces,
      };
    } catch (error) {
      const cause = toError(error);
      throw new StoreError('vector', 'describe', true, cause.message, cause);
    }
  }
}
