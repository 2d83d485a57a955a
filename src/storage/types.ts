/**
 * @fileoverview Store seams
 *
 * The vector index and the property graph are external services. These
 * interfaces are the only surface the retrieval layer depends on; the
 * Pinecone and Neo4j adapters implement them for production and the
 * in-memory stores implement them for tests.
 */

import type { MatchMetadata } from '../types.js';

// ============================================================================
// VECTOR INDEX
// ============================================================================

export interface VectorQuery {
  vector: number[];
  topK: number;
  includeMetadata: boolean;
}

export interface VectorQueryMatch {
  id: string;
  score: number;
  metadata?: MatchMetadata;
}

export interface VectorIndexStats {
  dimension: number | null;
  totalRecordCount: number;
  namespaces: Record<string, number>;
}

export interface VectorIndex {
  /** Nearest neighbours in descending similarity order */
  query(request: VectorQuery): Promise<VectorQueryMatch[]>;
  describe(): Promise<VectorIndexStats>;
}

// ============================================================================
// GRAPH STORE
// ============================================================================

/** One outgoing relationship row as returned by the graph. */
export interface GraphNeighborRow {
  targetId: string;
  targetName: string;
  targetDescription: string | null;
  relation: string;
}

export interface GraphStats {
  totalNodes: number;
  totalRelationships: number;
  labels: Array<{ labels: string[]; count: number }>;
  relationTypes: Array<{ type: string; count: number }>;
}

export interface GraphStore {
  /** Acquire the long-lived connection; called once per session */
  open(): Promise<void>;
  /** Outgoing relationships of one node, at most `limit` rows */
  outgoing(entityId: string, limit: number): Promise<GraphNeighborRow[]>;
  stats(): Promise<GraphStats>;
  /** Release the connection; safe to call more than once */
  close(): Promise<void>;
}
