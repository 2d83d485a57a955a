/**
 * @fileoverview Core domain types for Wayfarer
 *
 * Entities live in two external stores: their embeddings in a vector index
 * and their relationships in a labeled-property graph. Everything here is
 * produced fresh per query; nothing is persisted by this package.
 *
 * @packageDocumentation
 */

// ============================================================================
// ENTITY TAGS
// ============================================================================

/** Entity type tags present in the travel knowledge base. */
export const ENTITY_TYPES = ['City', 'Attraction', 'Hotel', 'Activity'] as const;

export type EntityType = (typeof ENTITY_TYPES)[number];

export function isEntityType(value: string): value is EntityType {
  return ENTITY_TYPES.some((type) => type === value);
}

/**
 * Relation tags are upper snake case (`LOCATED_IN`, `NEAR`). Anything else is
 * refused before it can be spliced into a graph pattern.
 */
export const RELATION_TYPE_PATTERN = /^[A-Z][A-Z0-9_]*$/;

export function isRelationType(value: string): boolean {
  return RELATION_TYPE_PATTERN.test(value);
}

// ============================================================================
// ENTITIES
// ============================================================================

export interface Entity {
  id: string;
  type: EntityType;
  name: string;
  description: string;
  city?: string;
  tags?: string[];
}

// ============================================================================
// RETRIEVAL RESULTS
// ============================================================================

/** Metadata snapshot stored beside each vector. */
export interface MatchMetadata {
  id: string;
  name: string;
  /** Usually an {@link EntityType}; kept open because the index owns the data. */
  type: string;
  city?: string;
  tags?: string[];
}

export interface SimilarityMatch {
  /** Vector record id */
  id: string;
  /** Cosine similarity as reported by the index */
  score: number;
  metadata: MatchMetadata;
}

/**
 * One outgoing relationship of a seed entity. The same target appears once
 * per seed that links to it.
 */
export interface RelationFact {
  source: string;
  relation: string;
  targetId: string;
  targetName: string;
  /** Truncated to {@link DESCRIPTION_BUDGET}; empty when the node has none. */
  targetDescription: string;
}

/** Maximum characters of a target description carried into a fact. */
export const DESCRIPTION_BUDGET = 200;

export interface EvidenceBundle {
  matches: SimilarityMatch[];
  facts: RelationFact[];
}
