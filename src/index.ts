/**
 * @fileoverview Wayfarer - hybrid retrieval travel assistant
 *
 * Answers Vietnam travel questions from two knowledge sources: a vector
 * index of places for semantic similarity, and a property graph of how
 * those places connect.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { ChatSession, loadConfig } from 'wayfarer';
 *
 * const session = new ChatSession({ embedder, vectorIndex, graph, llm });
 * const turn = await session.orchestrator.ask('quiet beaches near Hoi An');
 * console.log(turn.summary);
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// DATA MODEL
// ============================================================================

export * from './types.js';

// ============================================================================
// CONFIGURATION
// ============================================================================

export {
  loadConfig,
  parseConfig,
  applyEnvironment,
  requireSetting,
  redactConfig,
  WayfarerConfigSchema,
  DEFAULT_CONFIG_FILE,
  type WayfarerConfig,
  type ExecutionMode,
  type LoadConfigOptions,
} from './config/index.js';

// ============================================================================
// ERRORS & RESULTS
// ============================================================================

export * from './core/errors.js';
export * from './core/result.js';

// ============================================================================
// PROVIDERS
// ============================================================================

export type * from './providers/types.js';
export { OpenAICompatibleLLM, OpenAICompatibleEmbedder, toProviderError } from './providers/openai_compatible.js';

// ============================================================================
// STORES
// ============================================================================

export type * from './storage/types.js';
export { PineconeVectorIndex, parseMatchMetadata } from './storage/pinecone_index.js';
export { Neo4jGraphStore } from './storage/neo4j_graph.js';
export { MemoryVectorIndex, cosineSimilarity, type MemoryVectorRecord } from './storage/memory_vector_index.js';
export { MemoryGraphStore, type MemoryEntity, type MemoryRelationship } from './storage/memory_graph_store.js';

// ============================================================================
// RETRIEVAL
// ============================================================================

export { EmbeddingCache } from './retrieval/embedding_cache.js';
export { VectorRetriever, DEFAULT_TOP_K } from './retrieval/vector_retriever.js';
export { GraphExpander, DEFAULT_PER_ID_LIMIT, toRelationFact } from './retrieval/graph_expander.js';
export { summarizeEvidence } from './retrieval/evidence_summary.js';

// ============================================================================
// CHAT
// ============================================================================

export {
  composePrompt,
  formatMatchLine,
  formatFactLine,
  TRAVEL_SYSTEM_PROMPT,
  MAX_MATCH_LINES,
  MAX_FACT_LINES,
  type ComposedPrompt,
} from './rag/context_composer.js';
export {
  AnswerSynthesizer,
  answerText,
  APOLOGY_PREFIX,
  type AnswerSynthesizerOptions,
  type SynthesisResult,
  type SynthesisFailure,
} from './rag/answer_synthesizer.js';
export {
  ChatOrchestrator,
  seedIds,
  graphIdOf,
  type ChatOrchestratorOptions,
  type ChatTurn,
} from './rag/orchestrator.js';
export { surfaceFor, inlineSurface, deferredSurface, type ExecutionSurface } from './rag/execution.js';
export {
  ChatSession,
  isExitCommand,
  EXIT_COMMANDS,
  type LineSource,
  type ChatOutput,
  type SessionDependencies,
  type SessionOptions,
  type SessionReport,
  type SessionEnd,
} from './rag/session.js';

// ============================================================================
// VERSION CONSTANTS
// ============================================================================

export const WAYFARER_VERSION = {
  major: 1,
  minor: 0,
  patch: 0,
  string: '1.0.0',
} as const;
