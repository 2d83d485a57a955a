/**
 * @fileoverview Chat Orchestrator
 *
 * Per query: vector search -> first N match ids -> graph expansion ->
 * summary -> prompt -> answer. Graph expansion depends on the search
 * output, so the steps always run in this order; the execution surface only
 * decides whether the search is awaited in line or from a fresh macrotask.
 *
 * Retrieval failures propagate to the caller. Synthesis failures come back
 * as a degraded {@link SynthesisResult}.
 */

import type { ExecutionMode } from '../config/index.js';
import type { GraphExpander } from '../retrieval/graph_expander.js';
import { DEFAULT_PER_ID_LIMIT } from '../retrieval/graph_expander.js';
import { summarizeEvidence } from '../retrieval/evidence_summary.js';
import { DEFAULT_TOP_K, type VectorRetriever } from '../retrieval/vector_retriever.js';
import { logDebug } from '../telemetry/logger.js';
import type { EvidenceBundle, RelationFact, SimilarityMatch } from '../types.js';
import type { AnswerSynthesizer, SynthesisResult } from './answer_synthesizer.js';
import { composePrompt, type ComposedPrompt } from './context_composer.js';
import { surfaceFor, type ExecutionSurface } from './execution.js';

export const DEFAULT_EXPANSION_SEEDS = 3;

export interface ChatOrchestratorOptions {
  mode?: ExecutionMode;
  topK?: number;
  /** How many of the top matches seed the graph expansion */
  expansionSeeds?: number;
  perIdLimit?: number;
}

export interface ChatTurn {
  query: string;
  evidence: EvidenceBundle;
  summary: string;
  prompt: ComposedPrompt;
  answer: SynthesisResult;
}

/**
 * Graph id of a match. The upload job stores the entity id in the metadata;
 * the vector id is the fallback.
 */
export function graphIdOf(match: SimilarityMatch): string {
  return match.metadata.id || match.id;
}

export function seedIds(matches: readonly SimilarityMatch[], count: number): string[] {
  return matches.slice(0, count).map(graphIdOf);
}

export class ChatOrchestrator {
  readonly mode: ExecutionMode;
  private readonly surface: ExecutionSurface;
  private readonly topK: number;
  private readonly expansionSeeds: number;
  private readonly perIdLimit: number;

  constructor(
    private readonly retriever: VectorRetriever,
    private readonly expander: GraphExpander,
    private readonly synthesizer: AnswerSynthesizer,
    options: ChatOrchestratorOptions = {},
  ) {
    this.mode = options.mode ?? 'sequential';
    this.surface = surfaceFor(this.mode);
    this.topK = options.topK ?? DEFAULT_TOP_K;
    this.expansionSeeds = options.expansionSeeds ?? DEFAULT_EXPANSION_SEEDS;
    this.perIdLimit = options.perIdLimit ?? DEFAULT_PER_ID_LIMIT;
  }

  async gatherEvidence(query: string): Promise<EvidenceBundle> {
    const started = Date.now();
    const matches = await this.surface(() => this.retriever.search(query, this.topK));
    const searchedAt = Date.now();

    let facts: RelationFact[] = [];
    if (matches.length > 0) {
      facts = await this.expander.expand(seedIds(matches, this.expansionSeeds), this.perIdLimit);
    }

    logDebug('evidence gathered', {
      mode: this.mode,
      matches: matches.length,
      facts: facts.length,
      searchMs: searchedAt - started,
      expandMs: Date.now() - searchedAt,
    });
    return { matches, facts };
  }

  async ask(query: string): Promise<ChatTurn> {
    const evidence = await this.gatherEvidence(query);
    const summary = summarizeEvidence(evidence.matches, evidence.facts);
    logDebug('evidence summary', { summary });

    const prompt = composePrompt(query, evidence.matches, evidence.facts);
    const answer = await this.synthesizer.synthesize(prompt);
    return { query, evidence, summary, prompt, answer };
  }
}
