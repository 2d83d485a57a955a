/**
 * @fileoverview In-process collaborators for chat tests
 *
 * A three-attraction Da Nang knowledge base, a fixed-vector embedder, a
 * scripted chat model and array-backed terminal I/O.
 */

import type { ClientFactory } from '../../cli/clients.js';
import type { EmbeddingProvider, LLMProvider, LLMRequest, LLMResponse } from '../../providers/types.js';
import type { ChatOutput, LineSource } from '../../rag/session.js';
import { MemoryGraphStore, type MemoryRelationship } from '../../storage/memory_graph_store.js';
import { MemoryVectorIndex, type MemoryVectorRecord } from '../../storage/memory_vector_index.js';
import type { Entity } from '../../types.js';

export const QUERY_VECTOR = [1, 0, 0];

export const DA_NANG_ENTITIES: Entity[] = [
  { id: 'city_da_nang', type: 'City', name: 'Da Nang', description: 'Coastal city in central Vietnam.' },
  {
    id: 'attr_my_khe',
    type: 'Attraction',
    name: 'My Khe Beach',
    description: 'Long sandy beach popular with surfers.',
    city: 'Da Nang',
  },
  {
    id: 'attr_non_nuoc',
    type: 'Attraction',
    name: 'Non Nuoc Beach',
    description: 'Quiet beach below the Marble Mountains.',
    city: 'Da Nang',
  },
  {
    id: 'attr_son_tra',
    type: 'Attraction',
    name: 'Son Tra Peninsula',
    description: 'Forested headland with hidden coves.',
    city: 'Da Nang',
  },
];

export const DA_NANG_RELATIONSHIPS: MemoryRelationship[] = [
  { source: 'attr_my_khe', relation: 'LOCATED_IN', target: 'city_da_nang' },
  { source: 'attr_son_tra', relation: 'NEAR', target: 'attr_my_khe' },
];

/** Scores against {@link QUERY_VECTOR}: 1.0, 0.8, 0.6 */
export const DA_NANG_VECTORS: MemoryVectorRecord[] = [
  {
    id: 'attr_my_khe',
    values: [1, 0, 0],
    metadata: { id: 'attr_my_khe', name: 'My Khe Beach', type: 'Attraction', city: 'Da Nang' },
  },
  {
    id: 'attr_non_nuoc',
    values: [0.8, 0.6, 0],
    metadata: { id: 'attr_non_nuoc', name: 'Non Nuoc Beach', type: 'Attraction', city: 'Da Nang' },
  },
  {
    id: 'attr_son_tra',
    values: [0.6, 0.8, 0],
    metadata: { id: 'attr_son_tra', name: 'Son Tra Peninsula', type: 'Attraction', city: 'Da Nang' },
  },
];

export function createDaNangStores(): { index: MemoryVectorIndex; graph: MemoryGraphStore } {
  return {
    index: new MemoryVectorIndex(DA_NANG_VECTORS),
    graph: new MemoryGraphStore(DA_NANG_ENTITIES, DA_NANG_RELATIONSHIPS),
  };
}

export class StubEmbedder implements EmbeddingProvider {
  readonly name = 'stub-embedder';
  readonly type = 'embedding' as const;
  readonly defaultModel = 'stub-embedding';
  readonly dimensions = QUERY_VECTOR.length;
  readonly calls: string[] = [];

  constructor(private readonly vectorFor: (text: string) => number[] = () => [...QUERY_VECTOR]) {}

  async embedOne(text: string): Promise<number[]> {
    this.calls.push(text);
    return this.vectorFor(text);
  }
}

export class StubLLM implements LLMProvider {
  readonly name = 'stub-llm';
  readonly type = 'llm' as const;
  readonly defaultModel = 'stub-model';
  readonly requests: LLMRequest[] = [];

  constructor(private readonly reply: (request: LLMRequest) => string | Error = () => 'Surf at My Khe Beach.') {}

  async complete(request: LLMRequest): Promise<LLMResponse> {
    this.requests.push(request);
    const outcome = this.reply(request);
    if (outcome instanceof Error) throw outcome;
    return {
      id: `stub-${this.requests.length}`,
      model: request.model ?? this.defaultModel,
      content: outcome,
      stopReason: 'end_turn',
      usage: { inputTokens: 0, outputTokens: 0, totalTokens: 0 },
      latencyMs: 0,
    };
  }
}

/** Feeds the given lines, then reports end of input. */
export class ScriptedLines implements LineSource {
  readonly prompts: string[] = [];
  cancelled = false;
  private readonly pending: string[];

  constructor(
    lines: string[],
    private readonly beforeRead?: (readIndex: number) => void,
  ) {
    this.pending = [...lines];
  }

  async next(prompt: string): Promise<string | null> {
    this.beforeRead?.(this.prompts.length);
    this.prompts.push(prompt);
    return this.pending.shift() ?? null;
  }

  cancel(): void {
    this.cancelled = true;
  }
}

export class CapturedOutput implements ChatOutput {
  readonly lines: string[] = [];

  writeLine(text: string): void {
    this.lines.push(text);
  }

  linesStartingWith(prefix: string): string[] {
    return this.lines.filter((line) => line.startsWith(prefix));
  }
}

export interface StubClients extends ClientFactory {
  readonly stores: { index: MemoryVectorIndex; graph: MemoryGraphStore };
}

/** Client factory over the Da Nang stores; `overrides` replace single clients. */
export function createStubClients(overrides: Partial<ClientFactory> = {}): StubClients {
  const stores = createDaNangStores();
  const embedder = new StubEmbedder();
  const llm = new StubLLM();
  return {
    stores,
    embedder: () => embedder,
    vectorIndex: () => stores.index,
    graph: () => stores.graph,
    llm: () => llm,
    ...overrides,
  };
}
