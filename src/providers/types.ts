/**
 * @fileoverview Provider Types for Wayfarer
 *
 * Two opaque collaborators sit behind these interfaces:
 * - an embedding model (text -> fixed-length vector)
 * - a chat completion endpoint (system + user message -> text)
 *
 * Any OpenAI-compatible endpoint (OpenRouter, OpenAI, a local gateway)
 * satisfies both through the adapters in `openai_compatible.ts`; tests supply
 * in-process stubs.
 *
 * @packageDocumentation
 */

// ============================================================================
// BASE PROVIDER TYPES
// ============================================================================

/**
 * Base provider interface
 */
export interface Provider {
  readonly name: string;
  readonly type: 'llm' | 'embedding';
}

// ============================================================================
// LLM PROVIDER
// ============================================================================

export type MessageRole = 'system' | 'user' | 'assistant';

export interface LLMMessage {
  role: MessageRole;
  content: string;
}

/**
 * LLM request parameters
 */
export interface LLMRequest {
  model?: string;
  messages: LLMMessage[];
  /** Sent ahead of `messages` as a system message */
  systemPrompt?: string;
  maxTokens?: number;
  temperature?: number;
}

/**
 * Token usage statistics
 */
export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

/**
 * LLM response
 */
export interface LLMResponse {
  id: string;
  model: string;
  content: string;
  stopReason: 'end_turn' | 'max_tokens' | 'stop_sequence';
  usage: TokenUsage;
  latencyMs: number;
}

/**
 * LLM provider interface
 */
export interface LLMProvider extends Provider {
  readonly type: 'llm';
  readonly defaultModel: string;

  /** Complete a chat request */
  complete(request: LLMRequest): Promise<LLMResponse>;
}

// ============================================================================
// EMBEDDING PROVIDER
// ============================================================================

/**
 * Embedding provider interface
 */
export interface EmbeddingProvider extends Provider {
  readonly type: 'embedding';
  readonly defaultModel: string;
  readonly dimensions: number;

  /** Get embedding for single text */
  embedOne(text: string, model?: string): Promise<number[]>;
}
