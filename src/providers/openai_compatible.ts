/**
 * @fileoverview OpenAI-compatible providers
 *
 * Chat completions and embeddings over the `openai` SDK pointed at any
 * compatible base URL (OpenRouter by default). SDK retries are disabled:
 * every external call is attempted once per logical step.
 */

import OpenAI, { APIConnectionError, APIError } from 'openai';
import { ProviderError, type ProviderKind } from '../core/errors.js';
import { getErrorMessage } from '../utils/errors.js';
import type { EmbeddingProvider, LLMMessage, LLMProvider, LLMRequest, LLMResponse } from './types.js';

export interface OpenAICompatibleOptions {
  apiKey: string;
  baseURL: string;
  /** Request timeout (ms) */
  timeoutMs?: number;
}

export interface OpenAICompatibleLLMOptions extends OpenAICompatibleOptions {
  model: string;
}

export interface OpenAICompatibleEmbeddingOptions extends OpenAICompatibleOptions {
  model: string;
  dimensions: number;
}

const DEFAULT_TIMEOUT_MS = 60_000;

function createClient(options: OpenAICompatibleOptions): OpenAI {
  return new OpenAI({
    apiKey: options.apiKey,
    baseURL: options.baseURL,
    timeout: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    maxRetries: 0,
    // OpenRouter attributes traffic by these; other gateways ignore them.
    defaultHeaders: {
      'HTTP-Referer': 'http://localhost:3000',
      'X-Title': 'Wayfarer',
    },
  });
}

/**
 * Map an SDK failure onto the provider error taxonomy.
 */
export function toProviderError(provider: ProviderKind, error: unknown): ProviderError {
  if (error instanceof ProviderError) return error;
  const message = getErrorMessage(error);
  if (error instanceof APIConnectionError) {
    return new ProviderError(provider, 'network_error', true, message);
  }
  if (error instanceof APIError) {
    if (error.status === 401 || error.status === 403) {
      return new ProviderError(provider, 'auth_failed', false, message);
    }
    if (error.status === 429) {
      return new ProviderError(provider, 'rate_limit', true, message);
    }
  }
  return new ProviderError(provider, 'unavailable', false, message);
}

async function callProvider<T>(provider: ProviderKind, call: () => Promise<T>): Promise<T> {
  try {
    return await call();
  } catch (error) {
    throw toProviderError(provider, error);
  }
}

function toChatMessage(message: LLMMessage) {
  switch (message.role) {
    case 'system':
      return { role: 'system' as const, content: message.content };
    case 'user':
      return { role: 'user' as const, content: message.content };
    case 'assistant':
      return { role: 'assistant' as const, content: message.content };
  }
}

export class OpenAICompatibleLLM implements LLMProvider {
  readonly name = 'openai-compatible';
  readonly type = 'llm' as const;
  readonly defaultModel: string;
  private readonly client: OpenAI;

  constructor(options: OpenAICompatibleLLMOptions) {
    this.defaultModel = options.model;
    this.client = createClient(options);
  }

  async complete(request: LLMRequest): Promise<LLMResponse> {
    const started = Date.now();
    const system = request.systemPrompt
      ? [{ role: 'system' as const, content: request.systemPrompt }]
      : [];
    const completion = await callProvider('llm', () =>
      this.client.chat.completions.create({
        model: request.model ?? this.defaultModel,
        messages: [
          ...system,
          ...request.messages.map(toChatMessage),
        ],
        max_tokens: request.maxTokens,
        temperature: request.temperature,
      }),
    );

    const choice = completion.choices[0];
    const content = choice?.message.content ?? '';
    if (content.trim().length === 0) {
      throw new ProviderError('llm', 'invalid_response', false, 'completion returned no text');
    }

    return {
      id: completion.id,
      model: completion.model,
      content,
      stopReason: choice?.finish_reason === 'length' ? 'max_tokens' : 'end_turn',
      usage: {
        inputTokens: completion.usage?.prompt_tokens ?? 0,
        outputTokens: completion.usage?.completion_tokens ?? 0,
        totalTokens: completion.usage?.total_tokens ?? 0,
      },
      latencyMs: Date.now() - started,
    };
  }
}

export class OpenAICompatibleEmbedder implements EmbeddingProvider {
  readonly name = 'openai-compatible';
  readonly type = 'embedding' as const;
  readonly defaultModel: string;
  readonly dimensions: number;
  private readonly client: OpenAI;

  constructor(options: OpenAICompatibleEmbeddingOptions) {
    this.defaultModel = options.model;
    this.dimensions = options.dimensions;
    this.client = createClient(options);
  }

  async embedOne(text: string, model?: string): Promise<number[]> {
    const response = await callProvider('embedding', () =>
      this.client.embeddings.create({
        model: model ?? this.defaultModel,
        input: text,
        dimensions: this.dimensions,
      }),
    );

    const embedding = response.data[0]?.embedding;
    if (!embedding || embedding.length === 0) {
      throw new ProviderError('embedding', 'invalid_response', false, 'embedding response was empty');
    }
    if (embedding.length !== this.dimensions) {
      throw new ProviderError(
        'embedding',
        'invalid_response',
        false,
        `expected ${this.dimensions} dimensions, got ${embedding.length}`,
      );
    }
    return embedding;
  }
}
