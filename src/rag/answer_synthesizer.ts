/**
 * @fileoverview Answer Synthesizer
 *
 * The one boundary where a failure is converted rather than propagated: a
 * completion error becomes a degraded answer carrying an apology and the
 * underlying detail, so the chat loop keeps going. Callers tell the two
 * apart by the Result variant, never by inspecting the text.
 */

import { Err, Ok, type Result } from '../core/result.js';
import type { LLMProvider } from '../providers/types.js';
import { logDebug, logWarning } from '../telemetry/logger.js';
import { getErrorMessage, toError } from '../utils/errors.js';
import type { ComposedPrompt } from './context_composer.js';

export const ANSWER_MAX_TOKENS = 600;
export const ANSWER_TEMPERATURE = 0.2;
export const APOLOGY_PREFIX = 'Sorry, I encountered an error generating the response';

export interface SynthesisFailure {
  /** User-facing apology including the error detail */
  message: string;
  cause: Error;
}

export type SynthesisResult = Result<string, SynthesisFailure>;

export interface AnswerSynthesizerOptions {
  model?: string;
  maxTokens?: number;
  temperature?: number;
}

export class AnswerSynthesizer {
  private readonly maxTokens: number;
  private readonly temperature: number;

  constructor(
    private readonly llm: LLMProvider,
    private readonly options: AnswerSynthesizerOptions = {},
  ) {
    this.maxTokens = options.maxTokens ?? ANSWER_MAX_TOKENS;
    this.temperature = options.temperature ?? ANSWER_TEMPERATURE;
  }

  async synthesize(prompt: ComposedPrompt): Promise<SynthesisResult> {
    try {
      const response = await this.llm.complete({
        model: this.options.model ?? this.llm.defaultModel,
        systemPrompt: prompt.system,
        messages: [{ role: 'user', content: prompt.user }],
        maxTokens: this.maxTokens,
        temperature: this.temperature,
      });
      logDebug('answer synthesized', {
        model: response.model,
        outputTokens: response.usage.outputTokens,
        latencyMs: response.latencyMs,
      });
      return Ok(response.content);
    } catch (error) {
      const cause = toError(error);
      logWarning('answer synthesis failed', { error: cause.message });
      return Err({ message: `${APOLOGY_PREFIX}: ${getErrorMessage(cause)}`, cause });
    }
  }
}

/** Display text for either outcome. */
export function answerText(result: SynthesisResult): string {
  return result.ok ? result.value : result.error.message;
}
