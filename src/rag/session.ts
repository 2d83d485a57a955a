/**
 * @fileoverview Chat Session
 *
 * Owns the per-session components and the read-evaluate loop. The graph
 * connection is acquired once before the first prompt and released on every
 * exit path: sentinel input, end of input, interrupt, or a thrown error.
 * One query is fully answered before the next line is read.
 */

import type { ExecutionMode } from '../config/index.js';
import type { EmbeddingProvider, LLMProvider } from '../providers/types.js';
import { EmbeddingCache } from '../retrieval/embedding_cache.js';
import { GraphExpander } from '../retrieval/graph_expander.js';
import { VectorRetriever } from '../retrieval/vector_retriever.js';
import type { GraphStore, VectorIndex } from '../storage/types.js';
import { logError } from '../telemetry/logger.js';
import { getErrorMessage } from '../utils/errors.js';
import { AnswerSynthesizer, answerText, type AnswerSynthesizerOptions } from './answer_synthesizer.js';
import { ChatOrchestrator, type ChatOrchestratorOptions, type ChatTurn } from './orchestrator.js';

export const INPUT_PROMPT = 'Enter your travel question: ';
export const EXIT_COMMANDS: ReadonlySet<string> = new Set(['quit', 'exit', 'q']);
const RULE = '='.repeat(50);

export function isExitCommand(input: string): boolean {
  return EXIT_COMMANDS.has(input.trim().toLowerCase());
}

/** Where user input comes from. `null` means the input stream has ended. */
export interface LineSource {
  next(prompt: string): Promise<string | null>;
  /** Unblock a pending `next`, which then resolves to `null` */
  cancel?(): void;
}

export interface ChatOutput {
  writeLine(text: string): void;
}

export interface SessionDependencies {
  embedder: EmbeddingProvider;
  vectorIndex: VectorIndex;
  graph: GraphStore;
  llm: LLMProvider;
}

export interface SessionOptions extends ChatOrchestratorOptions {
  synthesis?: AnswerSynthesizerOptions;
}

export type SessionEnd = 'sentinel' | 'eof' | 'interrupt';

export interface SessionReport {
  /** Non-blank, non-sentinel inputs processed */
  turns: number;
  /** Turns whose retrieval failed */
  failures: number;
  /** Turns answered with a degraded (apology) answer */
  degraded: number;
  cacheSize: number;
  endedBy: SessionEnd;
}

export class ChatSession {
  readonly cache: EmbeddingCache;
  readonly orchestrator: ChatOrchestrator;
  private readonly graph: GraphStore;
  private interrupted = false;
  private activeSource: LineSource | null = null;

  constructor(dependencies: SessionDependencies, options: SessionOptions = {}) {
    this.graph = dependencies.graph;
    this.cache = new EmbeddingCache(dependencies.embedder);
    this.orchestrator = new ChatOrchestrator(
      new VectorRetriever(this.cache, dependencies.vectorIndex),
      new GraphExpander(dependencies.graph),
      new AnswerSynthesizer(dependencies.llm, options.synthesis),
      options,
    );
  }

  get mode(): ExecutionMode {
    return this.orchestrator.mode;
  }

  /**
   * Request the loop to stop. A turn already in flight runs to completion;
   * a pending read is cancelled.
   */
  interrupt(): void {
    this.interrupted = true;
    this.activeSource?.cancel?.();
  }

  async run(lines: LineSource, out: ChatOutput): Promise<SessionReport> {
    const report: SessionReport = { turns: 0, failures: 0, degraded: 0, cacheSize: 0, endedBy: 'eof' };
    this.activeSource = lines;
    await this.graph.open();
    try {
      this.printBanner(out);
      while (!this.interrupted) {
        const raw = await lines.next(INPUT_PROMPT);
        if (this.interrupted) break;
        if (raw === null) {
          report.endedBy = 'eof';
          break;
        }

        const query = raw.trim();
        if (isExitCommand(query)) {
          out.writeLine(`Thanks for using Wayfarer! Cached embeddings: ${this.cache.size}`);
          report.endedBy = 'sentinel';
          break;
        }
        if (query.length === 0) continue;

        report.turns += 1;
        const turn = await this.answer(query, out);
        if (!turn) {
          report.failures += 1;
        } else if (!turn.answer.ok) {
          report.degraded += 1;
        }
      }

      if (this.interrupted) {
        report.endedBy = 'interrupt';
        out.writeLine('');
        out.writeLine('Goodbye!');
      }
    } finally {
      this.activeSource = null;
      await this.graph.close();
    }

    report.cacheSize = this.cache.size;
    return report;
  }

  /**
   * One turn. Retrieval failures are reported and swallowed here so the
   * next prompt is still shown; returns `null` for a failed turn.
   */
  private async answer(query: string, out: ChatOutput): Promise<ChatTurn | null> {
    out.writeLine('');
    out.writeLine(`Searching for: ${query}`);

    let turn: ChatTurn;
    try {
      turn = await this.orchestrator.ask(query);
    } catch (error) {
      logError('query failed', { query, error: getErrorMessage(error) });
      out.writeLine(`Error: ${getErrorMessage(error)}`);
      out.writeLine('');
      return null;
    }

    out.writeLine(`SUMMARY: ${turn.summary}`);
    out.writeLine('');
    out.writeLine('AI Response:');
    out.writeLine('-'.repeat(30));
    out.writeLine(answerText(turn.answer));
    out.writeLine('');
    out.writeLine(`Cache size: ${this.cache.size} embeddings`);
    out.writeLine('');
    out.writeLine(RULE);
    out.writeLine('');
    return turn;
  }

  private printBanner(out: ChatOutput): void {
    out.writeLine(this.mode === 'concurrent' ? 'Wayfarer Travel Chat (Async Mode)' : 'Wayfarer Travel Chat');
    out.writeLine(RULE);
    out.writeLine('Ask me anything about Vietnam travel!');
    out.writeLine("Type 'quit' to exit");
    out.writeLine('');
  }
}
