/**
 * @fileoverview Chat command - the interactive travel assistant
 */

import type { WayfarerConfig } from '../../config/index.js';
import { ChatSession, type ChatOutput, type SessionReport } from '../../rag/session.js';
import { logDebug } from '../../telemetry/logger.js';
import { createClientFactory, type ClientFactory } from '../clients.js';
import { ReadlineLineSource } from '../line_source.js';

export interface ChatCommandOptions {
  config: WayfarerConfig;
  /** Overrides `session.mode` with the concurrent surface */
  async?: boolean;
  clients?: ClientFactory;
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
}

export async function chatCommand(options: ChatCommandOptions): Promise<SessionReport> {
  const { config } = options;
  const clients = options.clients ?? createClientFactory(config);
  const input = options.input ?? process.stdin;
  const output = options.output ?? process.stdout;

  const session = new ChatSession(
    {
      embedder: clients.embedder(),
      vectorIndex: clients.vectorIndex(),
      graph: clients.graph(),
      llm: clients.llm(),
    },
    {
      mode: options.async ? 'concurrent' : config.session.mode,
      topK: config.retrieval.topK,
      expansionSeeds: config.retrieval.expansionSeeds,
      perIdLimit: config.retrieval.perIdLimit,
      synthesis: {
        model: config.llm.model,
        maxTokens: config.llm.maxTokens,
        temperature: config.llm.temperature,
      },
    },
  );

  const out: ChatOutput = { writeLine: (text) => output.write(`${text}\n`) };
  const lines = new ReadlineLineSource(input, output);
  const onInterrupt = (): void => session.interrupt();
  lines.onInterrupt(onInterrupt);
  process.on('SIGINT', onInterrupt);

  try {
    const report = await session.run(lines, out);
    logDebug('chat session ended', { ...report });
    return report;
  } finally {
    process.off('SIGINT', onInterrupt);
    lines.close();
  }
}
