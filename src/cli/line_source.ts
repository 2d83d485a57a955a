/**
 * @fileoverview Terminal input for the chat session.
 *
 * Lines are read through the readline async iterator, which buffers input
 * that arrives while a turn is still being answered (piped input).
 */

import { createInterface, type Interface } from 'node:readline/promises';
import type { LineSource } from '../rag/session.js';

const CANCELLED: IteratorResult<string> = { done: true, value: undefined };

export class ReadlineLineSource implements LineSource {
  private readonly rl: Interface;
  private readonly lines: AsyncIterator<string>;
  private readonly cancelled: Promise<IteratorResult<string>>;
  private resolveCancelled: (result: IteratorResult<string>) => void = () => {};

  constructor(input: NodeJS.ReadableStream, output: NodeJS.WritableStream) {
    this.rl = createInterface({ input, output });
    this.lines = this.rl[Symbol.asyncIterator]();
    this.cancelled = new Promise((resolve) => {
      this.resolveCancelled = resolve;
    });
  }

  /** Ctrl+C while readline owns the terminal */
  onInterrupt(handler: () => void): void {
    this.rl.on('SIGINT', handler);
  }

  async next(prompt: string): Promise<string | null> {
    this.rl.setPrompt(prompt);
    this.rl.prompt();
    const result = await Promise.race([this.lines.next(), this.cancelled]);
    return result.done ? null : result.value;
  }

  cancel(): void {
    this.resolveCancelled(CANCELLED);
  }

  close(): void {
    this.rl.close();
  }
}
