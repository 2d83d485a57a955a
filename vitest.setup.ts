/**
 * Centralized Vitest Setup for Wayfarer
 *
 * The logger is silenced unless the caller already chose a level, and
 * provider credentials are cleared so nothing can reach a live endpoint.
 */

import { afterEach, vi } from 'vitest';

process.env.WAYFARER_LOG_LEVEL = process.env.WAYFARER_LOG_LEVEL ?? 'silent';
for (const variable of ['OPENROUTER_API_KEY', 'OPENAI_API_KEY', 'PINECONE_API_KEY', 'NEO4J_PASSWORD']) {
  delete process.env[variable];
}

afterEach(() => {
  vi.restoreAllMocks();
});
