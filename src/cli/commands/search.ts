/**
 * @fileoverview Search command - one-shot hybrid retrieval without the model
 *
 * Prints the nearest places for a query and the graph neighbours of the top
 * match. Useful for checking what the chat prompt would be built from.
 */

import type { WayfarerConfig } from '../../config/index.js';
import { graphIdOf } from '../../rag/orchestrator.js';
import { EmbeddingCache } from '../../retrieval/embedding_cache.js';
import { GraphExpander } from '../../retrieval/graph_expander.js';
import { VectorRetriever } from '../../retrieval/vector_retriever.js';
import type { RelationFact, SimilarityMatch } from '../../types.js';
import { createClientFactory, type ClientFactory } from '../clients.js';
import { createError } from '../errors.js';
import { formatDuration } from '../progress.js';

export const SEARCH_TOP_K = 3;
export const RELATED_LIMIT = 10;
const PREVIEW_LENGTH = 100;

export interface SearchCommandOptions {
  config: WayfarerConfig;
  query: string;
  topK?: number;
  clients?: ClientFactory;
}

export interface SearchOutcome {
  matches: SimilarityMatch[];
  related: RelationFact[];
}

export async function searchCommand(options: SearchCommandOptions): Promise<SearchOutcome> {
  const query = options.query.trim();
  if (!query) {
    throw createError('INVALID_ARGUMENT', 'search requires a query, e.g. wayfarer search "quiet beaches"');
  }
  const clients = options.clients ?? createClientFactory(options.config);
  const retriever = new VectorRetriever(new EmbeddingCache(clients.embedder()), clients.vectorIndex());
  const started = Date.now();

  console.log(`Searching for: ${query}`);
  console.log('='.repeat(50));

  const matches = await retriever.search(query, options.topK ?? SEARCH_TOP_K);
  console.log('SIMILAR PLACES:');
  matches.forEach((match, i) => {
    console.log(`${i + 1}. ${match.metadata.name} (${match.metadata.type})`);
    console.log(`   Location: ${match.metadata.city || 'N/A'}`);
    console.log(`   Similarity: ${match.score.toFixed(3)}`);
    console.log();
  });

  let related: RelationFact[] = [];
  const top = matches[0];
  if (top) {
    const graph = clients.graph();
    await graph.open();
    try {
      related = await new GraphExpander(graph).expandOne(graphIdOf(top), RELATED_LIMIT);
    } finally {
      await graph.close();
    }
  }

  if (related.length > 0) {
    console.log('RELATED PLACES:');
    related.forEach((fact, i) => {
      console.log(`${i + 1}. ${fact.targetName} (${fact.relation})`);
      if (fact.targetDescription) {
        console.log(`   ${fact.targetDescription.slice(0, PREVIEW_LENGTH)}...`);
      }
      console.log();
    });
  }

  console.log(`Search completed in ${formatDuration(Date.now() - started)}`);
  return { matches, related };
}
