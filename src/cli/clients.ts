/**
 * @fileoverview Builds the external clients from configuration.
 *
 * Each client is created on demand, so `wayfarer check` never asks for
 * model credentials and `wayfarer search` never asks for the LLM key.
 */

import { requireSetting, type WayfarerConfig } from '../config/index.js';
import { OpenAICompatibleEmbedder, OpenAICompatibleLLM } from '../providers/openai_compatible.js';
import type { EmbeddingProvider, LLMProvider } from '../providers/types.js';
import { Neo4jGraphStore } from '../storage/neo4j_graph.js';
import { PineconeVectorIndex } from '../storage/pinecone_index.js';
import type { GraphStore, VectorIndex } from '../storage/types.js';

export interface ClientFactory {
  embedder(): EmbeddingProvider;
  vectorIndex(): VectorIndex;
  graph(): GraphStore;
  llm(): LLMProvider;
}

export function createClientFactory(config: WayfarerConfig): ClientFactory {
  return {
    embedder: () =>
      new OpenAICompatibleEmbedder({
        apiKey: requireSetting(config.embedding.apiKey, 'embedding.apiKey', 'OPENAI_API_KEY'),
        baseURL: config.embedding.baseUrl,
        model: config.embedding.model,
        dimensions: config.embedding.dimensions,
      }),
    vectorIndex: () =>
      new PineconeVectorIndex({
        apiKey: requireSetting(config.vectorIndex.apiKey, 'vectorIndex.apiKey', 'PINECONE_API_KEY'),
        indexName: config.vectorIndex.indexName,
        namespace: config.vectorIndex.namespace,
      }),
    graph: () =>
      new Neo4jGraphStore({
        uri: config.graph.uri,
        user: config.graph.user,
        password: requireSetting(config.graph.password, 'graph.password', 'NEO4J_PASSWORD'),
        database: config.graph.database,
      }),
    llm: () =>
      new OpenAICompatibleLLM({
        apiKey: requireSetting(config.llm.apiKey, 'llm.apiKey', 'OPENROUTER_API_KEY'),
        baseURL: config.llm.baseUrl,
        timeoutMs: config.llm.timeoutMs,
        model: config.llm.model,
      }),
  };
}
