/**
 * @fileoverview Check command - vector index and graph database health
 *
 * Each store is checked independently; a failure in one is reported next to
 * the other's statistics instead of aborting the command.
 */

import { redactConfig, type WayfarerConfig } from '../../config/index.js';
import { Err, safeAsync, type Result } from '../../core/result.js';
import type { GraphStats, VectorIndexStats, VectorQueryMatch } from '../../storage/types.js';
import { createClientFactory, type ClientFactory } from '../clients.js';
import { EXIT_CODES } from '../errors.js';
import { printKeyValue, printTable } from '../progress.js';

/** Component value of the probe vector sent to the index */
const SAMPLE_COMPONENT = 0.1;
const SAMPLE_TOP_K = 10;
const SAMPLE_SHOWN = 5;

export interface CheckCommandOptions {
  config: WayfarerConfig;
  json?: boolean;
  clients?: ClientFactory;
}

export interface VectorHealth {
  indexName: string;
  stats: VectorIndexStats;
  sample: VectorQueryMatch[];
}

export interface HealthReport {
  vector: Result<VectorHealth, string>;
  graph: Result<GraphStats, string>;
}

export async function checkCommand(options: CheckCommandOptions): Promise<HealthReport> {
  const { config } = options;
  const clients = options.clients ?? createClientFactory(config);

  const report: HealthReport = {
    vector: await checkVectorIndex(clients, config),
    graph: await checkGraph(clients),
  };

  if (options.json) {
    console.log(JSON.stringify(report, null, 2));
  } else {
    printVectorHealth(report.vector);
    console.log();
    printGraphHealth(report.graph);
    console.log();
    console.log('Configuration:');
    printKeyValue(redactConfig(config));
  }

  if (!report.vector.ok || !report.graph.ok) {
    process.exitCode = EXIT_CODES.STORE_UNAVAILABLE;
  }
  return report;
}

async function checkVectorIndex(clients: ClientFactory, config: WayfarerConfig): Promise<Result<VectorHealth, string>> {
  const outcome = await safeAsync(async () => {
    const index = clients.vectorIndex();
    const stats = await index.describe();
    const dimension = stats.dimension ?? config.embedding.dimensions;
    const sample = await index.query({
      vector: new Array<number>(dimension).fill(SAMPLE_COMPONENT),
      topK: SAMPLE_TOP_K,
      includeMetadata: true,
    });
    return { indexName: config.vectorIndex.indexName, stats, sample };
  });
  return outcome.ok ? outcome : Err(outcome.error.message);
}

async function checkGraph(clients: ClientFactory): Promise<Result<GraphStats, string>> {
  const outcome = await safeAsync(async () => {
    const graph = clients.graph();
    await graph.open();
    try {
      return await graph.stats();
    } finally {
      await graph.close();
    }
  });
  return outcome.ok ? outcome : Err(outcome.error.message);
}

function printVectorHealth(result: Result<VectorHealth, string>): void {
  console.log('=== VECTOR INDEX STATUS ===');
  if (!result.ok) {
    console.log(`  Error: ${result.error}`);
    return;
  }

  const { indexName, stats, sample } = result.value;
  printKeyValue([
    { key: 'Index Name', value: indexName },
    { key: 'Total Vectors', value: stats.totalRecordCount },
    { key: 'Dimension', value: stats.dimension },
  ]);
  for (const [namespace, count] of Object.entries(stats.namespaces)) {
    console.log(`  Namespace '${namespace}': ${count} vectors`);
  }

  console.log();
  console.log(`Sample query returned ${sample.length} results`);
  if (sample.length === 0) {
    console.log('No results found - index might be empty!');
    return;
  }
  sample.slice(0, SAMPLE_SHOWN).forEach((match, i) => {
    console.log(`${i + 1}. ID: ${match.id}`);
    console.log(`   Name: ${match.metadata?.name || 'N/A'}`);
    console.log(`   Type: ${match.metadata?.type || 'N/A'}`);
    console.log(`   City: ${match.metadata?.city || 'N/A'}`);
    console.log(`   Score: ${match.score.toFixed(4)}`);
  });
}

function printGraphHealth(result: Result<GraphStats, string>): void {
  console.log('=== GRAPH STATUS ===');
  if (!result.ok) {
    console.log(`  Error: ${result.error}`);
    return;
  }

  const stats = result.value;
  printKeyValue([
    { key: 'Total Nodes', value: stats.totalNodes },
    { key: 'Total Relationships', value: stats.totalRelationships },
  ]);
  console.log();
  console.log('Node counts by label:');
  printTable(
    ['Labels', 'Count'],
    stats.labels.map((entry) => [entry.labels.join(':'), String(entry.count)]),
  );
  console.log();
  console.log('Relationship counts:');
  printTable(
    ['Type', 'Count'],
    stats.relationTypes.map((entry) => [entry.type, String(entry.count)]),
  );
}
