/**
 * @fileoverview Wayfarer configuration
 *
 * Resolution order (later wins):
 * 1. schema defaults
 * 2. YAML file (`wayfarer.yaml` in the working directory, or an explicit path)
 * 3. environment variables
 *
 * Secrets are optional at load time so that commands which never touch a
 * given service (e.g. `search` never calls the LLM) still start; the factory
 * that builds a client calls {@link requireSetting} for what it needs.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import YAML from 'yaml';
import { z } from 'zod';
import { ConfigError } from '../core/errors.js';
import { getErrorMessage } from '../utils/errors.js';

export const DEFAULT_CONFIG_FILE = 'wayfarer.yaml';
export const OPENROUTER_BASE_URL = 'https://openrouter.ai/api/v1';
export const OPENAI_BASE_URL = 'https://api.openai.com/v1';

// ============================================================================
// SCHEMA
// ============================================================================

export const ExecutionModeSchema = z.enum(['sequential', 'concurrent']);

export const WayfarerConfigSchema = z.object({
  llm: z.object({
    apiKey: z.string().optional(),
    baseUrl: z.string().url().default(OPENROUTER_BASE_URL),
    model: z.string().min(1).default('openai/gpt-3.5-turbo'),
    maxTokens: z.coerce.number().int().positive().default(600),
    temperature: z.coerce.number().min(0).max(2).default(0.2),
    timeoutMs: z.coerce.number().int().positive().default(60_000),
  }).default({}),
  embedding: z.object({
    apiKey: z.string().optional(),
    baseUrl: z.string().url().default(OPENAI_BASE_URL),
    model: z.string().min(1).default('text-embedding-3-small'),
    dimensions: z.coerce.number().int().positive().default(384),
  }).default({}),
  vectorIndex: z.object({
    apiKey: z.string().optional(),
    indexName: z.string().min(1).default('vietnam-travel'),
    namespace: z.string().optional(),
  }).default({}),
  graph: z.object({
    uri: z.string().min(1).default('neo4j://127.0.0.1:7687'),
    user: z.string().min(1).default('neo4j'),
    password: z.string().optional(),
    database: z.string().optional(),
  }).default({}),
  retrieval: z.object({
    topK: z.coerce.number().int().min(1).default(5),
    expansionSeeds: z.coerce.number().int().min(1).default(3),
    perIdLimit: z.coerce.number().int().min(1).default(3),
  }).default({}),
  session: z.object({
    mode: ExecutionModeSchema.default('sequential'),
  }).default({}),
});

export type WayfarerConfig = z.infer<typeof WayfarerConfigSchema>;
export type ExecutionMode = z.infer<typeof ExecutionModeSchema>;

// ============================================================================
// ENVIRONMENT
// ============================================================================

/** Environment variable -> dotted config path */
export const ENV_BINDINGS: ReadonlyArray<readonly [string, string]> = [
  ['OPENROUTER_API_KEY', 'llm.apiKey'],
  ['OPENROUTER_BASE_URL', 'llm.baseUrl'],
  ['WAYFARER_LLM_MODEL', 'llm.model'],
  ['WAYFARER_LLM_MAX_TOKENS', 'llm.maxTokens'],
  ['WAYFARER_LLM_TEMPERATURE', 'llm.temperature'],
  ['OPENAI_API_KEY', 'embedding.apiKey'],
  ['WAYFARER_EMBED_BASE_URL', 'embedding.baseUrl'],
  ['WAYFARER_EMBED_MODEL', 'embedding.model'],
  ['PINECONE_VECTOR_DIM', 'embedding.dimensions'],
  ['PINECONE_API_KEY', 'vectorIndex.apiKey'],
  ['PINECONE_INDEX_NAME', 'vectorIndex.indexName'],
  ['PINECONE_NAMESPACE', 'vectorIndex.namespace'],
  ['NEO4J_URI', 'graph.uri'],
  ['NEO4J_USER', 'graph.user'],
  ['NEO4J_PASSWORD', 'graph.password'],
  ['NEO4J_DATABASE', 'graph.database'],
  ['WAYFARER_TOP_K', 'retrieval.topK'],
  ['WAYFARER_EXECUTION_MODE', 'session.mode'],
];

const SECRET_PATHS = new Set(['llm.apiKey', 'embedding.apiKey', 'vectorIndex.apiKey', 'graph.password']);

type RawConfig = Record<string, unknown>;

function isRecord(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function setPath(target: RawConfig, dotted: string, value: string): void {
  const keys = dotted.split('.');
  let cursor = target;
  for (const key of keys.slice(0, -1)) {
    const next = cursor[key];
    if (isRecord(next)) {
      cursor = next;
    } else {
      const created: RawConfig = {};
      cursor[key] = created;
      cursor = created;
    }
  }
  const leaf = keys[keys.length - 1];
  if (leaf !== undefined) cursor[leaf] = value;
}

export function applyEnvironment(raw: RawConfig, env: NodeJS.ProcessEnv): RawConfig {
  const merged: RawConfig = structuredClone(raw);
  for (const [variable, dotted] of ENV_BINDINGS) {
    const value = env[variable];
    if (value !== undefined && value.trim().length > 0) {
      setPath(merged, dotted, value.trim());
    }
  }
  return merged;
}

// ============================================================================
// LOADING
// ============================================================================

export interface LoadConfigOptions {
  /** Explicit config file; must exist when given */
  path?: string;
  /** Directory searched for {@link DEFAULT_CONFIG_FILE} */
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

async function readConfigFile(filePath: string, required: boolean): Promise<RawConfig> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (!required && error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return {};
    }
    throw new ConfigError([filePath], `cannot read config file: ${getErrorMessage(error)}`);
  }

  let parsed: unknown;
  try {
    parsed = YAML.parse(text);
  } catch (error) {
    throw new ConfigError([filePath], `invalid YAML: ${getErrorMessage(error)}`);
  }
  if (parsed === null || parsed === undefined) return {};
  if (!isRecord(parsed)) {
    throw new ConfigError([filePath], 'top level must be a mapping');
  }
  return parsed;
}

export function parseConfig(raw: RawConfig): WayfarerConfig {
  const result = WayfarerConfigSchema.safeParse(raw);
  if (!result.success) {
    const keys = result.error.issues.map((issue) => issue.path.join('.') || '(root)');
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(keys, details);
  }
  return result.data;
}

export async function loadConfig(options: LoadConfigOptions = {}): Promise<WayfarerConfig> {
  const cwd = options.cwd ?? process.cwd();
  const filePath = options.path ? path.resolve(cwd, options.path) : path.join(cwd, DEFAULT_CONFIG_FILE);
  const fromFile = await readConfigFile(filePath, options.path !== undefined);
  return parseConfig(applyEnvironment(fromFile, options.env ?? process.env));
}

// ============================================================================
// ACCESS HELPERS
// ============================================================================

/**
 * Return a setting a client cannot start without.
 */
export function requireSetting(value: string | undefined, dotted: string, variable: string): string {
  if (value === undefined || value.length === 0) {
    throw new ConfigError([dotted], `missing; set ${variable} or ${dotted} in ${DEFAULT_CONFIG_FILE}`);
  }
  return value;
}

/**
 * Flatten the config for display with secrets masked.
 */
export function redactConfig(config: WayfarerConfig): Array<{ key: string; value: string }> {
  const rows: Array<{ key: string; value: string }> = [];
  const walk = (node: unknown, prefix: string): void => {
    if (isRecord(node)) {
      for (const [key, child] of Object.entries(node)) {
        walk(child, prefix ? `${prefix}.${key}` : key);
      }
      return;
    }
    if (SECRET_PATHS.has(prefix)) {
      rows.push({ key: prefix, value: node ? '[SET]' : '[NOT SET]' });
      return;
    }
    rows.push({ key: prefix, value: node === undefined ? '[NOT SET]' : String(node) });
  };
  walk(config, '');
  for (const secret of SECRET_PATHS) {
    if (!rows.some((row) => row.key === secret)) {
      rows.push({ key: secret, value: '[NOT SET]' });
    }
  }
  return rows;
}
