/**
 * @fileoverview Context Composer
 *
 * Renders the evidence bundle into the prompt pair sent to the model. The
 * composer owns the final truncation: however much the retrievers return,
 * at most {@link MAX_MATCH_LINES} matches and {@link MAX_FACT_LINES} facts
 * reach the prompt.
 */

import type { RelationFact, SimilarityMatch } from '../types.js';

export const MAX_MATCH_LINES = 5;
export const MAX_FACT_LINES = 10;
export const DEFAULT_CITY = 'Vietnam';

export const TRAVEL_SYSTEM_PROMPT = [
  'You are a helpful Vietnam travel assistant with access to semantic search and knowledge graph data.',
  'Follow this chain of thought:',
  '1. ANALYZE: What type of travel experience is the user seeking?',
  '2. MATCH: Which locations from the search results best fit their needs?',
  '3. CONNECT: What related places or activities enhance the experience?',
  '4. RECOMMEND: Provide specific, actionable suggestions with reasoning.',
  'Be specific, cite actual places, and explain why each recommendation fits their query.',
].join('\n');

export interface ComposedPrompt {
  system: string;
  user: string;
  matchLines: string[];
  factLines: string[];
}

export function formatMatchLine(match: SimilarityMatch): string {
  const { name, type, city } = match.metadata;
  return `- ${name} (${type}) in ${city || DEFAULT_CITY} [similarity: ${match.score.toFixed(3)}]`;
}

export function formatFactLine(fact: RelationFact): string {
  return `- ${fact.targetName} (${fact.relation} from ${fact.source}): ${fact.targetDescription}`;
}

export function composePrompt(
  query: string,
  matches: readonly SimilarityMatch[],
  facts: readonly RelationFact[],
): ComposedPrompt {
  const matchLines = matches.slice(0, MAX_MATCH_LINES).map(formatMatchLine);
  const factLines = facts.slice(0, MAX_FACT_LINES).map(formatFactLine);

  const user = [
    `User query: ${query}`,
    '',
    'Top semantic matches:',
    ...matchLines,
    '',
    'Related places and connections:',
    ...factLines,
    '',
    'Based on the above context, provide a helpful response with specific recommendations.',
  ].join('\n');

  return { system: TRAVEL_SYSTEM_PROMPT, user, matchLines, factLines };
}
