import type { RelationFact, SimilarityMatch } from '../types.js';

const MAX_CITY_EXAMPLES = 3;

/**
 * One-line digest of the evidence gathered for a query, e.g.
 * `Found 3 places across 1 cities (Da Nang) including Attraction with 2 related connections`.
 *
 * Distinct values keep first-seen order. Empty city/type fields are ignored.
 */
export function summarizeEvidence(matches: readonly SimilarityMatch[], facts: readonly RelationFact[]): string {
  const cities = new Set<string>();
  const types = new Set<string>();

  for (const match of matches) {
    if (match.metadata.city) cities.add(match.metadata.city);
    if (match.metadata.type) types.add(match.metadata.type);
  }

  let summary = `Found ${matches.length} places`;
  if (cities.size > 0) {
    const examples = [...cities].slice(0, MAX_CITY_EXAMPLES).join(', ');
    summary += ` across ${cities.size} cities (${examples})`;
  }
  if (types.size > 0) {
    summary += ` including ${[...types].join(', ')}`;
  }
  if (facts.length > 0) {
    summary += ` with ${facts.length} related connections`;
  }
  return summary;
}
