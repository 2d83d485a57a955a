import { describe, it, expect } from 'vitest';
import type { RelationFact, SimilarityMatch } from '../../types.js';
import {
  MAX_FACT_LINES,
  MAX_MATCH_LINES,
  TRAVEL_SYSTEM_PROMPT,
  composePrompt,
  formatFactLine,
  formatMatchLine,
} from '../context_composer.js';

const match = (n: number, city?: string): SimilarityMatch => ({
  id: `m${n}`,
  score: 1 - n / 100,
  metadata: { id: `m${n}`, name: `Place ${n}`, type: 'Attraction', ...(city ? { city } : {}) },
});

const fact = (n: number): RelationFact => ({
  source: `m${n}`,
  relation: 'NEAR',
  targetId: `t${n}`,
  targetName: `Target ${n}`,
  targetDescription: `Description ${n}`,
});

describe('formatMatchLine', () => {
  it('renders name, type, city and a three-decimal similarity', () => {
    expect(formatMatchLine(match(0, 'Hue'))).toBe('- Place 0 (Attraction) in Hue [similarity: 1.000]');
  });

  it('falls back to Vietnam when the city is missing', () => {
    expect(formatMatchLine({ ...match(1), score: 0.87654 })).toBe(
      '- Place 1 (Attraction) in Vietnam [similarity: 0.877]',
    );
  });
});

describe('formatFactLine', () => {
  it('renders target, relation and source', () => {
    expect(formatFactLine(fact(3))).toBe('- Target 3 (NEAR from m3): Description 3');
  });
});

describe('composePrompt', () => {
  it('caps matches at five and facts at ten', () => {
    const matches = Array.from({ length: 20 }, (_, i) => match(i, 'Hanoi'));
    const facts = Array.from({ length: 50 }, (_, i) => fact(i));

    const prompt = composePrompt('food tour', matches, facts);

    expect(prompt.matchLines).toHaveLength(MAX_MATCH_LINES);
    expect(prompt.factLines).toHaveLength(MAX_FACT_LINES);
    expect(prompt.matchLines[4]).toBe('- Place 4 (Attraction) in Hanoi [similarity: 0.960]');
    expect(prompt.factLines[9]).toBe('- Target 9 (NEAR from m9): Description 9');
    expect(prompt.user).not.toContain('Place 5 ');
    expect(prompt.user).not.toContain('Target 10 ');
  });

  it('lays out the user message in fixed sections', () => {
    const prompt = composePrompt('quiet beaches', [match(0, 'Da Nang')], [fact(0)]);

    expect(prompt.system).toBe(TRAVEL_SYSTEM_PROMPT);
    expect(prompt.user.split('\n')).toEqual([
      'User query: quiet beaches',
      '',
      'Top semantic matches:',
      '- Place 0 (Attraction) in Da Nang [similarity: 1.000]',
      '',
      'Related places and connections:',
      '- Target 0 (NEAR from m0): Description 0',
      '',
      'Based on the above context, provide a helpful response with specific recommendations.',
    ]);
  });

  it('keeps the section headers when there is no evidence', () => {
    const prompt = composePrompt('anything', [], []);

    expect(prompt.matchLines).toEqual([]);
    expect(prompt.factLines).toEqual([]);
    expect(prompt.user.split('\n')).toEqual([
      'User query: anything',
      '',
      'Top semantic matches:',
      '',
      'Related places and connections:',
      '',
      'Based on the above context, provide a helpful response with specific recommendations.',
    ]);
  });

  it('tells the model to analyse, match, connect and recommend', () => {
    expect(TRAVEL_SYSTEM_PROMPT).toContain('1. ANALYZE:');
    expect(TRAVEL_SYSTEM_PROMPT).toContain('4. RECOMMEND:');
  });
});
