import { describe, it, expect } from 'vitest';
import type { RelationFact, SimilarityMatch } from '../../types.js';
import { summarizeEvidence } from '../evidence_summary.js';

const match = (id: string, type: string, city?: string): SimilarityMatch => ({
  id,
  score: 0.5,
  metadata: { id, name: id, type, ...(city ? { city } : {}) },
});

const fact = (source: string, targetId: string): RelationFact => ({
  source,
  relation: 'NEAR',
  targetId,
  targetName: targetId,
  targetDescription: '',
});

describe('summarizeEvidence', () => {
  it('reports zero places when nothing was found', () => {
    expect(summarizeEvidence([], [])).toBe('Found 0 places');
  });

  it('describes a single-city result with connections', () => {
    const matches = [
      match('my_khe', 'Attraction', 'Da Nang'),
      match('non_nuoc', 'Attraction', 'Da Nang'),
      match('son_tra', 'Attraction', 'Da Nang'),
    ];

    expect(summarizeEvidence(matches, [fact('my_khe', 'da_nang'), fact('son_tra', 'my_khe')])).toBe(
      'Found 3 places across 1 cities (Da Nang) including Attraction with 2 related connections',
    );
  });

  it('lists at most three example cities but counts all of them', () => {
    const matches = [
      match('a', 'City', 'Hanoi'),
      match('b', 'Hotel', 'Hue'),
      match('c', 'City', 'Hoi An'),
      match('d', 'Activity', 'Sapa'),
    ];

    expect(summarizeEvidence(matches, [])).toBe(
      'Found 4 places across 4 cities (Hanoi, Hue, Hoi An) including City, Hotel, Activity',
    );
  });

  it('skips empty city and type fields', () => {
    expect(summarizeEvidence([match('x', '')], [])).toBe('Found 1 places');
  });
});
