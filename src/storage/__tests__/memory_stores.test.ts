import { describe, it, expect } from 'vitest';
import { StoreError, ValidationError } from '../../core/errors.js';
import { MemoryGraphStore } from '../memory_graph_store.js';
import { MemoryVectorIndex, cosineSimilarity } from '../memory_vector_index.js';
import { createDaNangStores, DA_NANG_VECTORS } from '../../__tests__/helpers/index.js';

describe('cosineSimilarity', () => {
  it('is 1 for parallel vectors and 0 for orthogonal ones', () => {
    expect(cosineSimilarity([1, 2, 3], [2, 4, 6])).toBeCloseTo(1, 10);
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
  });

  it('is 0 for zero vectors and mismatched lengths', () => {
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
    expect(cosineSimilarity([1, 0], [1, 0, 0])).toBe(0);
  });
});

describe('MemoryVectorIndex', () => {
  it('omits metadata unless asked for it', async () => {
    const index = new MemoryVectorIndex(DA_NANG_VECTORS);

    const [match] = await index.query({ vector: [1, 0, 0], topK: 1, includeMetadata: false });

    expect(match).toEqual({ id: 'attr_my_khe', score: 1, metadata: undefined });
  });

  it('skips records of another dimension', async () => {
    const index = new MemoryVectorIndex([...DA_NANG_VECTORS, { id: 'wide', values: [1, 0, 0, 0] }]);

    const matches = await index.query({ vector: [1, 0, 0], topK: 10, includeMetadata: true });

    expect(matches.map((match) => match.id)).not.toContain('wide');
    expect(matches).toHaveLength(3);
  });

  it('replaces a record on upsert and describes its contents', async () => {
    const index = new MemoryVectorIndex(DA_NANG_VECTORS);
    index.upsert({ id: 'attr_non_nuoc', values: [0, 0, 1] });
    index.upsert({ id: 'hotel_hoi_an', values: [0, 1, 0] });

    expect(index.size()).toBe(4);
    await expect(index.describe()).resolves.toEqual({
      dimension: 3,
      totalRecordCount: 4,
      namespaces: { '': 4 },
    });
  });

  it('reports no single dimension for mixed records', async () => {
    const index = new MemoryVectorIndex([
      { id: 'a', values: [1, 0] },
      { id: 'b', values: [1, 0, 0] },
    ]);

    await expect(index.describe()).resolves.toMatchObject({ dimension: null });
  });
});

describe('MemoryGraphStore', () => {
  it('refuses lookups before open', async () => {
    const { graph } = createDaNangStores();

    await expect(graph.outgoing('attr_my_khe', 3)).rejects.toBeInstanceOf(StoreError);
  });

  it('returns outgoing rows up to the limit', async () => {
    const graph = new MemoryGraphStore(
      [
        { id: 'hue', type: 'City', name: 'Hue', description: 'Imperial capital.' },
        { id: 'citadel', type: 'Attraction', name: 'Imperial Citadel', description: '' },
        { id: 'pagoda', type: 'Attraction', name: 'Thien Mu Pagoda', description: 'Seven-storey pagoda.' },
      ],
      [
        { source: 'hue', relation: 'HAS_ATTRACTION', target: 'citadel' },
        { source: 'hue', relation: 'HAS_ATTRACTION', target: 'pagoda' },
      ],
    );
    await graph.open();

    await expect(graph.outgoing('hue', 1)).resolves.toEqual([
      { targetId: 'citadel', targetName: 'Imperial Citadel', targetDescription: null, relation: 'HAS_ATTRACTION' },
    ]);
    await expect(graph.outgoing('hue', 5)).resolves.toHaveLength(2);
  });

  it('rejects relation tags that are not upper snake case', () => {
    expect(() => new MemoryGraphStore([], [{ source: 'a', relation: 'near by', target: 'b' }])).toThrow(
      ValidationError,
    );
  });

  it('rejects entity type tags outside the known set', () => {
    expect(
      () => new MemoryGraphStore([{ id: 'x', type: 'Restaurant', name: 'Pho stall', description: '' }]),
    ).toThrow('Validation failed for type: expected City, Attraction, Hotel or Activity, got Restaurant');
  });

  it('counts nodes per label and relationships per type', async () => {
    const { graph } = createDaNangStores();

    await expect(graph.stats()).resolves.toEqual({
      totalNodes: 4,
      totalRelationships: 2,
      labels: [
        { labels: ['Attraction', 'Entity'], count: 3 },
        { labels: ['City', 'Entity'], count: 1 },
      ],
      relationTypes: [
        { type: 'LOCATED_IN', count: 1 },
        { type: 'NEAR', count: 1 },
      ],
    });
  });

  it('treats a second close as a no-op', async () => {
    const { graph } = createDaNangStores();
    await graph.open();
    await graph.close();
    await graph.close();

    expect(graph.closeCount).toBe(1);
  });
});
