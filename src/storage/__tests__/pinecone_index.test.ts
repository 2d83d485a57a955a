import { describe, it, expect, vi, beforeEach } from 'vitest';
import { StoreError } from '../../core/errors.js';
import { PineconeVectorIndex, parseMatchMetadata } from '../pinecone_index.js';

const pinecone = vi.hoisted(() => ({
  configs: new Array<unknown>(),
  index: vi.fn((_name: string): unknown => undefined),
  namespace: vi.fn((_name: string): unknown => undefined),
  query: vi.fn(async (_request: unknown): Promise<unknown> => ({ matches: [] })),
  describeIndexStats: vi.fn(async (): Promise<unknown> => ({})),
}));

vi.mock('@pinecone-database/pinecone', () => ({
  Pinecone: class {
    constructor(config: unknown) {
      pinecone.configs.push(config);
    }

    index(name: string): unknown {
      return pinecone.index(name);
    }
  },
}));

describe('parseMatchMetadata', () => {
  it('keeps the stored fields', () => {
    expect(
      parseMatchMetadata('vec-1', { id: 'city_hue', name: 'Hue', type: 'City', city: 'Hue', tags: ['heritage'] }),
    ).toEqual({ id: 'city_hue', name: 'Hue', type: 'City', city: 'Hue', tags: ['heritage'] });
  });

  it('falls back to the vector id and empty name and type', () => {
    expect(parseMatchMetadata('vec-2', {})).toEqual({ id: 'vec-2', name: '', type: '' });
  });

  it('returns undefined for missing or malformed metadata', () => {
    expect(parseMatchMetadata('vec-3', undefined)).toBeUndefined();
    expect(parseMatchMetadata('vec-4', { name: 42 })).toBeUndefined();
  });
});

describe('PineconeVectorIndex', () => {
  const handle = {
    query: pinecone.query,
    describeIndexStats: pinecone.describeIndexStats,
    namespace: pinecone.namespace,
  };

  beforeEach(() => {
    pinecone.configs.length = 0;
    pinecone.index.mockReturnValue(handle);
    pinecone.namespace.mockReturnValue(handle);
  });

  it('queries the named index and validates metadata', async () => {
    pinecone.query.mockResolvedValue({
      matches: [
        { id: 'attr_my_khe', score: 0.91, metadata: { id: 'attr_my_khe', name: 'My Khe Beach', type: 'Attraction' } },
        { id: 'attr_bare' },
      ],
    });
    const index = new PineconeVectorIndex({ apiKey: 'test-secret', indexName: 'vietnam-travel' });

    const matches = await index.query({ vector: [0.1, 0.2], topK: 2, includeMetadata: true });

    expect(pinecone.configs).toEqual([{ apiKey: 'test-secret' }]);
    expect(pinecone.index).toHaveBeenCalledWith('vietnam-travel');
    expect(pinecone.namespace).not.toHaveBeenCalled();
    expect(pinecone.query).toHaveBeenCalledWith({ vector: [0.1, 0.2], topK: 2, includeMetadata: true });
    expect(matches).toEqual([
      { id: 'attr_my_khe', score: 0.91, metadata: { id: 'attr_my_khe', name: 'My Khe Beach', type: 'Attraction' } },
      { id: 'attr_bare', score: 0, metadata: undefined },
    ]);
  });

  it('scopes queries to the configured namespace', async () => {
    const index = new PineconeVectorIndex({ apiKey: 'test-secret', indexName: 'vietnam-travel', namespace: 'places' });

    await index.query({ vector: [1], topK: 1, includeMetadata: true });

    expect(pinecone.namespace).toHaveBeenCalledWith('places');
  });

  it('wraps query failures in a vector StoreError', async () => {
    pinecone.query.mockRejectedValue(new Error('index not found'));
    const index = new PineconeVectorIndex({ apiKey: 'test-secret', indexName: 'missing' });

    const error = await index.query({ vector: [1], topK: 1, includeMetadata: true }).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(StoreError);
    expect(error).toMatchObject({ store: 'vector', operation: 'query' });
  });

  it('describes dimension, record count and namespaces', async () => {
    pinecone.describeIndexStats.mockResolvedValue({
      dimension: 384,
      totalRecordCount: 120,
      namespaces: { '': { recordCount: 100 }, places: { recordCount: 20 } },
    });
    const index = new PineconeVectorIndex({ apiKey: 'test-secret', indexName: 'vietnam-travel' });

    await expect(index.describe()).resolves.toEqual({
      dimension: 384,
      totalRecordCount: 120,
      namespaces: { '': 100, places: 20 },
    });
  });

  it('wraps describe failures in a vector StoreError', async () => {
    pinecone.describeIndexStats.mockRejectedValue(new Error('unauthorized'));
    const index = new PineconeVectorIndex({ apiKey: 'test-secret', indexName: 'vietnam-travel' });

    await expect(index.describe()).rejects.toThrow('Vector index describe failed: unauthorized');
  });
});
