import { describe, expect, it } from 'vitest';
import { DuplicateIdError, ValidationError } from '../src/errors';
import { cosineDistance, VectorStore } from '../src/store';

const seeded = () => {
  const store = new VectorStore();
  store.add('docs', {
    ids: ['a', 'b', 'c'],
    documents: ['doc a', 'doc b', 'doc c'],
    metadatas: [{ n: 1 }, { n: 2 }, { n: 3 }],
    vectors: [
      [1, 0],
      [0, 1],
      [1, 1],
    ],
  });
  return store;
};

describe('cosineDistance', () => {
  it('is 0 for parallel and 1 for orthogonal vectors', () => {
    expect(cosineDistance([2, 0], [5, 0])).toBe(0);
    expect(cosineDistance([1, 0], [0, 3])).toBe(1);
  });

  it('treats a zero vector as unrelated', () => {
    expect(cosineDistance([0, 0], [1, 0])).toBe(1);
  });
});

describe('VectorStore', () => {
  it('ranks by ascending cosine distance', () => {
    const r = seeded().query('docs', [1, 0], 3);
    expect(r.ids).toEqual(['a', 'c', 'b']);
    expect(r.documents).toEqual(['doc a', 'doc c', 'doc b']);
    expect(r.metadatas).toEqual([{ n: 1 }, { n: 3 }, { n: 2 }]);
    expect(r.distances[0]).toBe(0);
    expect(r.distances[1]).toBeCloseTo(1 - Math.SQRT1_2, 10);
    expect(r.distances[2]).toBe(1);
  });

  it('returns at least one hit and at most the collection size', () => {
    const store = seeded();
    expect(store.query('docs', [1, 0], 0).ids).toEqual(['a']);
    expect(store.query('docs', [1, 0], 10).ids).toHaveLength(3);
  });

  it('returns empty results for an empty collection', () => {
    const store = new VectorStore();
    expect(store.query('nothing', [1, 0], 3)).toEqual({ ids: [], documents: [], metadatas: [], distances: [] });
    expect(store.listCollections()).toEqual(['nothing']);
  });

  it('rejects ids that already exist without writing', () => {
    const store = seeded();
    const add = () =>
      store.add('docs', {
        ids: ['d', 'a'],
        documents: ['doc d', 'doc a again'],
        metadatas: [{}, {}],
        vectors: [
          [1, 0],
          [1, 0],
        ],
      });
    expect(add).toThrow(DuplicateIdError);
    expect(add).toThrow('ids already exist in collection "docs": a');
    expect(store.count('docs')).toBe(3);
  });

  it('rejects ids repeated within one batch', () => {
    const store = new VectorStore();
    expect(() =>
      store.add('docs', { ids: ['x', 'x'], documents: ['1', '2'], metadatas: [{}, {}], vectors: [[1], [1]] }),
    ).toThrow(DuplicateIdError);
    expect(store.count('docs')).toBe(0);
  });

  it('upserts by replacing existing records', () => {
    const store = seeded();
    store.upsert('docs', { ids: ['b'], documents: ['doc b v2'], metadatas: [{ n: 20 }], vectors: [[1, 0]] });
    expect(store.count('docs')).toBe(3);
    const r = store.query('docs', [1, 0], 2);
    expect(r.ids).toEqual(['a', 'b']);
    expect(r.documents[1]).toBe('doc b v2');
    expect(r.metadatas[1]).toEqual({ n: 20 });
  });

  it('validates lengths and dimensions', () => {
    const store = seeded();
    expect(() => store.upsert('docs', { ids: ['z'], documents: [], metadatas: [{}], vectors: [[1, 0]] })).toThrow(
      ValidationError,
    );
    expect(() => store.upsert('docs', { ids: ['z'], documents: ['z'], metadatas: [{}], vectors: [[1, 0, 0]] })).toThrow(
      'vector for "z" has 3 dimensions, expected 2',
    );
    expect(() => store.query('docs', [1, 0, 0], 1)).toThrow(ValidationError);
  });

  it('lists collections in creation order', () => {
    const store = new VectorStore();
    expect(store.ensureCollection('policy')).toBe('policy');
    store.ensureCollection('manual');
    store.ensureCollection('policy');
    expect(store.listCollections()).toEqual(['policy', 'manual']);
    expect(store.count('manual')).toBe(0);
  });
});
