import { describe, it, expect, vi } from 'vitest';
import { VectorStore, cosineSimilarity } from '../src/vector-store.js';
import { DimensionMismatchError, EncodingError, NotFoundError, RecommenderError } from '../src/errors.js';
import type { Encoder } from '../src/embedder.js';
import type { EmbeddingVector } from '../src/types.js';
import { VocabularyEncoder, item } from './helpers.js';

function mapEncoder(vectors: Record<string, EmbeddingVector>): Encoder {
  return {
    async encode(text) {
      const vector = vectors[text];
      if (!vector) throw new Error(`no vector for "${text}"`);
      return vector;
    },
  };
}

describe('cosineSimilarity', () => {
  it('returns 1 for identical vectors', () => {
    const v = [1, 0, 0];
    expect(cosineSimilarity(v, v)).toBeCloseTo(1, 5);
  });

  it('returns 1 for any non-zero vector against itself', () => {
    const v = [0.3, -2.5, 7, 0.01];
    expect(cosineSimilarity(v, v)).toBeCloseTo(1, 10);
  });

  it('returns 0 for orthogonal vectors', () => {
    expect(cosineSimilarity([1, 0], [0, 1])).toBeCloseTo(0, 5);
  });

  it('returns -1 for opposite vectors', () => {
    expect(cosineSimilarity([1, 0], [-1, 0])).toBeCloseTo(-1, 5);
  });

  it('is symmetric', () => {
    const a = [1, 2, 3];
    const b = [-4, 0.5, 2];
    expect(cosineSimilarity(a, b)).toBe(cosineSimilarity(b, a));
  });

  it('ignores magnitude', () => {
    expect(cosineSimilarity([1, 1], [10, 10])).toBeCloseTo(1, 10);
  });

  it('handles unit-length vectors correctly', () => {
    const sim = cosineSimilarity([0.6, 0.8], [0.8, 0.6]);
    expect(sim).toBeCloseTo(0.96, 10);
  });

  it('throws DimensionMismatchError on dimension mismatch', () => {
    expect(() => cosineSimilarity([1, 2], [1, 2, 3])).toThrow(DimensionMismatchError);
    expect(() => cosineSimilarity([1, 2], [1, 2, 3])).toThrow('dimension mismatch: 2 vs 3');
  });

  it('returns 0 for empty vectors', () => {
    expect(cosineSimilarity([], [])).toBe(0);
  });

  it('returns 0 for zero vectors', () => {
    expect(cosineSimilarity([0, 0, 0], [1, 2, 3])).toBe(0);
    expect(cosineSimilarity([1, 2, 3], [0, 0, 0])).toBe(0);
    expect(cosineSimilarity([0, 0, 0], [0, 0, 0])).toBe(0);
  });
});

describe('VectorStore', () => {
  const items = [item('a', 'movie', 'alpha'), item('b', 'music', 'beta'), item('c', 'anime', 'gamma')];
  const encoder = mapEncoder({ alpha: [1, 0, 0], beta: [0, 1, 0], gamma: [0, 0, 1] });

  describe('build', () => {
    it('encodes every description in catalog order', async () => {
      const store = await VectorStore.build(items, encoder);

      expect(store.size()).toBe(3);
      expect(store.dimension()).toBe(3);
      expect(store.ids()).toEqual(['a', 'b', 'c']);
      expect(store.get('b')).toEqual([0, 1, 0]);
    });

    it('keeps index lookups aligned with the catalog', async () => {
      const store = await VectorStore.build(items, encoder);

      expect(store.at(0)).toEqual([1, 0, 0]);
      expect(store.at(2)).toEqual([0, 0, 1]);
      expect(store.indexOf('c')).toBe(2);
      expect(store.indexOf('missing')).toBe(-1);
    });

    it('reports progress after each item', async () => {
      const onProgress = vi.fn();
      await VectorStore.build(items, encoder, { onProgress });

      expect(onProgress.mock.calls).toEqual([
        [1, 3],
        [2, 3],
        [3, 3],
      ]);
    });

    it('fails the whole build with EncodingError when one item fails', async () => {
      const broken = [...items, item('d', 'manga', 'delta')];

      const error = await VectorStore.build(broken, encoder).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(EncodingError);
      expect(error).toMatchObject({
        code: 'ENCODING_ERROR',
        itemId: 'd',
        message: `Failed to encode item 'd': no vector for "delta"`,
      });
    });

    it('rejects vectors of differing length', async () => {
      const skewed = mapEncoder({ alpha: [1, 0, 0], beta: [0, 1] });

      await expect(VectorStore.build(items.slice(0, 2), skewed)).rejects.toThrow(DimensionMismatchError);
    });

    it('rejects duplicate ids', async () => {
      const dupes = [item('a', 'movie', 'alpha'), item('a', 'music', 'beta')];

      await expect(VectorStore.build(dupes, encoder)).rejects.toMatchObject({ code: 'DUPLICATE_ID' });
      await expect(VectorStore.build(dupes, encoder)).rejects.toBeInstanceOf(RecommenderError);
    });

    it('encodes empty descriptions instead of failing', async () => {
      const store = await VectorStore.build([item('blank')], new VocabularyEncoder());

      expect(store.get('blank').every((v) => v === 0)).toBe(true);
    });

    it('builds an empty store from an empty catalog', async () => {
      const store = await VectorStore.build([], encoder);

      expect(store.size()).toBe(0);
      expect(store.dimension()).toBe(0);
    });
  });

  describe('lookups', () => {
    it('throws NotFoundError for an unknown id', async () => {
      const store = await VectorStore.build(items, encoder);

      expect(() => store.get('nope')).toThrow(NotFoundError);
      expect(() => store.get('nope')).toThrow("Vector with identifier 'nope' not found");
      expect(store.has('nope')).toBe(false);
    });

    it('throws NotFoundError for an index out of range', async () => {
      const store = await VectorStore.build(items, encoder);

      expect(() => store.at(3)).toThrow(NotFoundError);
      expect(() => store.at(-1)).toThrow(NotFoundError);
    });
  });

  describe('immutability', () => {
    it('freezes stored vectors', async () => {
      const store = await VectorStore.build(items, encoder);

      expect(Object.isFrozen(store.get('a'))).toBe(true);
    });

    it('is unaffected by later changes to the source vectors', () => {
      const vector = [1, 2, 3];
      const store = VectorStore.fromEntries([{ id: 'x', vector }]);

      vector[0] = 99;

      expect(store.get('x')).toEqual([1, 2, 3]);
    });

    it('exports copies', async () => {
      const store = await VectorStore.build(items, encoder);
      const exported = store.export();

      expect(Object.isFrozen(exported[0]?.vector)).toBe(false);
      expect(store.get('a')).toEqual([1, 0, 0]);
    });
  });

  describe('fromEntries', () => {
    it('restores an exported store', async () => {
      const store = await VectorStore.build(items, encoder);
      const restored = VectorStore.fromEntries(store.export());

      expect(restored.ids()).toEqual(['a', 'b', 'c']);
      expect(restored.get('c')).toEqual([0, 0, 1]);
    });

    it('enforces one dimensionality', () => {
      expect(() =>
        VectorStore.fromEntries([
          { id: 'x', vector: [1, 0] },
          { id: 'y', vector: [1, 0, 0] },
        ])
      ).toThrow(DimensionMismatchError);
    });
  });
});
