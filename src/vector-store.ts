/**
 * Immutable in-memory vector store, one vector per catalog item
 */

import type { Encoder } from './embedder.js';
import { DimensionMismatchError, EncodingError, NotFoundError, RecommenderError } from './errors.js';
import type { EmbeddingVector, MediaItem } from './types.js';

export interface VectorEntry {
  id: string;
  vector: EmbeddingVector;
}

export interface BuildOptions {
  /** Called after each item is encoded */
  onProgress?: (done: number, total: number) => void;
}

/**
 * Vectors aligned with catalog order. Built once, never mutated:
 * a catalog update builds a new store and swaps it in.
 *
 * @example
 * ```typescript
 * const store = await VectorStore.build(items, new Embedder());
 *
 * store.get('blade-runner-2049'); // [0.02, -0.11, ...]
 * store.at(0);                    // vector of items[0]
 * ```
 */
export class VectorStore {
  private readonly entries: readonly VectorEntry[];
  private readonly index: ReadonlyMap<string, number>;
  private readonly dim: number;

  private constructor(entries: readonly VectorEntry[]) {
    const index = new Map<string, number>();
    let dim = 0;

    entries.forEach((entry, i) => {
      if (index.has(entry.id)) {
        throw new RecommenderError(`Duplicate item id '${entry.id}'`, 'DUPLICATE_ID', { id: entry.id });
      }
      if (i === 0) {
        dim = entry.vector.length;
      } else if (entry.vector.length !== dim) {
        throw new DimensionMismatchError(dim, entry.vector.length);
      }
      index.set(entry.id, i);
    });

    this.entries = Object.freeze(
      entries.map((e) => Object.freeze({ id: e.id, vector: Object.freeze([...e.vector]) }))
    );
    this.index = index;
    this.dim = dim;
  }

  /**
   * Encode every item's description, in catalog order.
   * All-or-nothing: any failure rejects and no store is produced.
   */
  static async build(
    items: readonly MediaItem[],
    encoder: Encoder,
    options: BuildOptions = {}
  ): Promise<VectorStore> {
    const entries: VectorEntry[] = [];

    for (const item of items) {
      let vector: EmbeddingVector;
      try {
        vector = await encoder.encode(item.description);
      } catch (err) {
        throw new EncodingError(
          `Failed to encode item '${item.id}': ${err instanceof Error ? err.message : String(err)}`,
          item.id,
          { cause: err }
        );
      }
      entries.push({ id: item.id, vector });
      options.onProgress?.(entries.length, items.length);
    }

    return new VectorStore(entries);
  }

  /** From persistence */
  static fromEntries(entries: readonly VectorEntry[]): VectorStore {
    return new VectorStore(entries);
  }

  static empty(): VectorStore {
    return new VectorStore([]);
  }

  get(id: string): EmbeddingVector {
    const i = this.index.get(id);
    if (i === undefined) {
      throw new NotFoundError('Vector', id);
    }
    return this.entryAt(i).vector;
  }

  /** Vector of the item at the given catalog index */
  at(index: number): EmbeddingVector {
    return this.entryAt(index).vector;
  }

  has(id: string): boolean {
    return this.index.has(id);
  }

  /** Catalog index of an id, or -1 */
  indexOf(id: string): number {
    return this.index.get(id) ?? -1;
  }

  ids(): string[] {
    return this.entries.map((e) => e.id);
  }

  size(): number {
    return this.entries.length;
  }

  /** Shared vector length, 0 for an empty store */
  dimension(): number {
    return this.dim;
  }

  /** For persistence */
  export(): VectorEntry[] {
    return this.entries.map((e) => ({ id: e.id, vector: [...e.vector] }));
  }

  private entryAt(index: number): VectorEntry {
    const entry = this.entries[index];
    if (!entry) {
      throw new NotFoundError('Vector at index', index);
    }
    return entry;
  }
}

/** Returns -1 to 1, where 1 = identical direction */
export function cosineSimilarity(a: EmbeddingVector, b: EmbeddingVector): number {
  if (a.length !== b.length) {
    throw new DimensionMismatchError(a.length, b.length);
  }

  if (a.length === 0) {
    return 0;
  }

  let dotProduct = 0;
  let magnitudeA = 0;
  let magnitudeB = 0;

  for (let i = 0; i < a.length; i++) {
    const aVal = a[i] ?? 0;
    const bVal = b[i] ?? 0;
    dotProduct += aVal * bVal;
    magnitudeA += aVal * aVal;
    magnitudeB += bVal * bVal;
  }

  magnitudeA = Math.sqrt(magnitudeA);
  magnitudeB = Math.sqrt(magnitudeB);

  if (magnitudeA === 0 || magnitudeB === 0) {
    return 0;
  }

  return dotProduct / (magnitudeA * magnitudeB);
}

