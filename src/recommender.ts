/**
 * High-level recommender API combining encoder + vector store + ranker
 */

import { existsSync } from 'node:fs';
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { z } from 'zod';
import { findItem } from './catalog.js';
import { Embedder, type Encoder } from './embedder.js';
import { ConfigurationError, NotFoundError } from './errors.js';
import { rank, rankByCategory, type GroupedRankOptions, type RankOptions } from './ranker.js';
import type { MediaCategory, MediaItem, RankedResult } from './types.js';
import { VectorStore } from './vector-store.js';

export interface MediaRecommenderConfig {
  /**
   * Embedding model to use
   * @default 'Xenova/all-MiniLM-L6-v2'
   */
  model?: string;

  /**
   * Cache directory for models
   * @default '.cache/transformers'
   */
  cacheDir?: string;

  /**
   * Enable progress logging
   * @default false
   */
  progressLogging?: boolean;

  /**
   * Encoder to use instead of the local transformer model
   */
  encoder?: Encoder;

  /**
   * Path to save/load encoded vectors
   * Required for persist() and restore()
   */
  storePath?: string;

  /**
   * Results returned when no limit is given
   * @default 10
   */
  defaultLimit?: number;
}

const persistedStoreSchema = z.object({
  encoder: z.string(),
  items: z.array(
    z.object({ id: z.string(), description: z.string(), vector: z.array(z.number()) })
  ),
});

type PersistedStore = z.infer<typeof persistedStoreSchema>;

interface Snapshot {
  items: readonly MediaItem[];
  store: VectorStore;
}

const EMPTY: Snapshot = { items: Object.freeze([]), store: VectorStore.empty() };

/**
 * Cross-media recommendations by description similarity
 *
 * @example
 * ```typescript
 * const recommender = new MediaRecommender();
 * await recommender.load(await loadCatalog('data/catalog.json'));
 *
 * const results = recommender.recommend('Blade Runner 2049', { limit: 5 });
 * results.map(toDisplay); // [{ rank: 1, title: 'Interstellar', category: 'movie', match: '71%' }, ...]
 *
 * // Best match per media type
 * const byType = recommender.recommendByCategory('Akira', { perCategoryLimit: 1 });
 * ```
 */
export class MediaRecommender {
  private readonly encoder: Encoder;
  private readonly encoderName: string;
  private readonly config: Required<Omit<MediaRecommenderConfig, 'encoder' | 'storePath'>> & {
    storePath?: string | undefined;
  };
  private snapshot: Snapshot = EMPTY;

  constructor(config: MediaRecommenderConfig = {}) {
    this.config = {
      model: config.model ?? 'Xenova/all-MiniLM-L6-v2',
      cacheDir: config.cacheDir ?? '.cache/transformers',
      progressLogging: config.progressLogging ?? false,
      defaultLimit: config.defaultLimit ?? 10,
      storePath: config.storePath,
    };

    this.encoder =
      config.encoder ??
      new Embedder({
        model: this.config.model,
        cacheDir: this.config.cacheDir,
        progressLogging: this.config.progressLogging,
      });
    this.encoderName = describeEncoder(this.encoder);
  }

  /**
   * Encode a catalog and swap it in.
   * Queries already running keep the catalog they started with; if encoding
   * fails the previous catalog stays in place.
   */
  async load(items: readonly MediaItem[]): Promise<void> {
    const catalog = Object.freeze([...items]);
    const store = await VectorStore.build(catalog, this.encoder, {
      ...(this.config.progressLogging && {
        onProgress: (done: number, total: number) => {
          if (done === total || done % 100 === 0) {
            console.log(`[MediaRecommender] Encoded ${done}/${total} items`);
          }
        },
      }),
    });

    this.snapshot = { items: catalog, store };
  }

  /**
   * Load a catalog, reusing vectors saved at storePath when they were made
   * by the same encoder for exactly these items (same ids, same descriptions,
   * same order). Otherwise re-encodes and saves. An unreadable file counts
   * as out of date.
   *
   * @returns true if saved vectors were reused
   */
  async restore(items: readonly MediaItem[]): Promise<boolean> {
    const storePath = this.requireStorePath('restore()');

    if (existsSync(storePath)) {
      try {
        const saved = await this.readSaved(storePath);

        if (saved.encoder === this.encoderName && sameEntries(saved.items, items)) {
          this.snapshot = {
            items: Object.freeze([...items]),
            store: VectorStore.fromEntries(saved.items),
          };
          if (this.config.progressLogging) {
            console.log(`[MediaRecommender] Restored ${items.length} vectors from ${storePath}`);
          }
          return true;
        }

        if (this.config.progressLogging) {
          console.log(`[MediaRecommender] Catalog changed since ${storePath} was written. Rebuilding...`);
        }
      } catch (err) {
        if (this.config.progressLogging) {
          console.warn(`[MediaRecommender] Failed to load from ${storePath}. Rebuilding...`, err);
        }
      }
    }

    await this.load(items);
    await this.persist();
    return false;
  }

  /**
   * Save the current vectors to storePath
   */
  async persist(): Promise<void> {
    const storePath = this.requireStorePath('persist()');
    const dir = dirname(storePath);
    if (!existsSync(dir)) {
      await mkdir(dir, { recursive: true });
    }
    const { items, store } = this.snapshot;
    const data: PersistedStore = {
      encoder: this.encoderName,
      items: store.export().map((entry, i) => ({
        id: entry.id,
        description: items[i]?.description ?? '',
        vector: [...entry.vector],
      })),
    };
    await writeFile(storePath, JSON.stringify(data), 'utf-8');

    if (this.config.progressLogging) {
      console.log(`[MediaRecommender] Saved ${data.items.length} vectors to ${storePath}`);
    }
  }

  /**
   * Items most similar to the query, best first
   *
   * @param query item id or (part of) its title
   * @throws NotFoundError if nothing in the catalog matches the query
   */
  recommend(query: string, options: RankOptions = {}): RankedResult[] {
    const { items, store } = this.snapshot;
    const item = this.resolve(query, items, store);
    return rank(item.id, store, items, { ...options, limit: options.limit ?? this.config.defaultLimit });
  }

  /**
   * Recommendations partitioned per media type
   */
  recommendByCategory(
    query: string,
    options: GroupedRankOptions = {}
  ): Map<MediaCategory, RankedResult[]> {
    const { items, store } = this.snapshot;
    const item = this.resolve(query, items, store);
    return rankByCategory(item.id, store, items, options);
  }

  findItem(title: string): MediaItem | undefined {
    return findItem(this.snapshot.items, title);
  }

  items(): readonly MediaItem[] {
    return this.snapshot.items;
  }

  size(): number {
    return this.snapshot.items.length;
  }

  isLoaded(): boolean {
    return this.snapshot !== EMPTY;
  }

  getConfig(): Readonly<MediaRecommenderConfig> {
    return { ...this.config };
  }

  private resolve(query: string, items: readonly MediaItem[], store: VectorStore): MediaItem {
    const index = store.indexOf(query);
    const item = index >= 0 ? items[index] : findItem(items, query);
    if (!item) {
      throw new NotFoundError('Media item', query);
    }
    return item;
  }

  private async readSaved(storePath: string): Promise<PersistedStore> {
    const raw: unknown = JSON.parse(await readFile(storePath, 'utf-8'));
    return persistedStoreSchema.parse(raw);
  }

  private requireStorePath(operation: string): string {
    if (!this.config.storePath) {
      throw new ConfigurationError(`storePath must be configured to use ${operation}`);
    }
    return this.config.storePath;
  }
}

/** Name saved with persisted vectors; vectors are only reused by an encoder of the same name */
function describeEncoder(encoder: Encoder): string {
  if (encoder instanceof Embedder) {
    return encoder.getConfig().model;
  }
  return `custom:${encoder.constructor.name}`;
}

function sameEntries(
  saved: readonly { id: string; description: string }[],
  items: readonly MediaItem[]
): boolean {
  return (
    saved.length === items.length &&
    saved.every((entry, i) => entry.id === items[i]?.id && entry.description === items[i]?.description)
  );
}
