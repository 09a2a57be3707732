/**
 * Shared data model
 */

/** Known media categories; any other label is accepted as well */
export type MediaCategory = 'movie' | 'music' | 'anime' | 'manga' | (string & {});

export interface MediaItem {
  readonly id: string;
  readonly title: string;
  /** Other names the item is known by (romanized, translated) */
  readonly altTitles?: readonly string[] | undefined;
  readonly category: MediaCategory;
  /** Free text the embedding is computed from */
  readonly description: string;
  readonly genres?: readonly string[] | undefined;
  readonly year?: number | undefined;
}

/** Fixed-length embedding, one per catalog item */
export type EmbeddingVector = readonly number[];

export interface RankedResult {
  item: MediaItem;
  /** Cosine similarity, -1 to 1 */
  score: number;
  /** 1-based position, ties keep catalog order */
  rank: number;
}
