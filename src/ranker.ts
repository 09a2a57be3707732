/**
 * Nearest-neighbour ranking over a vector store
 */

import type { MediaCategory, MediaItem, RankedResult } from './types.js';
import { cosineSimilarity, type VectorStore } from './vector-store.js';

export interface RankOptions {
  /** Return at most this many results. Omit for all. */
  limit?: number;

  /** Drop results scoring below this */
  minSimilarity?: number;

  /** Keep only these categories */
  categories?: readonly MediaCategory[];

  /** Extra ids to leave out (the query item is always left out) */
  exclude?: Iterable<string>;

  /**
   * Franchise/series key. Of the items sharing a key only the best
   * scoring one is kept; `undefined` means the item stands alone.
   */
  dedupKey?: (item: MediaItem) => string | undefined;
}

export interface GroupedRankOptions extends Omit<RankOptions, 'limit'> {
  /** Results per category. Omit for all. */
  perCategoryLimit?: number;
}

interface Candidate {
  item: MediaItem;
  score: number;
  order: number;
}

/**
 * Rank every other catalog item against the query item by cosine similarity.
 * Pure and deterministic: equal inputs give equal output, ties included.
 *
 * @throws NotFoundError if the query id, or any catalog item, has no vector
 */
export function rank(
  queryId: string,
  store: VectorStore,
  items: readonly MediaItem[],
  options: RankOptions = {}
): RankedResult[] {
  const sorted = score(queryId, store, items, options);
  const limit = options.limit ?? sorted.length;
  return assignRanks(sorted.slice(0, Math.max(0, limit)));
}

/**
 * Rank, then partition by category. Each group keeps its relative order
 * and is ranked from 1. Groups appear in order of their best result.
 */
export function rankByCategory(
  queryId: string,
  store: VectorStore,
  items: readonly MediaItem[],
  options: GroupedRankOptions = {}
): Map<MediaCategory, RankedResult[]> {
  const { perCategoryLimit, ...rest } = options;
  return groupByCategory(rank(queryId, store, items, rest), perCategoryLimit);
}

export function groupByCategory(
  results: readonly RankedResult[],
  perCategoryLimit?: number
): Map<MediaCategory, RankedResult[]> {
  const groups = new Map<MediaCategory, RankedResult[]>();

  for (const result of results) {
    const group = groups.get(result.item.category) ?? [];
    if (perCategoryLimit !== undefined && group.length >= perCategoryLimit) {
      continue;
    }
    group.push({ ...result, rank: group.length + 1 });
    groups.set(result.item.category, group);
  }

  return groups;
}

function score(
  queryId: string,
  store: VectorStore,
  items: readonly MediaItem[],
  options: RankOptions
): Candidate[] {
  const queryVector = store.get(queryId);
  const excluded = new Set(options.exclude ?? []);
  excluded.add(queryId);
  const categories = options.categories ? new Set(options.categories) : null;
  const minSim = options.minSimilarity ?? -Infinity;

  const candidates: Candidate[] = [];
  items.forEach((item, order) => {
    if (excluded.has(item.id)) return;
    if (categories && !categories.has(item.category)) return;

    const similarity = cosineSimilarity(queryVector, store.get(item.id));
    if (similarity < minSim) return;

    candidates.push({ item, score: similarity, order });
  });

  const deduped = options.dedupKey ? dedupe(candidates, options.dedupKey) : candidates;

  return deduped.sort((a, b) => b.score - a.score || a.order - b.order);
}

/** Keep the best candidate per key; earlier catalog order wins a tie */
function dedupe(
  candidates: Candidate[],
  keyOf: (item: MediaItem) => string | undefined
): Candidate[] {
  const best = new Map<string, Candidate>();
  const kept: Candidate[] = [];

  for (const candidate of candidates) {
    const key = keyOf(candidate.item);
    if (key === undefined) {
      kept.push(candidate);
      continue;
    }
    const current = best.get(key);
    if (!current || candidate.score > current.score) {
      best.set(key, candidate);
    }
  }

  return kept.concat(Array.from(best.values()));
}

function assignRanks(candidates: readonly Candidate[]): RankedResult[] {
  return candidates.map((c, i) => ({ item: c.item, score: c.score, rank: i + 1 }));
}
