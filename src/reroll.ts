/**
 * Re-roll: show a different arrangement of near-tied top results.
 * Works on the ranker's output; the ranker itself stays deterministic.
 */

import type { RankedResult } from './types.js';

export interface RerollOptions {
  seed: number;

  /**
   * Only the first topK results are shuffled
   * @default 10
   */
  topK?: number;

  /**
   * Results within this distance of a run's leading score count as tied
   * @default 0.02
   */
  tolerance?: number;
}

/**
 * Seeded pseudo-random number generator (Mulberry32)
 * Returns numbers in [0, 1)
 */
export function createSeededRandom(seed: number): () => number {
  let state = seed;
  return (): number => {
    state |= 0;
    state = (state + 0x6d2b79f5) | 0;
    let t = Math.imul(state ^ (state >>> 15), 1 | state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Shuffle runs of near-tied scores among the top results and re-rank.
 * Same seed, same order. The input array is left untouched.
 */
export function reroll(results: readonly RankedResult[], options: RerollOptions): RankedResult[] {
  const topK = Math.min(options.topK ?? 10, results.length);
  const tolerance = options.tolerance ?? 0.02;
  const random = createSeededRandom(options.seed);

  const head = results.slice(0, topK);
  const shuffled: RankedResult[] = [];

  let start = 0;
  while (start < head.length) {
    const leader = head[start];
    if (!leader) break;

    let end = start + 1;
    while (end < head.length && leader.score - (head[end]?.score ?? -Infinity) <= tolerance) {
      end++;
    }

    shuffled.push(...shuffle(head.slice(start, end), random));
    start = end;
  }

  return shuffled
    .concat(results.slice(topK))
    .map((result, i) => ({ ...result, rank: i + 1 }));
}

/** One page of results, for "show me different ones" without reshuffling */
export function pageOf<T>(results: readonly T[], page: number, pageSize: number): T[] {
  if (pageSize <= 0 || page < 0) {
    return [];
  }
  return results.slice(page * pageSize, (page + 1) * pageSize);
}

function shuffle<T>(values: T[], random: () => number): T[] {
  for (let i = values.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    const tmp = values[i];
    const other = values[j];
    if (tmp === undefined || other === undefined) continue;
    values[i] = other;
    values[j] = tmp;
  }
  return values;
}
