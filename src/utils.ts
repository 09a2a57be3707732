import type { MediaCategory, RankedResult } from './types.js';

export function normalizeText(text: string): string {
  return text.toLowerCase().trim().replace(/\s+/g, ' ');
}

export function stripHtml(text: string): string {
  return text.replace(/<[^>]+>/g, '');
}

/** 0.873 -> "87%" */
export function formatMatch(score: number): string {
  return `${Math.round(score * 100)}%`;
}

export interface DisplayResult {
  rank: number;
  title: string;
  category: MediaCategory;
  match: string;
}

export function toDisplay(result: RankedResult): DisplayResult {
  return {
    rank: result.rank,
    title: result.item.title,
    category: result.item.category,
    match: formatMatch(result.score),
  };
}
