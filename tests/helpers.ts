import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { parseCatalog } from '../src/catalog.js';
import type { Encoder } from '../src/embedder.js';
import type { EmbeddingVector, MediaItem } from '../src/types.js';

export const VOCABULARY = [
  'atmospheric',
  'melancholy',
  'dystopian',
  'space',
  'future',
  'memory',
  'neon',
  'lonely',
  'horror',
  'folk',
  'ritual',
  'summer',
  'comedy',
  'romance',
  'upbeat',
  'dance',
  'synth',
  'epic',
] as const;

/**
 * Deterministic bag-of-words encoder: one dimension per vocabulary word,
 * holding how often the word occurs. Text without any of the words
 * encodes to the zero vector.
 */
export class VocabularyEncoder implements Encoder {
  calls = 0;

  async encode(text: string): Promise<EmbeddingVector> {
    this.calls++;
    const words = text.toLowerCase().split(/[^a-z]+/);
    return VOCABULARY.map((term) => words.filter((w) => w === term).length);
  }
}

export const fixturePath = fileURLToPath(new URL('./fixtures/catalog.json', import.meta.url));

export function loadFixtureCatalog(): readonly MediaItem[] {
  return parseCatalog(JSON.parse(readFileSync(fixturePath, 'utf-8')));
}

export function item(id: string, category = 'movie', description = ''): MediaItem {
  return { id, title: id, category, description };
}
