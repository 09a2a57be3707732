/**
 * Catalog ingestion: validate raw records into MediaItems
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { ValidationError } from './errors.js';
import type { MediaItem } from './types.js';
import { normalizeText, stripHtml } from './utils.js';

const DESCRIPTION_SNIPPET_LENGTH = 200;

export const tagSchema = z.object({
  name: z.string().min(1),
  /** Relevance 0-100 */
  rank: z.number().min(0).max(100).optional(),
  description: z.string().optional(),
});

export type Tag = z.infer<typeof tagSchema>;

export const mediaItemSchema = z
  .object({
    id: z.union([z.string().min(1), z.number().int()]).transform(String),
    title: z.string().trim().min(1, 'Title is required'),
    altTitles: z.array(z.string().trim().min(1)).default([]),
    category: z
      .string()
      .trim()
      .min(1, 'Category is required')
      .transform((c) => c.toLowerCase()),
    description: z.string().optional(),
    genres: z.array(z.string()).default([]),
    tags: z.array(tagSchema).default([]),
    keywords: z.array(z.string()).default([]),
    year: z.number().int().optional(),
  })
  .strict()
  .transform((raw): MediaItem => {
    const composed = raw.genres.length > 0 || raw.tags.length > 0 || raw.keywords.length > 0;
    return Object.freeze({
      id: raw.id,
      title: raw.title,
      ...(raw.altTitles.length > 0 && { altTitles: Object.freeze([...raw.altTitles]) }),
      category: raw.category,
      description: composed ? composeDescription(raw) : (raw.description ?? ''),
      ...(raw.genres.length > 0 && { genres: Object.freeze([...raw.genres]) }),
      ...(raw.year !== undefined && { year: raw.year }),
    });
  });

function unwrapItems(data: unknown): unknown {
  if (typeof data === 'object' && data !== null && !Array.isArray(data) && 'items' in data) {
    return data.items;
  }
  return data;
}

export const catalogSchema = z
  .preprocess(unwrapItems, z.array(mediaItemSchema))
  .superRefine((items, ctx) => {
    const seen = new Set<string>();
    items.forEach((item, i) => {
      if (seen.has(item.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [i, 'id'],
          message: `Duplicate item id '${item.id}'`,
        });
      }
      seen.add(item.id);
    });
  });

export interface DescriptionSource {
  description?: string | undefined;
  genres?: readonly string[] | undefined;
  tags?: readonly Tag[] | undefined;
  keywords?: readonly string[] | undefined;
}

/**
 * Build weighted text from genres, ranked tags and keywords.
 * Stronger signals are repeated so they weigh more in the embedding.
 */
export function composeDescription(source: DescriptionSource): string {
  const parts: string[] = [];

  for (const genre of source.genres ?? []) {
    parts.push(genre, genre);
  }

  for (const tag of source.tags ?? []) {
    const rank = tag.rank ?? 50;
    if (rank >= 80) {
      parts.push(tag.name, tag.name, tag.name);
      if (tag.description) parts.push(tag.description);
    } else if (rank >= 60) {
      parts.push(tag.name, tag.name);
    } else {
      parts.push(tag.name);
    }
  }

  for (const keyword of source.keywords ?? []) {
    parts.push(keyword, keyword);
  }

  if (source.description) {
    parts.push(stripHtml(source.description).slice(0, DESCRIPTION_SNIPPET_LENGTH));
  }

  return parts.join(' . ');
}

/**
 * Validate raw catalog data (an array, or `{ items: [...] }`)
 *
 * @throws ValidationError listing every offending field
 */
export function parseCatalog(data: unknown): readonly MediaItem[] {
  const result = catalogSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    throw new ValidationError(`Invalid catalog: ${issues.length} issue(s)`, issues);
  }
  return Object.freeze(result.data);
}

export async function loadCatalog(path: string): Promise<readonly MediaItem[]> {
  const raw = await readFile(path, 'utf-8');

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    throw new ValidationError(`Catalog file ${path} is not valid JSON`, {
      reason: err instanceof Error ? err.message : String(err),
    });
  }
  return parseCatalog(data);
}

/**
 * Case-insensitive substring match on titles and alternate titles; first hit
 * in catalog order
 */
export function findItem(items: readonly MediaItem[], title: string): MediaItem | undefined {
  const needle = normalizeText(title);
  if (!needle) {
    return undefined;
  }
  return items.find((item) =>
    [item.title, ...(item.altTitles ?? [])].some((t) => normalizeText(t).includes(needle))
  );
}
