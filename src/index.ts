/**
 * media-match - Cross-media recommendations by semantic similarity
 *
 * Movies, anime, manga and music are matched by what their descriptions
 * mean rather than by shared tags. Embeddings are computed locally with
 * Transformers.js, no API keys needed.
 *
 * @example
 * ```typescript
 * import { MediaRecommender, loadCatalog, toDisplay } from 'media-match';
 *
 * const recommender = new MediaRecommender();
 * await recommender.load(await loadCatalog('catalog.json'));
 *
 * const results = recommender.recommend('Blade Runner 2049', { limit: 3 });
 * console.log(results.map(toDisplay));
 * ```
 */

// High-level API
export { MediaRecommender, type MediaRecommenderConfig } from './recommender.js';

// Low-level building blocks
export { Embedder, type Encoder, type EmbedderConfig, type PipelineLoader } from './embedder.js';

export {
  VectorStore,
  cosineSimilarity,
  type VectorEntry,
  type BuildOptions,
} from './vector-store.js';

export { rank, rankByCategory, groupByCategory, type RankOptions, type GroupedRankOptions } from './ranker.js';

export {
  parseCatalog,
  loadCatalog,
  findItem,
  composeDescription,
  mediaItemSchema,
  catalogSchema,
  type DescriptionSource,
  type Tag,
} from './catalog.js';

export { reroll, pageOf, createSeededRandom, type RerollOptions } from './reroll.js';

export { formatMatch, toDisplay, type DisplayResult } from './utils.js';

export {
  RecommenderError,
  EncodingError,
  NotFoundError,
  DimensionMismatchError,
  ValidationError,
  ConfigurationError,
} from './errors.js';

export type { MediaItem, MediaCategory, EmbeddingVector, RankedResult } from './types.js';
