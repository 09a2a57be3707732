/**
 * Text encoding using Transformers.js (local, no API needed)
 */

import { pipeline, env } from '@xenova/transformers';
import { EncodingError } from './errors.js';
import type { EmbeddingVector } from './types.js';

/**
 * Anything that turns text into a fixed-length vector.
 * The recommender depends only on this, so the model can be swapped
 * (or stubbed in tests) without touching the ranker.
 */
export interface Encoder {
  encode(text: string): Promise<EmbeddingVector>;
}

export type PipelineLoader = (task: 'feature-extraction', model: string) => Promise<unknown>;

export interface EmbedderConfig {
  /**
   * Model to use for embeddings
   * @default 'Xenova/all-MiniLM-L6-v2'
   */
  model?: string;

  /**
   * Cache directory for downloaded models
   * @default '.cache/transformers'
   */
  cacheDir?: string;

  /**
   * Enable progress logging during model download
   * @default false
   */
  progressLogging?: boolean;

  /**
   * Factory for the feature-extraction pipeline
   * @default Transformers.js `pipeline`
   */
  loader?: PipelineLoader;
}

type FeatureExtractor = (
  text: string,
  options: { pooling: 'mean'; normalize: boolean }
) => Promise<unknown>;

function isFeatureExtractor(value: unknown): value is FeatureExtractor {
  return typeof value === 'function';
}

function hasTensorData(value: unknown): value is { data: ArrayLike<number> } {
  if (typeof value !== 'object' || value === null || !('data' in value)) {
    return false;
  }
  const { data } = value;
  return (
    ArrayBuffer.isView(data) ||
    (Array.isArray(data) && data.every((v) => typeof v === 'number'))
  );
}

const defaultLoader: PipelineLoader = (task, model) => pipeline(task, model);

/**
 * Text encoder backed by a local transformer model.
 * The model is loaded on first use and kept for the lifetime of the instance.
 *
 * @example
 * ```typescript
 * const embedder = new Embedder();
 *
 * const vector = await embedder.encode('Neon-soaked noir about memory');
 * console.log(vector.length); // 384
 * ```
 */
export class Embedder implements Encoder {
  private extractor: FeatureExtractor | null = null;
  private loading: Promise<FeatureExtractor> | null = null;
  private config: Required<EmbedderConfig>;

  constructor(config: EmbedderConfig = {}) {
    this.config = {
      model: config.model ?? 'Xenova/all-MiniLM-L6-v2',
      cacheDir: config.cacheDir ?? '.cache/transformers',
      progressLogging: config.progressLogging ?? false,
      loader: config.loader ?? defaultLoader,
    };

    // Configure Transformers.js
    env.cacheDir = this.config.cacheDir;
    env.allowLocalModels = false; // Use remote models
  }

  /**
   * Load the model ahead of the first encode() call.
   * Optional: encode() loads it on demand.
   */
  async init(): Promise<void> {
    await this.getExtractor();
  }

  private getExtractor(): Promise<FeatureExtractor> {
    if (this.extractor) {
      return Promise.resolve(this.extractor);
    }
    if (!this.loading) {
      this.loading = this.load().then(
        (extractor) => {
          this.extractor = extractor;
          return extractor;
        },
        (err: unknown) => {
          // Let the next call retry
          this.loading = null;
          throw err;
        }
      );
    }
    return this.loading;
  }

  private async load(): Promise<FeatureExtractor> {
    if (this.config.progressLogging) {
      console.log(`[Embedder] Loading model: ${this.config.model}`);
      console.log(`[Embedder] Cache dir: ${this.config.cacheDir}`);
    }

    const extractor = await this.config.loader('feature-extraction', this.config.model);
    if (!isFeatureExtractor(extractor)) {
      throw new EncodingError(`Model ${this.config.model} did not yield a feature-extraction pipeline`);
    }

    if (this.config.progressLogging) {
      console.log('[Embedder] Model loaded successfully');
    }
    return extractor;
  }

  /**
   * Generate the embedding vector for a single text.
   * Empty text is encoded as-is.
   */
  async encode(text: string): Promise<EmbeddingVector> {
    const extractor = await this.getExtractor();

    const output = await extractor(text, {
      pooling: 'mean',
      normalize: true,
    });

    if (!hasTensorData(output)) {
      throw new EncodingError(`Model ${this.config.model} returned no tensor data`);
    }
    return Array.from(output.data);
  }

  /**
   * Get the dimension of the embedding vectors
   * Returns null if the model is not loaded yet
   */
  async getDimension(): Promise<number | null> {
    if (!this.extractor) {
      return null;
    }

    const testVector = await this.encode('test');
    return testVector.length;
  }

  isInitialized(): boolean {
    return this.extractor !== null;
  }

  getConfig(): Readonly<Required<EmbedderConfig>> {
    return { ...this.config };
  }
}
