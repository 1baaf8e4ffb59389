import * as crypto from 'crypto';
import { createLogger } from './logger';
import type { EmbeddingProvider } from './embedding-providers';
import type { EmbeddingStore } from './embedding-store';
import { EmbeddingUnavailableError, ErrorCode, QAError } from '../../shared/types/errors';

const log = createLogger('EmbeddingService');

export interface EmbeddingServiceOptions {
  /** In-memory entries kept before the oldest 20% are evicted */
  hotCacheSize?: number;
}

/**
 * Cosine similarity between two vectors of equal length.
 */
export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length) {
    throw new EmbeddingUnavailableError(`Vector dimension mismatch: ${a.length} vs ${b.length}`);
  }

  let dotProduct = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dotProduct += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  const denominator = Math.sqrt(normA) * Math.sqrt(normB);
  if (denominator === 0) return 0;
  return dotProduct / denominator;
}

/**
 * EmbeddingService: wraps an EmbeddingProvider with caching and validation.
 *
 * Lookup order: in-memory hot cache, then the SQLite store, then the provider.
 * Cache keys include the provider's model name. Every vector is checked for
 * emptiness, non-finite values and a dimension that matches earlier vectors;
 * provider failures surface as EmbeddingUnavailableError, never as an empty
 * or substitute vector.
 */
export class EmbeddingService {
  private hotCache: Map<string, number[]> = new Map();
  private readonly maxHotCache: number;
  private dimensions: number | null = null;

  constructor(
    private readonly provider: EmbeddingProvider,
    private readonly store: EmbeddingStore | null = null,
    options: EmbeddingServiceOptions = {},
  ) {
    this.maxHotCache = options.hotCacheSize ?? 10_000;
  }

  /** Model/version that produced every vector this service returns. */
  getModelName(): string {
    return this.provider.model;
  }

  getDimensions(): number | null {
    return this.dimensions;
  }

  async embed(text: string, signal?: AbortSignal): Promise<number[]> {
    const [embedding] = await this.embedBatch([text], signal);
    return embedding;
  }

  async embedBatch(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    const model = this.provider.model;
    const results: number[][] = new Array(texts.length);
    const uncachedTexts: string[] = [];
    const uncachedIndexes: number[] = [];
    const uncachedHashes: string[] = [];

    for (let i = 0; i < texts.length; i++) {
      const hash = this.hashContent(texts[i]);
      const key = this.cacheKey(model, hash);

      const hot = this.hotCache.get(key);
      if (hot) {
        results[i] = hot;
        continue;
      }

      const stored = this.store?.get(hash, model) ?? null;
      if (stored) {
        results[i] = this.validate(stored, model);
        this.hotCache.set(key, results[i]);
        continue;
      }

      uncachedTexts.push(texts[i]);
      uncachedIndexes.push(i);
      uncachedHashes.push(hash);
    }

    if (uncachedTexts.length > 0) {
      const fresh = await this.callProvider(uncachedTexts, signal);
      const toStore: Array<{ hash: string; model: string; embedding: number[] }> = [];
      for (let j = 0; j < fresh.length; j++) {
        const embedding = this.validate(fresh[j], model);
        results[uncachedIndexes[j]] = embedding;
        this.hotCache.set(this.cacheKey(model, uncachedHashes[j]), embedding);
        toStore.push({ hash: uncachedHashes[j], model, embedding });
      }
      this.store?.putMany(toStore);
      log.debug(`Embedded ${uncachedTexts.length} texts (${texts.length - uncachedTexts.length} cached)`);
    }

    this.evictHotCacheIfNeeded();
    return results;
  }

  getCacheStats(): { hot: number; persisted: number } {
    return { hot: this.hotCache.size, persisted: this.store?.count(this.provider.model) ?? 0 };
  }

  clearCache(): void {
    this.hotCache.clear();
    this.store?.clear();
  }

  private async callProvider(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    const model = this.provider.model;
    let vectors: number[][];
    try {
      vectors =
        texts.length === 1 ? [await this.provider.embed(texts[0], signal)] : await this.provider.embedBatch(texts, signal);
    } catch (err) {
      if (signal?.aborted) {
        throw new QAError('Query cancelled while embedding', ErrorCode.QUERY_CANCELLED, {
          originalError: err instanceof Error ? err : undefined,
        });
      }
      const originalError = err instanceof Error ? err : new Error(String(err));
      log.error(`Embedding call failed (model: ${model}):`, originalError.message);
      throw new EmbeddingUnavailableError(`Embedding model ${model} failed: ${originalError.message}`, {
        model,
        originalError,
      });
    }

    if (vectors.length !== texts.length) {
      throw new EmbeddingUnavailableError(`Embedding model ${model} returned ${vectors.length} vectors for ${texts.length} inputs`, {
        model,
      });
    }
    return vectors;
  }

  private validate(vector: number[], model: string): number[] {
    if (vector.length === 0) {
      throw new EmbeddingUnavailableError(`Embedding model ${model} returned an empty vector`, { model });
    }
    if (!vector.every(Number.isFinite)) {
      throw new EmbeddingUnavailableError(`Embedding model ${model} returned non-finite values`, { model });
    }
    if (this.dimensions === null) {
      this.dimensions = vector.length;
    } else if (vector.length !== this.dimensions) {
      throw new EmbeddingUnavailableError(
        `Embedding model ${model} returned ${vector.length} dimensions, expected ${this.dimensions}`,
        { model },
      );
    }
    return vector;
  }

  private cacheKey(model: string, hash: string): string {
    return `${model}\u0000${hash}`;
  }

  private hashContent(text: string): string {
    return crypto.createHash('md5').update(text).digest('hex');
  }

  /**
   * Evict from hot cache if it exceeds the limit.
   * Removes the oldest 20% of entries (FIFO via Map insertion order).
   */
  private evictHotCacheIfNeeded(): void {
    if (this.hotCache.size <= this.maxHotCache) return;
    const toRemove = Math.max(1, Math.floor(this.hotCache.size * 0.2));
    const keys = Array.from(this.hotCache.keys());
    for (let i = 0; i < toRemove; i++) {
      this.hotCache.delete(keys[i]);
    }
  }
}
