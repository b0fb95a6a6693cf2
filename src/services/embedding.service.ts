import { EmbeddingProvider } from '../types/llm';
import { logger } from '../utils/logger';

export interface EmbeddingCacheLike {
  get(text: string): Promise<number[] | null>;
  set(text: string, embedding: number[]): Promise<void>;
}

/**
 * Serves embeddings from the cache and only sends the misses to the
 * provider. Output order always matches input order.
 */
export class CachedEmbeddingProvider implements EmbeddingProvider {
  constructor(private inner: EmbeddingProvider, private cache: EmbeddingCacheLike) {}

  async embed(texts: string[]): Promise<number[][]> {
    const results: Array<number[] | null> = await Promise.all(texts.map((text) => this.cache.get(text)));

    const missing: number[] = [];
    results.forEach((hit, index) => {
      if (hit === null) missing.push(index);
    });

    if (missing.length > 0) {
      const fresh = await this.inner.embed(missing.map((index) => texts[index]));
      if (fresh.length !== missing.length) {
        throw new Error(`Embedding provider returned ${fresh.length} vectors for ${missing.length} texts`);
      }

      await Promise.all(
        missing.map((index, position) => {
          results[index] = fresh[position];
          return this.cache.set(texts[index], fresh[position]);
        })
      );
    }

    logger.debug('Embeddings resolved', { total: texts.length, cacheHits: texts.length - missing.length });

    return results.map((embedding, index) => {
      if (embedding === null) {
        throw new Error(`Missing embedding for input ${index}`);
      }
      return embedding;
    });
  }
}
