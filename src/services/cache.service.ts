import crypto from 'crypto';
import { redis } from '../config/redis';
import { logger } from '../utils/logger';
import { errorMessage } from '../utils/errors';

const CACHE_TTL = 604800; // 7 days
const KEY_PREFIX = 'emb:';

export function embeddingCacheKey(model: string, text: string): string {
  const digest = crypto.createHash('sha256').update(text).digest('hex');
  return `${KEY_PREFIX}${model}:${digest}`;
}

function isNumberArray(value: unknown): value is number[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'number');
}

/** Redis-backed embedding cache. Failures degrade to a miss. */
export class EmbeddingCache {
  constructor(private model: string, private ttlSeconds: number = CACHE_TTL) {}

  async get(text: string): Promise<number[] | null> {
    try {
      const data = await redis.get(embeddingCacheKey(this.model, text));
      if (!data) return null;
      const parsed: unknown = JSON.parse(data);
      return isNumberArray(parsed) ? parsed : null;
    } catch (error) {
      logger.warn('Embedding cache get failed', { error: errorMessage(error) });
      return null;
    }
  }

  async set(text: string, embedding: number[]): Promise<void> {
    try {
      await redis.set(embeddingCacheKey(this.model, text), JSON.stringify(embedding), { EX: this.ttlSeconds });
    } catch (error) {
      logger.warn('Embedding cache set failed', { error: errorMessage(error) });
    }
  }
}
