import type { Env } from './env';

export interface ConfidenceThresholds {
  high: number;
  low: number;
}

export interface RerankerOptions {
  similarityWeight: number;
  recencyWeight: number;
  qualityWeight: number;
  recencyHalfLifeDays: number;
  conflictSpread: number;
  qualityByDocType: Record<string, number>;
  defaultQuality: number;
  defaultRecency: number;
}

export interface RetryOptions {
  maxRetries: number;
  baseDelayMs: number;
}

export interface RetrievalOptions {
  topK: number;
  confidenceThreshold: number;
}

export interface ChunkingOptions {
  chunkSize: number;
  chunkOverlap: number;
}

export interface AgentConfig {
  confidence: ConfidenceThresholds;
  retrieval: RetrievalOptions;
  reranker: RerankerOptions;
  retry: RetryOptions;
  chunking: ChunkingOptions;
}

export const DEFAULT_QUALITY_BY_DOC_TYPE: Record<string, number> = {
  pricing: 1.0,
  sop: 0.95,
  procedure: 0.95,
  policy: 0.9,
  faq: 0.8,
};

export const DEFAULT_RERANKER_OPTIONS: RerankerOptions = {
  similarityWeight: 0.6,
  recencyWeight: 0.2,
  qualityWeight: 0.2,
  recencyHalfLifeDays: 90,
  conflictSpread: 0.3,
  qualityByDocType: DEFAULT_QUALITY_BY_DOC_TYPE,
  defaultQuality: 0.7,
  defaultRecency: 0.7,
};

export function buildAgentConfig(source: Env): AgentConfig {
  return {
    confidence: {
      high: source.CONFIDENCE_HIGH_THRESHOLD,
      low: source.CONFIDENCE_LOW_THRESHOLD,
    },
    retrieval: {
      topK: source.RAG_TOP_K,
      confidenceThreshold: source.RAG_CONFIDENCE_THRESHOLD,
    },
    reranker: {
      ...DEFAULT_RERANKER_OPTIONS,
      similarityWeight: source.RERANK_SIMILARITY_WEIGHT,
      recencyWeight: source.RERANK_RECENCY_WEIGHT,
      qualityWeight: source.RERANK_QUALITY_WEIGHT,
      recencyHalfLifeDays: source.RERANK_RECENCY_HALF_LIFE_DAYS,
      conflictSpread: source.RERANK_CONFLICT_SPREAD,
    },
    retry: {
      maxRetries: source.TOOL_MAX_RETRIES,
      baseDelayMs: source.TOOL_RETRY_BASE_DELAY_MS,
    },
    chunking: {
      chunkSize: source.RAG_CHUNK_SIZE,
      chunkOverlap: source.RAG_CHUNK_OVERLAP,
    },
  };
}
