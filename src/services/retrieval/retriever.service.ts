import { ConversationTurn } from '../../types/agent';
import { Evidence } from '../../types/evidence';
import { EmbeddingProvider } from '../../types/llm';
import { VectorMetadata, VectorStore, VectorWhere } from '../../types/vector';
import { logger } from '../../utils/logger';
import { errorMessage } from '../../utils/errors';
import { createEvidence } from './evidence';

export interface RetrieverOptions {
  topK: number;
}

function stringField(metadata: VectorMetadata, key: string, fallback: string): string {
  const value = metadata[key];
  return typeof value === 'string' && value.length > 0 ? value : fallback;
}

function numberField(metadata: VectorMetadata, key: string, fallback: number): number {
  const value = metadata[key];
  if (typeof value === 'number') return value;
  if (typeof value === 'string' && value.trim() !== '' && !Number.isNaN(Number(value))) return Number(value);
  return fallback;
}

export class RetrieverService {
  constructor(
    private embedder: EmbeddingProvider,
    private store: VectorStore,
    private options: RetrieverOptions,
    private now: () => Date = () => new Date()
  ) {}

  /** Never rejects: embedding or store failures come back as an empty list. */
  async retrieve(
    query: string,
    topK?: number,
    docTypeFilter?: string,
    metadataFilter?: VectorWhere
  ): Promise<Evidence[]> {
    const k = topK ?? this.options.topK;

    try {
      const [embedding] = await this.embedder.embed([query]);
      if (!embedding) {
        throw new Error('Embedding provider returned no vector');
      }

      const where: VectorWhere = { ...(metadataFilter ?? {}) };
      if (docTypeFilter) where.doc_type = docTypeFilter;

      const hits = await this.store.query([embedding], k, Object.keys(where).length > 0 ? where : undefined);

      const ids = hits.ids[0] ?? [];
      const documents = hits.documents[0] ?? [];
      const metadatas = hits.metadatas[0] ?? [];
      const distances = hits.distances[0] ?? [];
      const retrievedAt = this.now();

      const evidence = ids.map((id, index) => {
        const metadata = metadatas[index] ?? {};
        return createEvidence({
          sourceId: id,
          docTitle: stringField(metadata, 'doc_title', 'unknown'),
          docType: stringField(metadata, 'doc_type', 'unknown'),
          chunkText: documents[index] ?? '',
          similarity: 1 - (distances[index] ?? 1),
          chunkIndex: numberField(metadata, 'chunk_index', 0),
          sourceFile: stringField(metadata, 'source_file', 'unknown'),
          metadata: { ...metadata },
          retrievedAt,
        });
      });

      logger.info('retrieval_performed', {
        query: query.substring(0, 100),
        topK: k,
        docTypeFilter: docTypeFilter ?? null,
        resultsCount: evidence.length,
        topScore: evidence[0]?.score ?? null,
      });

      return evidence;
    } catch (error) {
      logger.error('Retrieval failed', {
        errorType: 'retrieval_error',
        error: errorMessage(error),
        query: query.substring(0, 100),
      });
      return [];
    }
  }

  async retrieveWithContext(query: string, conversationHistory: ConversationTurn[], topK?: number): Promise<Evidence[]> {
    const recent = conversationHistory.slice(-3);
    if (recent.length === 0) {
      return this.retrieve(query, topK);
    }

    const context = recent.map((turn) => turn.content).join(' ');
    return this.retrieve(`${context}\n\nCurrent query: ${query}`, topK);
  }

  /** Per-type lookup; types with no hits are omitted. */
  async retrieveByDocType(query: string, docTypes: string[], topKPerType: number = 3): Promise<Record<string, Evidence[]>> {
    const results: Record<string, Evidence[]> = {};

    for (const docType of docTypes) {
      const evidence = await this.retrieve(query, topKPerType, docType);
      if (evidence.length > 0) {
        results[docType] = evidence;
      }
    }

    return results;
  }
}
