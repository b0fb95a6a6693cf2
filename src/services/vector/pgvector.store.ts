import { v4 as uuidv4 } from 'uuid';
import { query } from '../../config/database';
import { EmbeddingProvider } from '../../types/llm';
import {
  VectorMetadata,
  VectorMetadataValue,
  VectorQueryResult,
  VectorStore,
  VectorWhere,
} from '../../types/vector';
import { logger } from '../../utils/logger';

interface ChunkRow {
  id: string;
  document: string;
  metadata: Record<string, unknown>;
  distance: number;
}

export function toVectorLiteral(embedding: number[]): string {
  return `[${embedding.join(',')}]`;
}

function toMetadata(raw: Record<string, unknown>): VectorMetadata {
  const metadata: VectorMetadata = {};
  for (const [key, value] of Object.entries(raw)) {
    if (value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      const scalar: VectorMetadataValue = value;
      metadata[key] = scalar;
    }
  }
  return metadata;
}

/** `knowledge_chunks` table, partitioned by collection name, cosine distance via pgvector. */
export class PgVectorStore implements VectorStore {
  constructor(readonly collection: string, private embedder: EmbeddingProvider) {}

  async add(documents: string[], metadatas: VectorMetadata[], ids?: string[]): Promise<string[]> {
    if (metadatas.length !== documents.length || (ids && ids.length !== documents.length)) {
      throw new Error('documents, metadatas and ids must have the same length');
    }
    if (documents.length === 0) return [];

    const assignedIds = ids ?? documents.map(() => uuidv4());
    const embeddings = await this.embedder.embed(documents);

    for (let i = 0; i < documents.length; i++) {
      await query(
        `INSERT INTO knowledge_chunks (id, collection, document, metadata, embedding)
         VALUES ($1, $2, $3, $4, $5::vector)
         ON CONFLICT (collection, id)
         DO UPDATE SET document = EXCLUDED.document, metadata = EXCLUDED.metadata, embedding = EXCLUDED.embedding`,
        [assignedIds[i], this.collection, documents[i], JSON.stringify(metadatas[i]), toVectorLiteral(embeddings[i])]
      );
    }

    logger.debug('Vector documents added', { collection: this.collection, count: documents.length });
    return assignedIds;
  }

  async query(embeddings: number[][], nResults: number, where?: VectorWhere): Promise<VectorQueryResult> {
    const result: VectorQueryResult = { ids: [], documents: [], metadatas: [], distances: [] };

    for (const embedding of embeddings) {
      const rows = await query<ChunkRow>(
        `SELECT id, document, metadata, (embedding <=> $1::vector)::float8 AS distance
         FROM knowledge_chunks
         WHERE collection = $2 AND metadata @> $3::jsonb
         ORDER BY embedding <=> $1::vector
         LIMIT $4`,
        [toVectorLiteral(embedding), this.collection, JSON.stringify(where ?? {}), nResults]
      );

      result.ids.push(rows.rows.map((row) => row.id));
      result.documents.push(rows.rows.map((row) => row.document));
      result.metadatas.push(rows.rows.map((row) => toMetadata(row.metadata)));
      result.distances.push(rows.rows.map((row) => Number(row.distance)));
    }

    return result;
  }

  async delete(ids: string[]): Promise<void> {
    if (ids.length === 0) return;
    await query('DELETE FROM knowledge_chunks WHERE collection = $1 AND id = ANY($2::text[])', [this.collection, ids]);
  }

  async count(): Promise<number> {
    const result = await query<{ count: string }>(
      'SELECT COUNT(*) AS count FROM knowledge_chunks WHERE collection = $1',
      [this.collection]
    );
    return Number(result.rows[0]?.count ?? 0);
  }

  async clear(): Promise<void> {
    await query('DELETE FROM knowledge_chunks WHERE collection = $1', [this.collection]);
    logger.info('Vector collection cleared', { collection: this.collection });
  }
}
