import { v4 as uuidv4 } from 'uuid';
import { EmbeddingProvider } from '../../types/llm';
import { VectorMetadata, VectorQueryResult, VectorStore, VectorWhere } from '../../types/vector';
import { cosineDistance } from './cosine';

interface StoredRecord {
  id: string;
  document: string;
  metadata: VectorMetadata;
  embedding: number[];
}

export function matchesWhere(metadata: VectorMetadata, where?: VectorWhere): boolean {
  if (!where) return true;
  return Object.entries(where).every(([key, value]) => metadata[key] === value);
}

/**
 * Brute-force store held in process memory. Used for local runs without
 * Postgres and as the test stand-in for pgvector.
 */
export class InMemoryVectorStore implements VectorStore {
  private records = new Map<string, StoredRecord>();

  constructor(readonly collection: string, private embedder: EmbeddingProvider) {}

  async add(documents: string[], metadatas: VectorMetadata[], ids?: string[]): Promise<string[]> {
    if (metadatas.length !== documents.length || (ids && ids.length !== documents.length)) {
      throw new Error('documents, metadatas and ids must have the same length');
    }

    const assignedIds = ids ?? documents.map(() => uuidv4());
    const embeddings = await this.embedder.embed(documents);

    documents.forEach((document, index) => {
      this.records.set(assignedIds[index], {
        id: assignedIds[index],
        document,
        metadata: metadatas[index],
        embedding: embeddings[index],
      });
    });

    return assignedIds;
  }

  async query(embeddings: number[][], nResults: number, where?: VectorWhere): Promise<VectorQueryResult> {
    const result: VectorQueryResult = { ids: [], documents: [], metadatas: [], distances: [] };
    const candidates = [...this.records.values()].filter((record) => matchesWhere(record.metadata, where));

    for (const embedding of embeddings) {
      const hits = candidates
        .map((record) => ({ record, distance: cosineDistance(embedding, record.embedding) }))
        .sort((a, b) => a.distance - b.distance)
        .slice(0, nResults);

      result.ids.push(hits.map((hit) => hit.record.id));
      result.documents.push(hits.map((hit) => hit.record.document));
      result.metadatas.push(hits.map((hit) => hit.record.metadata));
      result.distances.push(hits.map((hit) => hit.distance));
    }

    return result;
  }

  async delete(ids: string[]): Promise<void> {
    ids.forEach((id) => this.records.delete(id));
  }

  async count(): Promise<number> {
    return this.records.size;
  }

  async clear(): Promise<void> {
    this.records.clear();
  }
}
