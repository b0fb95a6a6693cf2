import { EmbeddingProvider } from '../../types/llm';
import { VectorStore } from '../../types/vector';
import { InMemoryVectorStore } from './memory.store';
import { PgVectorStore } from './pgvector.store';

export type VectorStoreKind = 'pgvector' | 'memory';

export class VectorStoreFactory {
  static create(kind: VectorStoreKind, collection: string, embedder: EmbeddingProvider): VectorStore {
    switch (kind) {
      case 'pgvector':
        return new PgVectorStore(collection, embedder);
      case 'memory':
        return new InMemoryVectorStore(collection, embedder);
      default: {
        const unsupported: never = kind;
        throw new Error(`Unsupported vector store: ${String(unsupported)}`);
      }
    }
  }
}
