export type VectorMetadataValue = string | number | boolean | null;

export type VectorMetadata = Record<string, VectorMetadataValue>;

/** Equality filter on metadata keys; every entry must match. */
export type VectorWhere = Record<string, string | number | boolean>;

/** Column-oriented hits, one inner array per query embedding. */
export interface VectorQueryResult {
  ids: string[][];
  documents: string[][];
  metadatas: VectorMetadata[][];
  distances: number[][];
}

export interface VectorStore {
  readonly collection: string;
  add(documents: string[], metadatas: VectorMetadata[], ids?: string[]): Promise<string[]>;
  query(embeddings: number[][], nResults: number, where?: VectorWhere): Promise<VectorQueryResult>;
  delete(ids: string[]): Promise<void>;
  count(): Promise<number>;
  clear(): Promise<void>;
}
