export const DOC_TYPES = ['pricing', 'sop', 'procedure', 'policy', 'faq', 'general'] as const;

export type DocType = (typeof DOC_TYPES)[number];

export interface Evidence {
  sourceId: string;
  docTitle: string;
  /** Free-form tag from chunk metadata; one of DOC_TYPES for ingested documents. */
  docType: string;
  chunkText: string;
  /** Raw similarity (1 - distance) as returned by the vector store. Never rescored. */
  similarity: number;
  /** Relevance score; the reranker overwrites it with the composite score. */
  score: number;
  chunkIndex: number;
  sourceFile: string;
  metadata: Record<string, unknown>;
  retrievedAt: Date | null;
}
