import fs from 'fs';
import path from 'path';
import { env } from '../config/env';
import { buildAgentConfig } from '../config/agent';
import { connectRedis, redis } from '../config/redis';
import { pool } from '../config/database';
import { createKnowledgeBase } from '../bootstrap';
import { DocumentChunk, DocumentChunker } from '../services/retrieval/chunker';
import { VectorStore } from '../types/vector';
import { logger } from '../utils/logger';
import { errorMessage } from '../utils/errors';

export interface IngestSummary {
  chunks: number;
  stored: number;
  byDocType: Record<string, number>;
}

export function chunkIds(chunks: DocumentChunk[]): string[] {
  return chunks.map((chunk) => `${String(chunk.metadata.source_file)}_${chunk.chunkIndex}`);
}

export function summarizeByDocType(chunks: DocumentChunk[]): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const chunk of chunks) {
    const docType = typeof chunk.metadata.doc_type === 'string' ? chunk.metadata.doc_type : 'unknown';
    counts[docType] = (counts[docType] ?? 0) + 1;
  }
  return counts;
}

/** Replaces the knowledge collection with the chunked contents of `directory`. */
export async function ingestKnowledgeBase(
  directory: string,
  store: VectorStore,
  chunker: DocumentChunker
): Promise<IngestSummary> {
  if (!fs.existsSync(directory)) {
    throw new Error(`Knowledge base directory not found: ${directory}`);
  }

  await store.clear();

  const chunks = chunker.chunkDirectory(directory, true, ['.md', '.txt']);
  if (chunks.length === 0) {
    logger.warn('No chunks generated', { directory });
    return { chunks: 0, stored: 0, byDocType: {} };
  }

  await store.add(
    chunks.map((chunk) => chunk.text),
    chunks.map((chunk) => chunk.metadata),
    chunkIds(chunks)
  );

  return {
    chunks: chunks.length,
    stored: await store.count(),
    byDocType: summarizeByDocType(chunks),
  };
}

async function main(): Promise<void> {
  const directory = path.resolve(env.KNOWLEDGE_BASE_DIR);
  const config = buildAgentConfig(env);

  await connectRedis();
  try {
    const summary = await ingestKnowledgeBase(directory, createKnowledgeBase(env), new DocumentChunker(config.chunking));
    logger.info('Knowledge base ingested', { directory, ...summary });
  } finally {
    await redis.quit();
    await pool.end();
  }
}

if (require.main === module) {
  main().catch((error) => {
    logger.error('Knowledge base ingestion failed', { errorType: 'ingestion_error', error: errorMessage(error) });
    process.exit(1);
  });
}
