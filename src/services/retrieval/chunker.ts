import fs from 'fs';
import path from 'path';
import { getEncoding } from 'js-tiktoken';
import { DocType } from '../../types/evidence';
import { VectorMetadata } from '../../types/vector';

export interface DocumentChunk {
  text: string;
  tokenCount: number;
  chunkIndex: number;
  metadata: VectorMetadata;
}

export interface ChunkerOptions {
  chunkSize: number;
  chunkOverlap: number;
}

const DEFAULT_EXTENSIONS = ['.md', '.txt', '.rst'];

// Checked in order against the full path.
const DOC_TYPE_BY_PATH: Array<[string, DocType]> = [
  ['sops', 'sop'],
  ['faqs', 'faq'],
  ['pricing', 'pricing'],
  ['policies', 'policy'],
];

let encoder: ReturnType<typeof getEncoding> | null = null;

function getEncoder(): ReturnType<typeof getEncoding> {
  if (!encoder) {
    encoder = getEncoding('cl100k_base');
  }
  return encoder;
}

export function detectDocType(filePath: string): DocType {
  const match = DOC_TYPE_BY_PATH.find(([segment]) => filePath.includes(segment));
  return match ? match[1] : 'general';
}

/** Splits documents into overlapping windows of cl100k_base tokens. */
export class DocumentChunker {
  private chunkSize: number;
  private chunkOverlap: number;

  constructor(options: ChunkerOptions) {
    if (options.chunkSize <= 0) throw new Error('chunkSize must be positive');
    if (options.chunkOverlap < 0 || options.chunkOverlap >= options.chunkSize) {
      throw new Error('chunkOverlap must be between 0 and chunkSize - 1');
    }
    this.chunkSize = options.chunkSize;
    this.chunkOverlap = options.chunkOverlap;
  }

  chunkText(text: string, metadata: VectorMetadata = {}): DocumentChunk[] {
    if (text.trim().length === 0) return [];

    const encoding = getEncoder();
    const tokens = encoding.encode(text);
    const chunks: DocumentChunk[] = [];
    const step = this.chunkSize - this.chunkOverlap;

    for (let start = 0; start < tokens.length; start += step) {
      const window = tokens.slice(start, start + this.chunkSize);
      const chunkIndex = chunks.length;
      chunks.push({
        text: encoding.decode(window),
        tokenCount: window.length,
        chunkIndex,
        metadata: { ...metadata, chunk_index: chunkIndex },
      });
    }

    return chunks;
  }

  chunkFile(filePath: string, docType?: DocType): DocumentChunk[] {
    const text = fs.readFileSync(filePath, 'utf8');
    const stats = fs.statSync(filePath);
    const extension = path.extname(filePath);

    return this.chunkText(text, {
      source_file: filePath,
      doc_title: path.basename(filePath, extension),
      doc_type: docType ?? detectDocType(filePath),
      file_extension: extension,
      updated_at: stats.mtime.toISOString(),
    });
  }

  chunkDirectory(directory: string, recursive: boolean = true, extensions: string[] = DEFAULT_EXTENSIONS): DocumentChunk[] {
    return listFiles(directory, recursive)
      .filter((file) => extensions.includes(path.extname(file)))
      .sort()
      .flatMap((file) => this.chunkFile(file));
  }
}

function listFiles(directory: string, recursive: boolean): string[] {
  const files: string[] = [];
  for (const entry of fs.readdirSync(directory, { withFileTypes: true })) {
    const fullPath = path.join(directory, entry.name);
    if (entry.isDirectory()) {
      if (recursive) files.push(...listFiles(fullPath, recursive));
    } else if (entry.isFile()) {
      files.push(fullPath);
    }
  }
  return files;
}
