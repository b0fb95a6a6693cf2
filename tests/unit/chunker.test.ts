import fs from 'fs';
import os from 'os';
import path from 'path';
import { getEncoding } from 'js-tiktoken';
import { DocumentChunker, detectDocType } from '../../src/services/retrieval/chunker';

describe('detectDocType', () => {
  it.each([
    ['kb/sops/onboarding.md', 'sop'],
    ['kb/faqs/general.md', 'faq'],
    ['kb/pricing/plans.md', 'pricing'],
    ['kb/policies/refunds.md', 'policy'],
    ['kb/about.md', 'general'],
  ])('classifies %s as %s', (filePath, docType) => {
    expect(detectDocType(filePath)).toBe(docType);
  });

  it('uses the first matching directory', () => {
    expect(detectDocType('kb/sops/pricing/steps.md')).toBe('sop');
  });
});

describe('DocumentChunker', () => {
  it('rejects invalid window settings', () => {
    expect(() => new DocumentChunker({ chunkSize: 0, chunkOverlap: 0 })).toThrow('chunkSize must be positive');
    expect(() => new DocumentChunker({ chunkSize: 4, chunkOverlap: 4 })).toThrow(
      'chunkOverlap must be between 0 and chunkSize - 1'
    );
  });

  it('produces overlapping token windows', () => {
    const chunker = new DocumentChunker({ chunkSize: 4, chunkOverlap: 1 });

    const chunks = chunker.chunkText('a b c d e f g h i j', { doc_type: 'faq' });

    expect(chunks.map((chunk) => chunk.text)).toEqual(['a b c d', ' d e f g', ' g h i j', ' j']);
    expect(chunks.map((chunk) => chunk.tokenCount)).toEqual([4, 4, 4, 1]);
    expect(chunks[2].metadata).toEqual({ doc_type: 'faq', chunk_index: 2 });
  });

  it('caps long text at the configured token count', () => {
    const chunker = new DocumentChunker({ chunkSize: 600, chunkOverlap: 100 });
    const text = Array.from({ length: 1500 }, (_, i) => `word${i}`).join(' ');
    const tokens = getEncoding('cl100k_base').encode(text);

    const chunks = chunker.chunkText(text);

    expect(tokens.length).toBeGreaterThan(1500);
    expect(chunks.length).toBe(Math.ceil(tokens.length / 500));
    expect(chunks[0].tokenCount).toBe(600);
    expect(chunks.every((chunk) => chunk.tokenCount <= 600)).toBe(true);
    expect(chunks.map((chunk) => chunk.chunkIndex)).toEqual(chunks.map((_, i) => i));
    expect(chunks[0].text.startsWith('word0 word1')).toBe(true);
  });

  it('returns nothing for blank text', () => {
    const chunker = new DocumentChunker({ chunkSize: 4, chunkOverlap: 1 });
    expect(chunker.chunkText('  \n\t ')).toEqual([]);
  });

  describe('with files on disk', () => {
    let root: string;

    beforeEach(() => {
      root = fs.mkdtempSync(path.join(os.tmpdir(), 'kb-'));
      fs.mkdirSync(path.join(root, 'pricing'));
      fs.mkdirSync(path.join(root, 'faqs'));
      fs.writeFileSync(path.join(root, 'pricing', 'plans.md'), 'Starter is 49 per month');
      fs.writeFileSync(path.join(root, 'faqs', 'support.txt'), 'Support runs weekdays');
      fs.writeFileSync(path.join(root, 'notes.json'), '{"skip": true}');
    });

    afterEach(() => {
      fs.rmSync(root, { recursive: true, force: true });
    });

    it('attaches file metadata to each chunk', () => {
      const chunker = new DocumentChunker({ chunkSize: 50, chunkOverlap: 5 });
      const filePath = path.join(root, 'pricing', 'plans.md');

      const [chunk] = chunker.chunkFile(filePath);

      expect(chunk.text).toBe('Starter is 49 per month');
      expect(chunk.metadata).toEqual({
        source_file: filePath,
        doc_title: 'plans',
        doc_type: 'pricing',
        file_extension: '.md',
        updated_at: fs.statSync(filePath).mtime.toISOString(),
        chunk_index: 0,
      });
    });

    it('walks a directory for supported extensions', () => {
      const chunker = new DocumentChunker({ chunkSize: 50, chunkOverlap: 5 });

      const chunks = chunker.chunkDirectory(root);

      expect(chunks.map((chunk) => chunk.metadata.doc_title)).toEqual(['support', 'plans']);
      expect(chunks.map((chunk) => chunk.metadata.doc_type)).toEqual(['faq', 'pricing']);
    });

    it('stays at the top level when not recursive', () => {
      const chunker = new DocumentChunker({ chunkSize: 50, chunkOverlap: 5 });
      expect(chunker.chunkDirectory(root, false)).toEqual([]);
    });
  });
});
