import { RetrieverService } from '../../src/services/retrieval/retriever.service';
import { InMemoryVectorStore } from '../../src/services/vector/memory.store';
import { EmbeddingProvider } from '../../src/types/llm';
import { StubEmbedder } from '../helpers/fakes';

jest.mock('../../src/utils/logger', () => ({
  logger: {
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

const NOW = new Date('2024-06-01T00:00:00Z');

const PRICING_TEXT = 'Starter plan costs 49 per month';
const FAQ_TEXT = 'Support is available on weekdays';
const POLICY_TEXT = 'Refunds are issued within 30 days';

async function seededRetriever(embedder: StubEmbedder) {
  const store = new InMemoryVectorStore('knowledge_base', embedder);
  await store.add(
    [PRICING_TEXT, FAQ_TEXT, POLICY_TEXT],
    [
      { doc_title: 'pricing', doc_type: 'pricing', source_file: 'kb/pricing/pricing.md', chunk_index: 0 },
      { doc_title: 'support', doc_type: 'faq', source_file: 'kb/faqs/support.md', chunk_index: 2 },
      { doc_title: 'refunds', doc_type: 'policy' },
    ],
    ['pricing_0', 'support_2', 'refunds_0']
  );
  return new RetrieverService(embedder, store, { topK: 5 }, () => NOW);
}

describe('RetrieverService', () => {
  it('returns evidence ordered by similarity with metadata mapped', async () => {
    const embedder = new StubEmbedder({
      'How much is it?': [1, 0, 0],
      [PRICING_TEXT]: [1, 0, 0],
      [FAQ_TEXT]: [0.8, 0.6, 0],
      [POLICY_TEXT]: [0, 1, 0],
    });
    const retriever = await seededRetriever(embedder);

    const evidence = await retriever.retrieve('How much is it?', 2);

    expect(evidence).toHaveLength(2);
    expect(evidence[0]).toMatchObject({
      sourceId: 'pricing_0',
      docTitle: 'pricing',
      docType: 'pricing',
      chunkText: PRICING_TEXT,
      chunkIndex: 0,
      sourceFile: 'kb/pricing/pricing.md',
      retrievedAt: NOW,
    });
    expect(evidence[0].similarity).toBeCloseTo(1, 10);
    expect(evidence[0].score).toBe(evidence[0].similarity);
    expect(evidence[1].sourceId).toBe('support_2');
    expect(evidence[1].similarity).toBeCloseTo(0.8, 10);
    expect(evidence[1].chunkIndex).toBe(2);
  });

  it('falls back to unknown for missing metadata fields', async () => {
    const embedder = new StubEmbedder({ refunds: [0, 1, 0], [POLICY_TEXT]: [0, 1, 0] });
    const retriever = await seededRetriever(embedder);

    const [top] = await retriever.retrieve('refunds', 1);

    expect(top.sourceId).toBe('refunds_0');
    expect(top.sourceFile).toBe('unknown');
    expect(top.chunkIndex).toBe(0);
  });

  it('uses the configured top-k by default', async () => {
    const retriever = await seededRetriever(new StubEmbedder());
    expect(await retriever.retrieve('anything')).toHaveLength(3);
  });

  it('restricts results to a document type', async () => {
    const retriever = await seededRetriever(new StubEmbedder());

    const evidence = await retriever.retrieve('anything', 5, 'faq');

    expect(evidence.map((item) => item.sourceId)).toEqual(['support_2']);
  });

  it('combines metadata filters with the type filter', async () => {
    const retriever = await seededRetriever(new StubEmbedder());

    expect(await retriever.retrieve('anything', 5, 'faq', { doc_title: 'pricing' })).toEqual([]);
    expect((await retriever.retrieve('anything', 5, undefined, { doc_title: 'pricing' }))[0].sourceId).toBe(
      'pricing_0'
    );
  });

  it('returns an empty list when embedding fails', async () => {
    const store = new InMemoryVectorStore('knowledge_base', new StubEmbedder());
    const failing: EmbeddingProvider = {
      embed: jest.fn().mockRejectedValue(new Error('quota exceeded')),
    };
    const retriever = new RetrieverService(failing, store, { topK: 5 });

    await expect(retriever.retrieve('hello')).resolves.toEqual([]);
  });

  it('returns an empty list when the store has nothing', async () => {
    const embedder = new StubEmbedder();
    const retriever = new RetrieverService(embedder, new InMemoryVectorStore('empty', embedder), { topK: 5 });

    await expect(retriever.retrieve('hello')).resolves.toEqual([]);
  });

  describe('retrieveWithContext', () => {
    it('prefixes the last three turns to the query', async () => {
      const embedder = new StubEmbedder();
      const retriever = await seededRetriever(embedder);
      embedder.calls.length = 0;

      await retriever.retrieveWithContext(
        'And the price?',
        [
          { role: 'lead', content: 'one' },
          { role: 'agent', content: 'two' },
          { role: 'lead', content: 'three' },
          { role: 'agent', content: 'four' },
        ],
        2
      );

      expect(embedder.calls).toEqual([['two three four\n\nCurrent query: And the price?']]);
    });

    it('uses the bare query without history', async () => {
      const embedder = new StubEmbedder();
      const retriever = await seededRetriever(embedder);
      embedder.calls.length = 0;

      await retriever.retrieveWithContext('Plain query', []);

      expect(embedder.calls).toEqual([['Plain query']]);
    });
  });

  describe('retrieveByDocType', () => {
    it('groups results per type and omits empty types', async () => {
      const retriever = await seededRetriever(new StubEmbedder());

      const grouped = await retriever.retrieveByDocType('anything', ['pricing', 'sop', 'faq']);

      expect(Object.keys(grouped)).toEqual(['pricing', 'faq']);
      expect(grouped.pricing.map((item) => item.sourceId)).toEqual(['pricing_0']);
      expect(grouped.faq.map((item) => item.sourceId)).toEqual(['support_2']);
    });
  });
});
