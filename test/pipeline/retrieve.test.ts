import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { RetrievalError } from '../../src/errors';
import { ContextAssembler } from '../../src/pipeline/retrieve';
import type { ChunkMetadata } from '../../src/rag/schema';
import { InMemoryIndex } from '../support/fakes';

const meta = (documentId: string, filename: string): ChunkMetadata => ({
  document_id: documentId,
  filename,
  uploaded_by: 'prof-1',
});

const fill = async (index: InMemoryIndex, documentId: string, count: number): Promise<void> => {
  const texts = Array.from({ length: count }, (_, i) => `${documentId} chunk ${i + 1}`);
  await index.upsert(documentId, texts, texts.map(() => meta(documentId, `${documentId}.pdf`)));
};

describe('ContextAssembler.retrieveForQuery', () => {
  let index: InMemoryIndex;
  let assembler: ContextAssembler;

  beforeEach(async () => {
    index = new InMemoryIndex();
    assembler = new ContextAssembler(index);
    await index.upsert('doc-a', ['Photosynthesis converts light energy'], [meta('doc-a', 'bio.pdf')]);
    await index.upsert(
      'doc-b',
      ['Neural networks learn weights', 'Neural networks use backpropagation'],
      [meta('doc-b', 'ml.pdf'), meta('doc-b', 'ml.pdf')],
    );
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('returns the best chunks and each source filename once', async () => {
    await expect(assembler.retrieveForQuery('neural networks', 2)).resolves.toEqual({
      chunks: ['Neural networks learn weights', 'Neural networks use backpropagation'],
      sources: ['ml.pdf'],
    });
  });

  it('keeps sources in rank order', async () => {
    const { sources } = await assembler.retrieveForQuery('neural networks', 3);

    expect(sources).toEqual(['ml.pdf', 'bio.pdf']);
  });

  it('labels chunks without a filename as Unknown', async () => {
    await index.upsert('doc-c', ['Entropy always increases'], [meta('doc-c', '')]);

    await expect(assembler.retrieveForQuery('entropy increases', 1)).resolves.toEqual({
      chunks: ['Entropy always increases'],
      sources: ['Unknown'],
    });
  });

  it('skips the index for a blank query or a non-positive k', async () => {
    const query = vi.spyOn(index, 'query');

    await expect(assembler.retrieveForQuery('   ', 5)).resolves.toEqual({ chunks: [], sources: [] });
    await expect(assembler.retrieveForQuery('neural', 0)).resolves.toEqual({ chunks: [], sources: [] });
    expect(query).not.toHaveBeenCalled();
  });

  it('wraps index failures in RetrievalError', async () => {
    index.failReadsWith = new Error('connection refused');

    await expect(assembler.retrieveForQuery('neural', 3)).rejects.toThrow(
      new RetrievalError('Similarity search failed: connection refused'),
    );
  });

  it('rethrows errors that are already typed', async () => {
    const failure = new RetrievalError('collection missing');
    index.failReadsWith = failure;

    await expect(assembler.retrieveForQuery('neural', 3)).rejects.toBe(failure);
  });
});

describe('ContextAssembler.retrieveForDocuments', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('returns at most the first 20 chunks joined by blank lines', async () => {
    const index = new InMemoryIndex();
    await fill(index, 'doc-1', 25);
    await fill(index, 'doc-2', 3);

    const parts = (await new ContextAssembler(index).retrieveForDocuments(['doc-1', 'doc-2'])).split('\n\n');

    expect(parts).toHaveLength(20);
    expect(parts[0]).toBe('doc-1 chunk 1');
    expect(parts[19]).toBe('doc-1 chunk 20');
  });

  it('takes chunks document by document in the order given', async () => {
    const index = new InMemoryIndex();
    await fill(index, 'doc-1', 15);
    await fill(index, 'doc-2', 10);

    const parts = (await new ContextAssembler(index).retrieveForDocuments(['doc-2', 'doc-1'])).split('\n\n');

    expect(parts).toHaveLength(20);
    expect(parts.slice(9, 11)).toEqual(['doc-2 chunk 10', 'doc-1 chunk 1']);
    expect(parts[19]).toBe('doc-1 chunk 10');
  });

  it('returns an empty string when nothing is indexed for the documents', async () => {
    const assembler = new ContextAssembler(new InMemoryIndex());

    await expect(assembler.retrieveForDocuments(['missing'])).resolves.toBe('');
    await expect(assembler.retrieveForDocuments([])).resolves.toBe('');
  });
});
