import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { IndexWriteError } from '../../src/errors';
import { EmbeddingGenerator } from '../../src/rag/embeddings';

const httpError = (message: string, status: number): Error => Object.assign(new Error(message), { status });

const lengthVectors = async (texts: string[]): Promise<number[][]> => texts.map((text) => [text.length, 1]);

describe('EmbeddingGenerator', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('embeds texts in batches and keeps their order', async () => {
    const generate = vi.fn(lengthVectors);
    const embedder = new EmbeddingGenerator({ embeddingFunction: { generate }, batchSize: 2 });

    await expect(embedder.generate(['a', 'bb', 'ccc', 'dddd', 'eeeee'])).resolves.toEqual([
      [1, 1],
      [2, 1],
      [3, 1],
      [4, 1],
      [5, 1],
    ]);
    expect(generate.mock.calls).toEqual([[['a', 'bb']], [['ccc', 'dddd']], [['eeeee']]]);
  });

  it('does not call the service for an empty list', async () => {
    const generate = vi.fn(lengthVectors);

    await expect(new EmbeddingGenerator({ embeddingFunction: { generate } }).generate([])).resolves.toEqual([]);
    expect(generate).not.toHaveBeenCalled();
  });

  it('retries server errors', async () => {
    const generate = vi.fn(lengthVectors).mockRejectedValueOnce(httpError('unavailable', 503));
    const embedder = new EmbeddingGenerator({ embeddingFunction: { generate }, initialDelayMs: 1 });

    await expect(embedder.generate(['abc'])).resolves.toEqual([[3, 1]]);
    expect(generate).toHaveBeenCalledTimes(2);
    expect(console.warn).toHaveBeenCalledWith('[embed] Attempt 1 failed (status 503, unavailable). Retrying in 1ms.');
  });

  it('does not retry client errors other than 429', async () => {
    const generate = vi.fn(lengthVectors).mockRejectedValue(httpError('bad input', 400));
    const embedder = new EmbeddingGenerator({ embeddingFunction: { generate }, initialDelayMs: 1 });

    const attempt = embedder.generate(['abc']);

    await expect(attempt).rejects.toBeInstanceOf(IndexWriteError);
    await expect(attempt).rejects.toThrow('Embedding request failed (status 400): bad input');
    expect(generate).toHaveBeenCalledTimes(1);
  });

  it('rejects a response with the wrong number of vectors', async () => {
    const generate = vi.fn(async (_texts: string[]): Promise<number[][]> => []);
    const embedder = new EmbeddingGenerator({ embeddingFunction: { generate }, maxAttempts: 1 });

    await expect(embedder.generate(['a', 'b'])).rejects.toThrow(
      'Embedding request failed: Embedding service returned 0 vectors for 2 texts.',
    );
  });
});
