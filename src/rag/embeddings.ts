import { OllamaEmbeddingFunction } from '@chroma-core/ollama';

import { describeError, IndexWriteError } from '../errors';
import { exponentialBackoff } from '../util/retry';
import type { Embedder } from './schema';

type EmbeddingGeneratorOptions = {
  embeddingFunction: Embedder;
  batchSize?: number;
  maxAttempts?: number;
  initialDelayMs?: number;
};

const DEFAULT_BATCH_SIZE = 64;
const DEFAULT_MAX_ATTEMPTS = 5;

// The ollama client reports HTTP failures as `status_code`, fetch-style errors as `status`.
const getStatus = (error: unknown): number | undefined => {
  if (!error || typeof error !== 'object') {
    return undefined;
  }

  for (const key of ['status', 'status_code']) {
    const value: unknown = Reflect.get(error, key);
    if (typeof value === 'number') {
      return value;
    }
  }

  return undefined;
};

export class EmbeddingGenerator implements Embedder {
  private readonly embeddingFunction: Embedder;

  private readonly batchSize: number;

  private readonly maxAttempts: number;

  private readonly initialDelayMs: number | undefined;

  constructor({ embeddingFunction, batchSize, maxAttempts, initialDelayMs }: EmbeddingGeneratorOptions) {
    this.embeddingFunction = embeddingFunction;
    this.batchSize = Math.max(1, batchSize ?? DEFAULT_BATCH_SIZE);
    this.maxAttempts = Math.max(1, maxAttempts ?? DEFAULT_MAX_ATTEMPTS);
    this.initialDelayMs = initialDelayMs;
  }

  private chunkTexts(texts: string[]): string[][] {
    const batches: string[][] = [];

    for (let index = 0; index < texts.length; index += this.batchSize) {
      batches.push(texts.slice(index, index + this.batchSize));
    }

    return batches;
  }

  private shouldRetry(error: unknown): boolean {
    const status = getStatus(error);

    if (typeof status === 'number' && status >= 400 && status < 500 && status !== 429) {
      return false;
    }

    return true;
  }

  private logRetry(error: unknown, attempt: number, delay: number): void {
    const status = getStatus(error);
    const prefix = typeof status === 'number' ? `status ${status}, ` : '';

    console.warn(
      `[embed] Attempt ${attempt} failed (${prefix}${describeError(error)}). Retrying in ${delay}ms.`,
    );
  }

  private async requestBatch(batch: string[]): Promise<number[][]> {
    const vectors = await this.embeddingFunction.generate(batch);

    if (!Array.isArray(vectors) || vectors.length !== batch.length) {
      throw new Error(`Embedding service returned ${Array.isArray(vectors) ? vectors.length : 0} vectors for ${batch.length} texts.`);
    }

    return vectors.map((vector, index) => {
      if (!Array.isArray(vector) || vector.some((value) => typeof value !== 'number' || Number.isNaN(value))) {
        throw new Error(`Embedding at index ${index} is not a numeric vector.`);
      }
      return vector;
    });
  }

  async generate(texts: string[]): Promise<number[][]> {
    if (!texts.length) {
      return [];
    }

    const embeddings: number[][] = [];

    for (const batch of this.chunkTexts(texts)) {
      try {
        const batchEmbeddings = await exponentialBackoff(() => this.requestBatch(batch), {
          maxAttempts: this.maxAttempts,
          initialDelayMs: this.initialDelayMs,
          onRetry: (error, attempt, delay) => this.logRetry(error, attempt, delay),
          shouldRetry: (error) => this.shouldRetry(error),
        });
        embeddings.push(...batchEmbeddings);
      } catch (error) {
        const status = getStatus(error);
        const detail = describeError(error);
        throw new IndexWriteError(
          typeof status === 'number'
            ? `Embedding request failed (status ${status}): ${detail}`
            : `Embedding request failed: ${detail}`,
          error,
        );
      }
    }

    return embeddings;
  }
}

export const createOllamaEmbedder = (options: {
  url: string;
  model: string;
  batchSize?: number;
  maxAttempts?: number;
}): EmbeddingGenerator =>
  new EmbeddingGenerator({
    embeddingFunction: new OllamaEmbeddingFunction({ url: options.url, model: options.model }),
    batchSize: options.batchSize,
    maxAttempts: options.maxAttempts,
  });
