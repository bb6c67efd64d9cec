import { ValidationError } from '../errors';

export type ChunkingOptions = {
  chunkSize?: number;
  chunkOverlap?: number;
};

export const DEFAULT_CHUNK_SIZE = 1000;
export const DEFAULT_CHUNK_OVERLAP = 200;

/**
 * Fixed character window. Each chunk is at most `chunkSize` characters and starts
 * `chunkSize - chunkOverlap` characters after the previous one, so neighbours share
 * `chunkOverlap` characters. Windows holding only whitespace are dropped.
 */
export const chunkText = (text: string, options: ChunkingOptions = {}): string[] => {
  const chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
  const chunkOverlap = options.chunkOverlap ?? DEFAULT_CHUNK_OVERLAP;

  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new ValidationError(`chunkSize must be a positive integer, got ${chunkSize}.`);
  }

  if (!Number.isInteger(chunkOverlap) || chunkOverlap < 0 || chunkOverlap >= chunkSize) {
    throw new ValidationError(`chunkOverlap must be an integer in [0, ${chunkSize}), got ${chunkOverlap}.`);
  }

  const stride = chunkSize - chunkOverlap;
  const chunks: string[] = [];

  for (let start = 0; start < text.length; start += stride) {
    const end = Math.min(text.length, start + chunkSize);
    const window = text.slice(start, end);

    if (window.trim()) {
      chunks.push(window);
    }

    if (end >= text.length) {
      break;
    }
  }

  return chunks;
};
