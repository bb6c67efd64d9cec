import {
  ChunkingError,
  CourseRagError,
  describeError,
  EmptyDocumentError,
  ExtractionError,
  IndexWriteError,
} from '../errors';
import type { ChunkMetadata, EmbeddingIndex } from '../rag/schema';
import { KeyedMutex } from '../util/keyedMutex';
import { chunkText, type ChunkingOptions } from './chunkText';
import type { ExtractedText, TextExtractor } from './extractText';

export type IngestionResult = {
  documentId: string;
  filename: string;
  chunksCreated: number;
  storageLocation: string;
};

type IngestionCoordinatorOptions = {
  extractor: TextExtractor;
  index: EmbeddingIndex;
  chunking?: ChunkingOptions;
};

export class IngestionCoordinator {
  private readonly extractor: TextExtractor;

  private readonly index: EmbeddingIndex;

  private readonly chunking: ChunkingOptions;

  private readonly locks = new KeyedMutex();

  constructor({ extractor, index, chunking }: IngestionCoordinatorOptions) {
    this.extractor = extractor;
    this.index = index;
    this.chunking = chunking ?? {};
  }

  /**
   * Extract, chunk and index one document into its own collection. Runs for the same
   * document id never overlap; a later run replaces what an earlier one wrote.
   * Status bookkeeping is left to the caller.
   */
  ingest(filePath: string, documentId: string, filename: string, ownerId: string): Promise<IngestionResult> {
    return this.locks.runExclusive(documentId, () => this.runIngestion(filePath, documentId, filename, ownerId));
  }

  /** Drops the document's collection once any ingestion of it has finished. */
  removeDocument(documentId: string): Promise<void> {
    return this.locks.runExclusive(documentId, () => this.index.deleteCollection(documentId));
  }

  isIngesting(documentId: string): boolean {
    return this.locks.isLocked(documentId);
  }

  private async runIngestion(
    filePath: string,
    documentId: string,
    filename: string,
    ownerId: string,
  ): Promise<IngestionResult> {
    let extracted: ExtractedText;
    try {
      extracted = await this.extractor.extract(filePath);
    } catch (error) {
      throw new ExtractionError(filename, error);
    }

    const { text, pages } = extracted;

    if (!text.trim()) {
      throw new EmptyDocumentError(filename);
    }

    const chunks = chunkText(text, this.chunking);

    if (!chunks.length) {
      throw new ChunkingError(filename);
    }

    const metadata: ChunkMetadata = {
      document_id: documentId,
      filename,
      uploaded_by: ownerId,
    };

    try {
      await this.index.deleteCollection(documentId);
      await this.index.upsert(
        documentId,
        chunks,
        chunks.map(() => ({ ...metadata })),
      );
    } catch (error) {
      if (error instanceof CourseRagError) {
        throw error;
      }
      throw new IndexWriteError(`Failed to index ${filename}: ${describeError(error)}`, error);
    }

    const storageLocation = this.index.describeCollection(documentId);
    console.info(`[ingest] ${filename} (${pages} page(s)) -> ${chunks.length} chunk(s) in ${storageLocation}`);

    return {
      documentId,
      filename,
      chunksCreated: chunks.length,
      storageLocation,
    };
  }
}
