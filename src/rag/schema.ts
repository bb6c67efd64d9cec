export interface ChunkMetadata {
  document_id: string;
  filename: string;
  uploaded_by: string;
}

export type MetadataFilter = Partial<ChunkMetadata>;

export interface StoredChunk {
  id: string;
  content: string;
  metadata: ChunkMetadata;
}

export interface RetrievedChunk extends StoredChunk {
  score: number;
}

export const GLOBAL_SCOPE = 'global';

/** A document id, or every collection at once. */
export type IndexScope = string;

export interface Embedder {
  generate(texts: string[]): Promise<number[][]>;
}

/**
 * Vector store with one collection per document. Ids are generated by the index
 * and never reused, so callers must delete a collection before re-filling it.
 */
export interface EmbeddingIndex {
  upsert(collectionId: string, texts: string[], metadatas: ChunkMetadata[]): Promise<string[]>;
  query(scope: IndexScope, queryText: string, topK: number, where?: MetadataFilter): Promise<RetrievedChunk[]>;
  /** Chunks in insertion order. */
  getAll(where: MetadataFilter): Promise<StoredChunk[]>;
  delete(ids: string[]): Promise<void>;
  deleteCollection(collectionId: string): Promise<void>;
  count(collectionId?: string): Promise<number>;
  /** Where a collection lives, for ingestion results and logs. */
  describeCollection(collectionId: string): string;
}
