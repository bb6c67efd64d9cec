import { ChromaClient } from 'chromadb';
import { v4 as uuidv4 } from 'uuid';

import { describeError, IndexWriteError, RetrievalError } from '../errors';
import { GLOBAL_SCOPE } from './schema';
import type {
  ChunkMetadata,
  Embedder,
  EmbeddingIndex,
  IndexScope,
  MetadataFilter,
  RetrievedChunk,
  StoredChunk,
} from './schema';

type EqualityWhere = { [key: string]: { $eq: string } };
export type ChromaWhere = EqualityWhere | { $and: EqualityWhere[] };

type ChromaMetadata = { [key: string]: unknown };

/** The part of a chromadb collection the index uses. */
export interface ChromaCollectionLike {
  readonly name: string;
  upsert(args: {
    ids: string[];
    embeddings: number[][];
    documents: string[];
    metadatas: { [key: string]: string }[];
  }): Promise<void>;
  query(args: {
    queryEmbeddings: number[][];
    nResults: number;
    where?: ChromaWhere;
    include: ('documents' | 'metadatas' | 'distances')[];
  }): Promise<{
    ids: string[][];
    documents: (string | null)[][];
    metadatas: (ChromaMetadata | null)[][];
    distances?: (number | null)[][] | null;
  }>;
  get(args: { where?: ChromaWhere; include: ('documents' | 'metadatas')[] }): Promise<{
    ids: string[];
    documents: (string | null)[];
    metadatas: (ChromaMetadata | null)[];
  }>;
  count(): Promise<number>;
  delete(args: { ids: string[] }): Promise<void>;
}

/** The part of `ChromaClient` the index uses. */
export interface ChromaClientLike {
  listCollections(args: { limit: number; offset: number }): Promise<ChromaCollectionLike[]>;
  getOrCreateCollection(args: { name: string; embeddingFunction: Embedder }): Promise<ChromaCollectionLike>;
  deleteCollection(args: { name: string }): Promise<void>;
}

type ChromaIndexOptions = {
  client: ChromaClientLike;
  embedder: Embedder;
  collectionPrefix: string;
  location?: string;
};

const LIST_PAGE_SIZE = 100;

const normalizeScore = (distance: number | null | undefined): number => {
  if (typeof distance !== 'number' || Number.isNaN(distance)) {
    return 0;
  }

  return 1 / (1 + Math.max(distance, 0));
};

const toChromaMetadata = (metadata: ChunkMetadata): { [key: string]: string } => ({
  document_id: metadata.document_id,
  filename: metadata.filename,
  uploaded_by: metadata.uploaded_by,
});

const readString = (source: unknown, key: keyof ChunkMetadata): string => {
  if (source && typeof source === 'object') {
    const value: unknown = Reflect.get(source, key);
    if (typeof value === 'string') {
      return value;
    }
  }
  return '';
};

const fromChromaMetadata = (metadata: unknown): ChunkMetadata => ({
  document_id: readString(metadata, 'document_id'),
  filename: readString(metadata, 'filename'),
  uploaded_by: readString(metadata, 'uploaded_by'),
});

const buildWhere = (filter: MetadataFilter | undefined): ChromaWhere | undefined => {
  const clauses = Object.entries(filter ?? {})
    .filter((entry): entry is [string, string] => typeof entry[1] === 'string')
    .map<EqualityWhere>(([key, value]) => ({ [key]: { $eq: value } }));

  if (!clauses.length) {
    return undefined;
  }

  return clauses.length === 1 ? clauses[0] : { $and: clauses };
};

export const parseChromaUrl = (chromaUrl: string): { host: string; port: number; ssl: boolean } => {
  const url = new URL(chromaUrl);
  const ssl = url.protocol === 'https:';
  const port = url.port ? Number.parseInt(url.port, 10) : ssl ? 443 : 8000;

  return { host: url.hostname, port, ssl };
};

export class ChromaEmbeddingIndex implements EmbeddingIndex {
  private readonly client: ChromaClientLike;

  private readonly embedder: Embedder;

  private readonly collectionPrefix: string;

  private readonly location: string;

  constructor({ client, embedder, collectionPrefix, location }: ChromaIndexOptions) {
    this.client = client;
    this.embedder = embedder;
    this.collectionPrefix = collectionPrefix;
    this.location = location ?? 'chroma';
  }

  private collectionName(collectionId: string): string {
    return `${this.collectionPrefix}-${collectionId}`;
  }

  describeCollection(collectionId: string): string {
    return `${this.location}/${this.collectionName(collectionId)}`;
  }

  private async listCollections(): Promise<ChromaCollectionLike[]> {
    const collections: ChromaCollectionLike[] = [];

    for (let offset = 0; ; offset += LIST_PAGE_SIZE) {
      const page = await this.client.listCollections({ limit: LIST_PAGE_SIZE, offset });
      collections.push(...page.filter((collection) => collection.name.startsWith(`${this.collectionPrefix}-`)));
      if (page.length < LIST_PAGE_SIZE) {
        return collections;
      }
    }
  }

  private async findCollection(collectionId: string): Promise<ChromaCollectionLike | undefined> {
    const name = this.collectionName(collectionId);
    const collections = await this.listCollections();
    return collections.find((collection) => collection.name === name);
  }

  private async collectionsFor(scope: IndexScope | undefined): Promise<ChromaCollectionLike[]> {
    if (scope === undefined || scope === GLOBAL_SCOPE) {
      return this.listCollections();
    }

    const collection = await this.findCollection(scope);
    return collection ? [collection] : [];
  }

  async upsert(collectionId: string, texts: string[], metadatas: ChunkMetadata[]): Promise<string[]> {
    if (texts.length !== metadatas.length) {
      throw new IndexWriteError(`Got ${texts.length} texts but ${metadatas.length} metadata entries.`);
    }

    if (!texts.length) {
      return [];
    }

    const embeddings = await this.embedder.generate(texts);
    const ids = texts.map(() => uuidv4());

    try {
      const collection = await this.client.getOrCreateCollection({
        name: this.collectionName(collectionId),
        embeddingFunction: this.embedder,
      });
      await collection.upsert({
        ids,
        embeddings,
        documents: texts,
        metadatas: metadatas.map(toChromaMetadata),
      });
    } catch (error) {
      throw new IndexWriteError(`Failed to write ${texts.length} chunk(s) to ${this.describeCollection(collectionId)}: ${describeError(error)}`, error);
    }

    return ids;
  }

  async query(scope: IndexScope, queryText: string, topK: number, where?: MetadataFilter): Promise<RetrievedChunk[]> {
    if (!queryText.trim() || topK <= 0) {
      return [];
    }

    try {
      const collections = await this.collectionsFor(scope);
      if (!collections.length) {
        return [];
      }

      const [queryEmbedding] = await this.embedder.generate([queryText]);
      const chromaWhere = buildWhere(where);
      const perCollection = await Promise.all(
        collections.map(async (collection) => {
          const result = await collection.query({
            queryEmbeddings: [queryEmbedding],
            nResults: topK,
            where: chromaWhere,
            include: ['documents', 'metadatas', 'distances'],
          });

          const ids = result.ids[0] ?? [];
          const documents = result.documents[0] ?? [];
          const metadatas = result.metadatas[0] ?? [];
          const distances = result.distances?.[0] ?? [];

          return ids.map<RetrievedChunk>((id, index) => ({
            id,
            content: documents[index] ?? '',
            metadata: fromChromaMetadata(metadatas[index]),
            score: normalizeScore(distances[index]),
          }));
        }),
      );

      return perCollection
        .flat()
        .sort((left, right) => right.score - left.score)
        .slice(0, topK);
    } catch (error) {
      throw new RetrievalError(`Similarity search failed: ${describeError(error)}`, error);
    }
  }

  async getAll(where: MetadataFilter): Promise<StoredChunk[]> {
    try {
      const collections = await this.collectionsFor(where.document_id);
      const chromaWhere = buildWhere(where);
      const chunks: StoredChunk[] = [];

      for (const collection of collections) {
        const result = await collection.get({
          where: chromaWhere,
          include: ['documents', 'metadatas'],
        });

        result.ids.forEach((id, index) => {
          chunks.push({
            id,
            content: result.documents[index] ?? '',
            metadata: fromChromaMetadata(result.metadatas[index]),
          });
        });
      }

      return chunks;
    } catch (error) {
      throw new RetrievalError(`Failed to read chunks: ${describeError(error)}`, error);
    }
  }

  async delete(ids: string[]): Promise<void> {
    if (!ids.length) {
      return;
    }

    try {
      const collections = await this.listCollections();
      await Promise.all(collections.map((collection) => collection.delete({ ids })));
    } catch (error) {
      throw new IndexWriteError(`Failed to delete ${ids.length} chunk(s): ${describeError(error)}`, error);
    }
  }

  async deleteCollection(collectionId: string): Promise<void> {
    try {
      const existing = await this.findCollection(collectionId);
      if (existing) {
        await this.client.deleteCollection({ name: existing.name });
        console.info(`[index] Dropped ${this.describeCollection(collectionId)}.`);
      }
    } catch (error) {
      throw new IndexWriteError(`Failed to drop ${this.describeCollection(collectionId)}: ${describeError(error)}`, error);
    }
  }

  async count(collectionId?: string): Promise<number> {
    try {
      const collections = await this.collectionsFor(collectionId);
      const counts = await Promise.all(collections.map((collection) => collection.count()));
      return counts.reduce((total, value) => total + value, 0);
    } catch (error) {
      throw new RetrievalError(`Failed to count chunks: ${describeError(error)}`, error);
    }
  }
}

export const createChromaIndex = (options: {
  url: string;
  collectionPrefix: string;
  embedder: Embedder;
}): ChromaEmbeddingIndex => {
  const client = new ChromaClient(parseChromaUrl(options.url));

  return new ChromaEmbeddingIndex({
    client,
    embedder: options.embedder,
    collectionPrefix: options.collectionPrefix,
    location: options.url,
  });
};
