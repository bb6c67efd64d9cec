import type { AppConfig } from './config';
import { OpenAiCompletionModel } from './llm/client';
import type { CompletionModel } from './llm/client';
import { PROMPTS, validatePromptTable } from './llm/prompts';
import type { PromptTable } from './llm/prompts';
import type { ChunkingOptions } from './pipeline/chunkText';
import { PdfTextExtractor } from './pipeline/extractText';
import type { TextExtractor } from './pipeline/extractText';
import { GenerationOrchestrator } from './pipeline/generate';
import { IngestionCoordinator } from './pipeline/ingestDocument';
import { ContextAssembler } from './pipeline/retrieve';
import { createChromaIndex } from './rag/client';
import { createOllamaEmbedder } from './rag/embeddings';
import type { EmbeddingIndex } from './rag/schema';
import { GeneratedContentStore } from './store/content';
import { DocumentStore } from './store/documents';
import { EventLog } from './store/events';
import { UploadStore } from './store/uploads';

export type Services = {
  documents: DocumentStore;
  content: GeneratedContentStore;
  events: EventLog;
  uploads: UploadStore;
  index: EmbeddingIndex;
  coordinator: IngestionCoordinator;
  assembler: ContextAssembler;
  orchestrator: GenerationOrchestrator;
};

export type ServiceParts = {
  dataDir: string;
  uploadsDir: string;
  index: EmbeddingIndex;
  extractor: TextExtractor;
  model: CompletionModel;
  chunking?: ChunkingOptions;
  prompts?: PromptTable;
  now?: () => Date;
};

/** Wires the stores and pipeline around whichever index, extractor and model it is given. */
export const buildServices = ({
  dataDir,
  uploadsDir,
  index,
  extractor,
  model,
  chunking,
  prompts = PROMPTS,
  now,
}: ServiceParts): Services => {
  validatePromptTable(prompts);

  return {
    documents: new DocumentStore(dataDir, now),
    content: new GeneratedContentStore(dataDir, now),
    events: new EventLog(dataDir, now),
    uploads: new UploadStore(uploadsDir),
    index,
    coordinator: new IngestionCoordinator({ extractor, index, chunking }),
    assembler: new ContextAssembler(index),
    orchestrator: new GenerationOrchestrator(model, prompts),
  };
};

export const createServices = (config: AppConfig): Services => {
  const embedder = createOllamaEmbedder({
    url: config.embeddings.url,
    model: config.embeddings.model,
    batchSize: config.embeddings.batchSize,
    maxAttempts: config.embeddings.maxAttempts,
  });

  return buildServices({
    dataDir: config.dataDir,
    uploadsDir: config.uploadsDir,
    index: createChromaIndex({
      url: config.chroma.url,
      collectionPrefix: config.chroma.collectionPrefix,
      embedder,
    }),
    extractor: new PdfTextExtractor(),
    model: new OpenAiCompletionModel(config.llm),
    chunking: config.chunking,
  });
};
