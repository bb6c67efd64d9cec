import path from 'node:path';
import { z } from 'zod';

import { ConfigurationError } from './errors';

const envSchema = z
  .object({
    PORT: z.coerce.number().int().positive().default(3000),
    DATA_DIR: z.string().min(1).default('.data'),
    CHROMA_URL: z.string().url().default('http://127.0.0.1:8000'),
    CHROMA_COLLECTION_PREFIX: z
      .string()
      .regex(/^[a-zA-Z0-9][a-zA-Z0-9_-]*$/, 'must start with a letter or digit and use only letters, digits, _ or -')
      .default('course-doc'),
    OLLAMA_EMBED_URL: z.string().url().default('http://127.0.0.1:11434'),
    OLLAMA_EMBED_MODEL: z.string().min(1).default('nomic-embed-text'),
    EMBED_BATCH_SIZE: z.coerce.number().int().positive().default(64),
    EMBED_MAX_ATTEMPTS: z.coerce.number().int().positive().default(5),
    LLM_BASE_URL: z.string().url().default('https://openrouter.ai/api/v1'),
    LLM_MODEL: z.string().min(1).default('mistralai/mistral-small-3.2-24b-instruct:free'),
    LLM_API_KEY: z.string().optional(),
    CHUNK_SIZE: z.coerce.number().int().positive().default(1000),
    CHUNK_OVERLAP: z.coerce.number().int().nonnegative().default(200),
  })
  .refine((env) => env.CHUNK_OVERLAP < env.CHUNK_SIZE, {
    message: 'CHUNK_OVERLAP must be smaller than CHUNK_SIZE',
    path: ['CHUNK_OVERLAP'],
  });

export type AppConfig = {
  port: number;
  dataDir: string;
  uploadsDir: string;
  chroma: {
    url: string;
    collectionPrefix: string;
  };
  embeddings: {
    url: string;
    model: string;
    batchSize: number;
    maxAttempts: number;
  };
  llm: {
    baseUrl: string;
    model: string;
    apiKey?: string;
  };
  chunking: {
    chunkSize: number;
    chunkOverlap: number;
  };
};

export const loadConfig = (env: Record<string, string | undefined> = process.env): AppConfig => {
  // Blank values in .env mean "use the default".
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== ''),
  );
  const parsed = envSchema.safeParse(present);

  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid environment configuration. ${details}`);
  }

  const values = parsed.data;
  const dataDir = path.resolve(values.DATA_DIR);

  return {
    port: values.PORT,
    dataDir,
    uploadsDir: path.join(dataDir, 'uploads'),
    chroma: {
      url: values.CHROMA_URL,
      collectionPrefix: values.CHROMA_COLLECTION_PREFIX,
    },
    embeddings: {
      url: values.OLLAMA_EMBED_URL,
      model: values.OLLAMA_EMBED_MODEL,
      batchSize: values.EMBED_BATCH_SIZE,
      maxAttempts: values.EMBED_MAX_ATTEMPTS,
    },
    llm: {
      baseUrl: values.LLM_BASE_URL,
      model: values.LLM_MODEL,
      apiKey: values.LLM_API_KEY,
    },
    chunking: {
      chunkSize: values.CHUNK_SIZE,
      chunkOverlap: values.CHUNK_OVERLAP,
    },
  };
};
