import { CourseRagError, describeError, RetrievalError } from '../errors';
import { GLOBAL_SCOPE } from '../rag/schema';
import type { EmbeddingIndex } from '../rag/schema';

export const MAX_CONTEXT_CHUNKS = 20;

export type QueryRetrieval = {
  chunks: string[];
  sources: string[];
};

const rethrowAsRetrievalError = (error: unknown, action: string): never => {
  if (error instanceof CourseRagError) {
    throw error;
  }
  throw new RetrievalError(`${action} failed: ${describeError(error)}`, error);
};

export class ContextAssembler {
  constructor(private readonly index: EmbeddingIndex) {}

  /** Similarity search across every indexed document, most relevant first. */
  async retrieveForQuery(query: string, topK: number): Promise<QueryRetrieval> {
    if (!query.trim() || topK <= 0) {
      return { chunks: [], sources: [] };
    }

    try {
      const results = await this.index.query(GLOBAL_SCOPE, query, topK);
      const sources = [...new Set(results.map((chunk) => chunk.metadata.filename || 'Unknown'))];

      return {
        chunks: results.map((chunk) => chunk.content),
        sources,
      };
    } catch (error) {
      return rethrowAsRetrievalError(error, 'Similarity search');
    }
  }

  /**
   * All chunks of the given documents, id by id, capped at the first
   * {@link MAX_CONTEXT_CHUNKS}. Unknown or empty documents contribute nothing.
   */
  async retrieveForDocuments(documentIds: string[]): Promise<string> {
    const collected: string[] = [];

    try {
      for (const documentId of documentIds) {
        if (collected.length >= MAX_CONTEXT_CHUNKS) {
          break;
        }
        const chunks = await this.index.getAll({ document_id: documentId });
        collected.push(...chunks.map((chunk) => chunk.content));
      }
    } catch (error) {
      return rethrowAsRetrievalError(error, 'Document context lookup');
    }

    if (!collected.length) {
      console.warn(`[retrieve] No indexed chunks for document(s) ${documentIds.join(', ') || '(none)'}.`);
    }

    return collected.slice(0, MAX_CONTEXT_CHUNKS).join('\n\n');
  }
}
