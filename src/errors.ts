export class CourseRagError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly status = 500,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'CourseRagError';
  }
}

export class ConfigurationError extends CourseRagError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR', 500);
    this.name = 'ConfigurationError';
  }
}

export class ValidationError extends CourseRagError {
  constructor(message: string) {
    super(message, 'VALIDATION_ERROR', 400);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends CourseRagError {
  constructor(message: string) {
    super(message, 'NOT_FOUND', 404);
    this.name = 'NotFoundError';
  }
}

export class InvalidStatusTransitionError extends CourseRagError {
  constructor(documentId: string, from: string, to: string) {
    super(`Document ${documentId} cannot move from "${from}" to "${to}".`, 'INVALID_STATUS_TRANSITION', 409);
    this.name = 'InvalidStatusTransitionError';
  }
}

// Ingestion stages. The message is what ends up in the document's error_message.

export class ExtractionError extends CourseRagError {
  constructor(filename: string, cause?: unknown) {
    super(`Could not read ${filename}: ${describeError(cause)}`, 'EXTRACTION_FAILED', 422, { cause });
    this.name = 'ExtractionError';
  }
}

export class EmptyDocumentError extends CourseRagError {
  constructor(filename: string) {
    super(`No readable text found in ${filename}.`, 'EMPTY_DOCUMENT', 422);
    this.name = 'EmptyDocumentError';
  }
}

export class ChunkingError extends CourseRagError {
  constructor(filename: string) {
    super(`Failed to split ${filename} into chunks.`, 'CHUNKING_FAILED', 422);
    this.name = 'ChunkingError';
  }
}

export class IndexWriteError extends CourseRagError {
  constructor(message: string, cause?: unknown) {
    super(message, 'INDEX_WRITE_FAILED', 502, { cause });
    this.name = 'IndexWriteError';
  }
}

export class RetrievalError extends CourseRagError {
  constructor(message: string, cause?: unknown) {
    super(message, 'RETRIEVAL_FAILED', 502, { cause });
    this.name = 'RetrievalError';
  }
}

export class GenerationError extends CourseRagError {
  constructor(message: string, cause?: unknown) {
    super(message, 'GENERATION_FAILED', 502, { cause });
    this.name = 'GenerationError';
  }
}

export const describeError = (error: unknown): string => {
  if (error instanceof Error && error.message) {
    return error.message;
  }

  if (typeof error === 'string' && error) {
    return error;
  }

  return 'Unknown error';
};
