import { ValidationError } from '../errors';
import type { GeneratedContentStore } from '../store/content';
import type { DocumentStore } from '../store/documents';
import type { EventLog } from '../store/events';
import type { ContentType, Difficulty, GeneratedContentRecord } from '../types';
import type { GenerationOrchestrator } from './generate';
import { resolveQuestions } from './resolveQuestions';
import type { ContextAssembler } from './retrieve';

export type AssessmentDeps = {
  documents: DocumentStore;
  content: GeneratedContentStore;
  events: EventLog;
  assembler: ContextAssembler;
  orchestrator: GenerationOrchestrator;
};

export type AssessmentRequest = {
  contentType: ContentType;
  documentIds: string[];
  numQuestions: number;
  difficulty: Difficulty;
  facultyId: string;
};

/**
 * Builds context from the selected documents, asks the model for questions and stores
 * the result. Unparseable model output still yields a stored record, made of placeholders.
 */
export const generateAssessment = async (
  { documents, content, events, assembler, orchestrator }: AssessmentDeps,
  { contentType, documentIds, numQuestions, difficulty, facultyId }: AssessmentRequest,
): Promise<GeneratedContentRecord> => {
  const selected = [...new Set(documentIds)];
  const notReady = selected
    .map((id) => documents.require(id))
    .filter((record) => record.status !== 'completed')
    .map((record) => `${record.filename} (${record.status})`);

  if (notReady.length) {
    throw new ValidationError(`Documents are not ready for generation: ${notReady.join(', ')}.`);
  }

  const context = await assembler.retrieveForDocuments(selected);
  const rawText = await orchestrator.generate(contentType, { context, numQuestions, difficulty });
  const resolved = resolveQuestions(rawText, numQuestions, contentType);

  const record = content.store({ contentType, facultyId, documentIds: selected, resolved });

  events.log(facultyId, 'content_generated', {
    content_type: contentType,
    num_items: record.questions.length,
    origin: record.origin,
  });

  return record;
};
