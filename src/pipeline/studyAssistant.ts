import type { EventLog } from '../store/events';
import type { StudyAnswer, StudyMode } from '../types';
import type { GenerationOrchestrator } from './generate';
import type { ContextAssembler } from './retrieve';

export type StudyAssistantDeps = {
  assembler: ContextAssembler;
  orchestrator: GenerationOrchestrator;
  events: EventLog;
};

export type StudyRequest = {
  mode: StudyMode;
  query: string;
  userId: string;
};

export const askStudyAssistant = async (
  { assembler, orchestrator, events }: StudyAssistantDeps,
  { mode, query, userId }: StudyRequest,
): Promise<StudyAnswer> => {
  const { chunks, sources } = await assembler.retrieveForQuery(query, orchestrator.retrievalDepth(mode));

  if (!chunks.length) {
    console.warn(`[study] No indexed material matched a ${mode} request; answering without context.`);
  }

  const answer = await orchestrator.generate(mode, {
    context: chunks.join('\n\n'),
    question: query,
  });

  events.log(userId, 'chat_interaction', { mode });

  return { answer, sources, mode };
};
