import type {
  AssignmentQuestion,
  ContentType,
  JsonValue,
  McqQuestion,
  QuestionByType,
  ResolvedQuestions,
  VivaQuestion,
} from '../types';

const placeholderAssignment = (index: number, count: number): AssignmentQuestion => ({
  question_number: index + 1,
  question: `Question ${index + 1}: Using the provided material, explain one of its main topics with relevant examples.`,
  type: index % 2 === 0 ? 'theory' : 'analytical',
  marks: index < Math.floor(count / 2) ? 5 : 10,
  marking_scheme: 'Refer to the source material for detailed marking.',
  sample_answer: 'The answer should cover the key concepts from the provided material.',
});

const placeholderMcq = (index: number): McqQuestion => ({
  question_number: index + 1,
  question: `Question ${index + 1} from the provided material`,
  options: {
    A: 'Option A',
    B: 'Option B',
    C: 'Option C',
    D: 'Option D',
  },
  correct_answer: 'A',
  explanation: 'Refer to the source material for the explanation.',
});

const placeholderViva = (index: number): VivaQuestion => ({
  question_number: index + 1,
  question: 'Explain a concept discussed in the provided material.',
  type: 'conceptual',
  key_points: ['Key point 1', 'Key point 2', 'Key point 3'],
  difficulty: 'medium',
});

const PLACEHOLDERS: { [T in ContentType]: (index: number, count: number) => QuestionByType[T] } = {
  assignment: placeholderAssignment,
  mcq: placeholderMcq,
  viva: placeholderViva,
};

const normalizeCount = (expectedCount: number): number =>
  Number.isFinite(expectedCount) ? Math.max(0, Math.floor(expectedCount)) : 0;

export const synthesizeQuestions = <T extends ContentType>(
  expectedCount: number,
  contentType: T,
): QuestionByType[T][] => {
  const count = normalizeCount(expectedCount);
  const build: (index: number, count: number) => QuestionByType[T] = PLACEHOLDERS[contentType];

  return Array.from({ length: count }, (_, index) => build(index, count));
};

/** The outermost `[...]` span of the text, if it parses to a non-empty JSON array. */
export const extractJsonArray = (rawText: string): JsonValue[] | null => {
  const start = rawText.indexOf('[');
  const end = rawText.lastIndexOf(']');

  if (start === -1 || end <= start) {
    return null;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(rawText.slice(start, end + 1));
  } catch {
    return null;
  }

  return Array.isArray(parsed) && parsed.length > 0 ? parsed : null;
};

/**
 * Never throws. Parsed model output is returned untouched; anything unparseable is
 * replaced by `expectedCount` placeholders of the requested shape.
 */
export const resolveQuestions = <T extends ContentType>(
  rawText: string,
  expectedCount: number,
  contentType: T,
): ResolvedQuestions<T> => {
  const parsed = extractJsonArray(typeof rawText === 'string' ? rawText : '');

  if (parsed) {
    return { origin: 'parsed', questions: parsed };
  }

  console.warn(`[resolve] Model output for ${contentType} was not a JSON array; using placeholders.`);

  return { origin: 'synthesized', questions: synthesizeQuestions(expectedCount, contentType) };
};
