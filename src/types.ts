export type DocumentStatus = 'queued' | 'processing' | 'completed' | 'failed';

export interface DocumentRecord {
  id: string;
  filename: string;
  filePath: string;
  uploadedBy: string;
  courseName: string | null;
  status: DocumentStatus;
  chunksCreated: number | null;
  errorMessage: string | null;
  createdAt: string;
  updatedAt: string;
}

export type StudyMode = 'qa' | 'notes' | 'practice';

export type ContentType = 'assignment' | 'mcq' | 'viva';

export type GenerationMode = StudyMode | ContentType;

export type Difficulty = 'easy' | 'medium' | 'hard';

export type McqOptionKey = 'A' | 'B' | 'C' | 'D';

export interface AssignmentQuestion {
  question_number: number;
  question: string;
  type: string;
  marks: number;
  marking_scheme: string;
  sample_answer: string;
}

export interface McqQuestion {
  question_number: number;
  question: string;
  options: Record<McqOptionKey, string>;
  correct_answer: McqOptionKey;
  explanation: string;
}

export interface VivaQuestion {
  question_number: number;
  question: string;
  type: string;
  key_points: string[];
  difficulty: Difficulty;
}

export interface QuestionByType {
  assignment: AssignmentQuestion;
  mcq: McqQuestion;
  viva: VivaQuestion;
}

export type QuestionObject = QuestionByType[ContentType];

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * Model output that parsed is kept verbatim, so its items are only known to be JSON.
 * Placeholders are fully typed.
 */
export type ResolvedQuestions<T extends ContentType = ContentType> =
  | { origin: 'parsed'; questions: JsonValue[] }
  | { origin: 'synthesized'; questions: QuestionByType[T][] };

export interface GeneratedContentRecord {
  id: string;
  contentType: ContentType;
  facultyId: string;
  documentIds: string[];
  questions: JsonValue[] | QuestionObject[];
  origin: ResolvedQuestions['origin'];
  createdAt: string;
}

export type AnalyticsEventType =
  | 'document_processed'
  | 'document_failed'
  | 'document_deleted'
  | 'chat_interaction'
  | 'content_generated';

export interface AnalyticsEvent {
  id: string;
  userId: string;
  eventType: AnalyticsEventType;
  data: Record<string, string | number | boolean | null>;
  timestamp: string;
}

export interface StudyAnswer {
  answer: string;
  sources: string[];
  mode: StudyMode;
}
