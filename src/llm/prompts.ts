import { ConfigurationError } from '../errors';
import type { ContentType, GenerationMode, StudyMode } from '../types';

export type PromptSlot = 'context' | 'question' | 'num_questions' | 'difficulty';

export type BasePromptSpec = {
  template: string;
  slots: readonly PromptSlot[];
  temperature: number;
  maxTokens: number;
};

export type StudyPromptSpec = BasePromptSpec & {
  audience: 'student';
  retrievalK: number;
};

export type AssessmentPromptSpec = BasePromptSpec & {
  audience: 'faculty';
  contextLimit: number;
};

export type PromptTable = { [M in StudyMode]: StudyPromptSpec } & { [M in ContentType]: AssessmentPromptSpec };

const STUDENT_PARAMS = { audience: 'student', temperature: 0.3, maxTokens: 1024 } as const;
const FACULTY_PARAMS = { audience: 'faculty', temperature: 0.5, maxTokens: 2048, contextLimit: 3000 } as const;

const QA_TEMPLATE = `Use the following course material to answer the student's question.
If the material does not contain the answer, say so clearly instead of guessing.

Context: {context}

Question: {question}

Answer: give a clear, concise explanation with examples where they help.`;

const NOTES_TEMPLATE = `Using the course material below, write detailed study notes on: {question}

Structure the notes as follows:

**KEY CONCEPTS:**
- Each main concept with a one-line definition

**DETAILED EXPLANATION:**
A thorough explanation with worked examples

**IMPORTANT POINTS TO REMEMBER:**
- The facts most likely to be examined

**PRACTICE QUESTIONS:**
1. A conceptual question with its answer
2. An application question with its answer
3. An analysis question with its answer

Context: {context}

Write the study notes now:`;

const PRACTICE_TEMPLATE = `Based on the course material below, write practice questions about: {question}

Include a mix of formats:

**MULTIPLE CHOICE (3 questions):**
Four options each, with the correct option marked.

**SHORT ANSWER (3 questions):**
Each followed by a brief model answer.

**CONCEPTUAL (2 questions):**
Questions that test deeper understanding, each with a detailed answer.

Context: {context}

Write the practice questions now:`;

const ASSIGNMENT_TEMPLATE = `You are an experienced educator setting an assignment. Using the content below, write {num_questions} assignment questions.

Difficulty level: {difficulty}

Guidelines:
- Mix question types: theory, numerical, analytical, application
- Award 2, 5 or 10 marks depending on depth
- Give a marking scheme for every question
- Cover different parts of the content

Content:
{context}

Return ONLY a JSON array of {num_questions} objects shaped like this:
[
  {
    "question_number": 1,
    "question": "Question text",
    "type": "theory | numerical | analytical | application",
    "marks": 5,
    "marking_scheme": "Point 1 (2 marks), Point 2 (2 marks), Point 3 (1 mark)",
    "sample_answer": "Outline of the expected answer"
  }
]`;

const MCQ_TEMPLATE = `Write {num_questions} multiple choice questions from the content below.

Difficulty: {difficulty}

Requirements:
- Exactly four options labelled A, B, C and D
- Exactly one correct option
- Plausible but clearly wrong distractors
- A mix of recall, conceptual and application questions across the content

Content:
{context}

Return ONLY a JSON array of {num_questions} objects shaped like this:
[
  {
    "question_number": 1,
    "question": "What is ...?",
    "options": { "A": "Option A", "B": "Option B", "C": "Option C", "D": "Option D" },
    "correct_answer": "B",
    "explanation": "Why B is correct"
  }
]`;

const VIVA_TEMPLATE = `Write {num_questions} viva (oral examination) questions from the content below.

Viva questions should:
- Test conceptual understanding
- Be short and direct, leaving room for a spoken answer
- Span fundamental and advanced ideas
- Include some "why" and "how" questions

Content:
{context}

Return ONLY a JSON array of {num_questions} objects shaped like this:
[
  {
    "question_number": 1,
    "question": "Explain the significance of ...",
    "type": "conceptual | definition | comparison | application",
    "key_points": ["First point expected in the answer", "Second point", "Third point"],
    "difficulty": "easy | medium | hard"
  }
]`;

export const PROMPTS: PromptTable = {
  qa: { ...STUDENT_PARAMS, template: QA_TEMPLATE, slots: ['context', 'question'], retrievalK: 5 },
  notes: { ...STUDENT_PARAMS, template: NOTES_TEMPLATE, slots: ['context', 'question'], retrievalK: 7 },
  practice: { ...STUDENT_PARAMS, template: PRACTICE_TEMPLATE, slots: ['context', 'question'], retrievalK: 6 },
  assignment: {
    ...FACULTY_PARAMS,
    template: ASSIGNMENT_TEMPLATE,
    slots: ['context', 'num_questions', 'difficulty'],
  },
  mcq: { ...FACULTY_PARAMS, template: MCQ_TEMPLATE, slots: ['context', 'num_questions', 'difficulty'] },
  viva: { ...FACULTY_PARAMS, template: VIVA_TEMPLATE, slots: ['context', 'num_questions'] },
};

// Only lower-case identifiers count as slots, so JSON braces in the templates are left alone.
const SLOT_PATTERN = /\{([a-z_]+)\}/g;

export const findSlots = (template: string): string[] =>
  [...new Set(Array.from(template.matchAll(SLOT_PATTERN), (match) => match[1]))];

/** Throws if any template uses a slot it does not declare, or declares one it never uses. */
export const validatePromptTable = (table: Record<GenerationMode, BasePromptSpec>): void => {
  const problems: string[] = [];

  for (const [mode, spec] of Object.entries(table)) {
    const used = findSlots(spec.template);
    const declared: readonly string[] = spec.slots;

    declared
      .filter((slot) => !used.includes(slot))
      .forEach((slot) => problems.push(`${mode}: slot {${slot}} is declared but missing from the template`));
    used
      .filter((slot) => !declared.includes(slot))
      .forEach((slot) => problems.push(`${mode}: template uses undeclared slot {${slot}}`));

    if (spec.maxTokens <= 0 || spec.temperature < 0) {
      problems.push(`${mode}: invalid generation parameters`);
    }
  }

  if (problems.length) {
    throw new ConfigurationError(`Invalid prompt table. ${problems.join('; ')}`);
  }
};

export const renderPrompt = (template: string, values: Partial<Record<PromptSlot, string>>): string =>
  template.replace(SLOT_PATTERN, (placeholder, slot: string) => {
    const value = Reflect.get(values, slot);
    return typeof value === 'string' ? value : placeholder;
  });
