import { describeError, GenerationError } from '../errors';
import type { CompletionModel } from '../llm/client';
import { PROMPTS, renderPrompt } from '../llm/prompts';
import type { PromptSlot, PromptTable } from '../llm/prompts';
import type { Difficulty, GenerationMode, StudyMode } from '../types';

export type GenerationInput = {
  context: string;
  question?: string;
  numQuestions?: number;
  difficulty?: Difficulty;
};

export class GenerationOrchestrator {
  private readonly model: CompletionModel;

  private readonly prompts: PromptTable;

  constructor(model: CompletionModel, prompts: PromptTable = PROMPTS) {
    this.model = model;
    this.prompts = prompts;
  }

  /** How many chunks a study mode retrieves before generating. */
  retrievalDepth(mode: StudyMode): number {
    return this.prompts[mode].retrievalK;
  }

  buildPrompt(mode: GenerationMode, input: GenerationInput): string {
    const spec = this.prompts[mode];
    const context = spec.audience === 'faculty' ? input.context.slice(0, spec.contextLimit) : input.context;

    const values: Record<PromptSlot, string> = {
      context,
      question: input.question ?? '',
      num_questions: String(input.numQuestions ?? ''),
      difficulty: input.difficulty ?? 'medium',
    };

    return renderPrompt(spec.template, values);
  }

  /** One model call, no retries. Any failure surfaces as a {@link GenerationError}. */
  async generate(mode: GenerationMode, input: GenerationInput): Promise<string> {
    const { temperature, maxTokens } = this.prompts[mode];
    const prompt = this.buildPrompt(mode, input);

    try {
      return await this.model.complete(prompt, { temperature, maxTokens });
    } catch (error) {
      console.error(`[llm] ${mode} generation failed: ${describeError(error)}`);
      throw new GenerationError(`Model invocation failed for ${mode}: ${describeError(error)}`, error);
    }
  }
}
